import type { GameState, NpcSeed } from '../../db/types/index.js';
import { NpcMemory } from '../memory/npc-memory.js';

/**
 * Turns a location's pending residents into live NPCs (with empty memories)
 * and marks the location visited. Returns the ids that were created.
 * Seeds whose id already exists in `draft.npcs` are skipped.
 */
export function spawnResidents(
  draft: GameState,
  locationId: string,
  version: number,
  memoryCapacity: number,
): string[] {
  const location = draft.locations[locationId];
  if (!location) return [];

  const spawned: string[] = [];
  for (const seed of location.residents) {
    if (draft.npcs[seed.npcId]) continue;
    draft.npcs[seed.npcId] = {
      npcId: seed.npcId,
      name: seed.name,
      role: seed.role,
      description: seed.description,
      locationId,
      disposition: seed.disposition,
      inventory: { ...seed.inventory },
      health: seed.health,
      maxHealth: seed.health,
      strength: seed.strength,
      active: true,
      introducedAtVersion: version,
    };
    draft.memories[seed.npcId] = NpcMemory.empty(memoryCapacity);
    spawned.push(seed.npcId);
  }
  location.residents = [];
  location.visited = true;
  return spawned;
}

/** Residents of every location that have not been spawned yet. */
export function pendingResidents(state: GameState): NpcSeed[] {
  return Object.values(state.locations).flatMap((l) => l.residents);
}
