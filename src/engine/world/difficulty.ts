import type { AppliedEffect, GameState, NpcSeed } from '../../db/types/index.js';
import type { EngineConfig } from '../engine-config.service.js';
import { NpcMemory } from '../memory/npc-memory.js';
import { pendingResidents } from './residents.js';

type Arrival = Omit<NpcSeed, 'npcId' | 'inventory'>;

const REINFORCEMENT: Arrival = {
  name: 'Cave Troll',
  role: 'enemy',
  description: 'A hulking troll, drawn by the din of battle.',
  disposition: -80,
  health: 70,
  strength: 12,
};

const RELIEF: Arrival = {
  name: 'Wandering Merchant',
  role: 'merchant',
  description: 'A travelling merchant with a satchel of remedies.',
  disposition: 40,
  health: 30,
  strength: 3,
};

export interface DifficultyAdjustment {
  narration: string[];
  applied: AppliedEffect[];
}

/** True when the turn committing `version` should run a difficulty pass. */
export function isDifficultyTurn(version: number, config: EngineConfig): boolean {
  return config.difficultyInterval > 0 && version % config.difficultyInterval === 0;
}

/**
 * Rebalances the world against the player on `draft`:
 *
 * - healthy player, no enemy left anywhere → a stronger enemy arrives
 * - healthy player, one enemy left and nearly beaten → it recovers 30% of its health
 * - player below 30% health while enemies stand → a merchant arrives, unless one is already here
 *
 * Deterministic; at most one adjustment per pass.
 */
export function adjustDifficulty(draft: GameState, version: number, config: EngineConfig): DifficultyAdjustment {
  const { health, maxHealth } = draft.player.stats;
  if (health === undefined || maxHealth === undefined || maxHealth <= 0) {
    return { narration: [], applied: [] };
  }
  const ratio = health / maxHealth;
  const standing = Object.values(draft.npcs).filter((n) => n.role === 'enemy' && n.active);
  const here = draft.player.locationId;

  if (ratio > 0.7 && standing.length === 0) {
    if (pendingResidents(draft).some((seed) => seed.role === 'enemy')) {
      return { narration: [], applied: [] };
    }
    const npcId = arrive(draft, `troll_v${version}`, REINFORCEMENT, version, config);
    if (!npcId) return { narration: [], applied: [] };
    return {
      narration: [`A ${REINFORCEMENT.name} appears, drawn by the sounds of battle!`],
      applied: [{ kind: 'IntroduceNpc', summary: `${REINFORCEMENT.name} appears (${npcId})`, honored: true }],
    };
  }

  if (ratio > 0.7 && standing.length === 1) {
    const [foe] = standing;
    if (foe.health >= foe.maxHealth * 0.3) return { narration: [], applied: [] };
    const before = foe.health;
    foe.health = Math.min(foe.maxHealth, foe.health + Math.floor(foe.maxHealth * 0.3));
    return {
      narration: [`The ${foe.name} finds renewed strength and vigor!`],
      applied: [{ kind: 'ModifyNpcHealth', summary: `${foe.name} health ${before} -> ${foe.health}`, honored: true }],
    };
  }

  if (ratio < 0.3 && standing.length > 0) {
    const merchantHere = Object.values(draft.npcs).some(
      (n) => n.role === 'merchant' && n.active && n.locationId === here,
    );
    if (merchantHere) return { narration: [], applied: [] };
    const npcId = arrive(draft, `merchant_v${version}`, RELIEF, version, config);
    if (!npcId) return { narration: [], applied: [] };
    return {
      narration: [`A ${RELIEF.name} appears, offering assistance!`],
      applied: [{ kind: 'IntroduceNpc', summary: `${RELIEF.name} appears (${npcId})`, honored: true }],
    };
  }

  return { narration: [], applied: [] };
}

function arrive(draft: GameState, npcId: string, arrival: Arrival, version: number, config: EngineConfig): string | null {
  if (draft.npcs[npcId]) return null;
  draft.npcs[npcId] = {
    ...arrival,
    npcId,
    locationId: draft.player.locationId,
    disposition: Math.min(config.dispositionMax, Math.max(config.dispositionMin, arrival.disposition)),
    inventory: {},
    maxHealth: arrival.health,
    active: true,
    introducedAtVersion: version,
  };
  draft.memories[npcId] = NpcMemory.empty(config.memoryCapacity);
  return npcId;
}
