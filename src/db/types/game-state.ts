import type { NpcMemorySnapshot } from './memory-types.js';
import type { NpcState } from './npc.js';
import type { PlayerCharacter } from './player.js';
import type { Quest } from './quest.js';
import type { ItemDefinition, LocationState, WorldState } from './world-state.js';

/**
 * The whole authoritative aggregate of one session. Plain data only, so that
 * a working copy is a structured clone and a save file is its JSON.
 */
export interface GameState {
  world: WorldState;
  player: PlayerCharacter;
  locations: Record<string, LocationState>;
  items: Record<string, ItemDefinition>;
  npcs: Record<string, NpcState>;
  quests: Record<string, Quest>;
  memories: Record<string, NpcMemorySnapshot>;
}
