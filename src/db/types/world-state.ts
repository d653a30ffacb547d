import type { GameStatus } from './enums.js';
import type { NpcSeed } from './npc.js';

export interface WorldState {
  /** +1 per applied turn, never changes on a rejected or fallback turn */
  version: number;
  currentLocationId: string;
  flags: string[];
  status: GameStatus;
  /** ISO timestamp of the last commit */
  timestamp: string;
}

export interface LocationState {
  locationId: string;
  name: string;
  description: string;
  exits: string[];
  /** NPCs not met yet; instantiated the first time the player enters */
  residents: NpcSeed[];
  visited: boolean;
}

export interface ItemDefinition {
  itemId: string;
  name: string;
  description: string;
}
