import type { GameState } from './game-state.js';

export const SAVE_FORMAT_VERSION = 1;

/** A saved session. `worldVersion` always equals `state.world.version`. */
export interface SaveSnapshot {
  formatVersion: typeof SAVE_FORMAT_VERSION;
  saveId: string;
  sessionId: string;
  playerId: string;
  worldVersion: number;
  savedAt: string;
  state: GameState;
}

export interface SaveSummary {
  saveId: string;
  sessionId: string;
  worldVersion: number;
  savedAt: string;
}

export function summarize(snapshot: SaveSnapshot): SaveSummary {
  return {
    saveId: snapshot.saveId,
    sessionId: snapshot.sessionId,
    worldVersion: snapshot.worldVersion,
    savedAt: snapshot.savedAt,
  };
}
