import type { Speaker } from './enums.js';

export interface DialogueTurn {
  speaker: Speaker;
  text: string;
  /** world version when the line was spoken; ordering is causal, not wall-clock */
  worldVersion: number;
}

/** Serialized NPC memory, oldest turn first. */
export interface NpcMemorySnapshot {
  capacity: number;
  turns: DialogueTurn[];
}
