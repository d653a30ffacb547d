import type { QuestState } from './enums.js';

export type ObjectivePredicate =
  | { type: 'DELIVER_ITEM'; itemId: string; npcId: string }
  | { type: 'OBTAIN_ITEM'; itemId: string }
  | { type: 'DEFEAT_NPC'; npcId: string }
  | { type: 'TALK_TO_NPC'; npcId: string }
  | { type: 'REACH_LOCATION'; locationId: string }
  | { type: 'SET_FLAG'; flag: string };

export interface QuestReward {
  items: string[];
  stats: Record<string, number>;
  flags: string[];
}

export interface Quest {
  questId: string;
  state: QuestState;
  summary: string;
  objective: ObjectivePredicate;
  reward: QuestReward;
  giverNpcId: string | null;
  offeredAtVersion: number;
  activatedAtVersion: number | null;
  /** DELIVER_ITEM only: what the recipient already held when the quest became active */
  deliveryBaseline?: number;
  updatedAtVersion: number;
}
