import type { EffectKind, NpcRole, QuestState } from './enums.js';
import type { ObjectivePredicate, QuestReward } from './quest.js';

/** 'player' or an NPC id */
export type HolderRef = string;
export const PLAYER_REF = 'player';

export type EffectIntent =
  | { kind: 'ModifyDisposition'; npcId: string; delta: number }
  | { kind: 'ModifyStat'; stat: string; delta: number }
  | { kind: 'GrantItem'; targetId: HolderRef; itemId: string; quantity: number }
  | { kind: 'RemoveItem'; targetId: HolderRef; itemId: string; quantity: number }
  | { kind: 'SetFlag'; flag: string }
  | { kind: 'ClearFlag'; flag: string }
  | { kind: 'MovePlayer'; locationId: string }
  | {
      kind: 'IntroduceNpc';
      npcId: string;
      name: string;
      role: NpcRole;
      description: string;
      locationId: string;
      disposition: number;
      health: number;
      strength: number;
    }
  | { kind: 'IntroduceItem'; itemId: string; name: string; description: string }
  | { kind: 'DeactivateNpc'; npcId: string; reason: string }
  /** an NPC whose health reaches 0 is deactivated */
  | { kind: 'ModifyNpcHealth'; npcId: string; delta: number }
  | {
      kind: 'OfferQuest';
      questId: string;
      summary: string;
      objective: ObjectivePredicate;
      reward: QuestReward;
      giverNpcId: string | null;
    }
  | { kind: 'AdvanceQuest'; questId: string; to: QuestState }
  | { kind: 'NpcSpeech'; npcId: string; text: string }
  | { kind: 'EmitNarration'; text: string };

export type EffectOf<K extends EffectKind> = Extract<EffectIntent, { kind: K }>;

export interface EffectProposal {
  narration: string;
  effects: EffectIntent[];
}

export interface ClampNote {
  index: number;
  field: string;
  proposed: number;
  clampedTo: number;
}

export interface ValidatedProposal extends EffectProposal {
  clamped: ClampNote[];
}

export interface AppliedEffect {
  kind: EffectKind;
  summary: string;
  /** false when the applier declined the intent (e.g. a completion whose objective does not hold) */
  honored: boolean;
}
