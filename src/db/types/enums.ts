export const QUEST_STATE = [
  'Undiscovered',
  'Offered',
  'Active',
  'Completed',
  'Failed',
  'Abandoned',
] as const;
export type QuestState = (typeof QUEST_STATE)[number];

export const NPC_ROLE = ['enemy', 'merchant', 'quest_giver', 'townsfolk'] as const;
export type NpcRole = (typeof NPC_ROLE)[number];

export const GAME_STATUS = ['PLAYING', 'GAME_OVER', 'VICTORY'] as const;
export type GameStatus = (typeof GAME_STATUS)[number];

export const SPEAKER = ['player', 'npc'] as const;
export type Speaker = (typeof SPEAKER)[number];

export const EFFECT_KIND = [
  'ModifyDisposition',
  'ModifyStat',
  'GrantItem',
  'RemoveItem',
  'SetFlag',
  'ClearFlag',
  'MovePlayer',
  'IntroduceNpc',
  'IntroduceItem',
  'DeactivateNpc',
  'ModifyNpcHealth',
  'OfferQuest',
  'AdvanceQuest',
  'NpcSpeech',
  'EmitNarration',
] as const;
export type EffectKind = (typeof EFFECT_KIND)[number];

export const TURN_PHASE = [
  'Idle',
  'Building',
  'Calling',
  'Validating',
  'Applying',
] as const;
export type TurnPhase = (typeof TURN_PHASE)[number];

export const TURN_OUTCOME = ['APPLIED', 'FALLBACK', 'DIRECT', 'REJECTED'] as const;
export type TurnOutcome = (typeof TURN_OUTCOME)[number];
