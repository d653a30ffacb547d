import { z } from 'zod';
import { NPC_ROLE, QUEST_STATE } from '../../db/types/index.js';
import type { EffectIntent, EffectProposal, ObjectivePredicate, QuestReward } from '../../db/types/index.js';

const id = z.string().trim().min(1).max(80);
const delta = z.number().int();
const quantity = z.number().int().min(1).max(99).default(1);

export const ObjectivePredicateSchema: z.ZodType<ObjectivePredicate, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('DELIVER_ITEM'), itemId: id, npcId: id }),
    z.object({ type: z.literal('OBTAIN_ITEM'), itemId: id }),
    z.object({ type: z.literal('DEFEAT_NPC'), npcId: id }),
    z.object({ type: z.literal('TALK_TO_NPC'), npcId: id }),
    z.object({ type: z.literal('REACH_LOCATION'), locationId: id }),
    z.object({ type: z.literal('SET_FLAG'), flag: id }),
  ]);

export const QuestRewardSchema: z.ZodType<QuestReward, z.ZodTypeDef, unknown> = z
  .object({
    items: z.array(id).default([]),
    stats: z.record(z.string(), delta).default({}),
    flags: z.array(id).default([]),
  })
  .default({});

export const EffectIntentSchema: z.ZodType<EffectIntent, z.ZodTypeDef, unknown> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ModifyDisposition'), npcId: id, delta }),
  z.object({ kind: z.literal('ModifyStat'), stat: id, delta }),
  z.object({ kind: z.literal('GrantItem'), targetId: id, itemId: id, quantity }),
  z.object({ kind: z.literal('RemoveItem'), targetId: id, itemId: id, quantity }),
  z.object({ kind: z.literal('SetFlag'), flag: id }),
  z.object({ kind: z.literal('ClearFlag'), flag: id }),
  z.object({ kind: z.literal('MovePlayer'), locationId: id }),
  z.object({
    kind: z.literal('IntroduceNpc'),
    npcId: id,
    name: z.string().trim().min(1).max(80),
    role: z.enum(NPC_ROLE).default('townsfolk'),
    description: z.string().max(500).default(''),
    locationId: id,
    disposition: z.number().int().default(0),
    health: z.number().int().min(1).default(30),
    strength: z.number().int().min(0).default(5),
  }),
  z.object({
    kind: z.literal('IntroduceItem'),
    itemId: id,
    name: z.string().trim().min(1).max(80),
    description: z.string().max(500).default(''),
  }),
  z.object({ kind: z.literal('DeactivateNpc'), npcId: id, reason: z.string().max(200).default('') }),
  z.object({ kind: z.literal('ModifyNpcHealth'), npcId: id, delta }),
  z.object({
    kind: z.literal('OfferQuest'),
    questId: id,
    summary: z.string().trim().min(1).max(300),
    objective: ObjectivePredicateSchema,
    reward: QuestRewardSchema,
    giverNpcId: id.nullable().default(null),
  }),
  z.object({ kind: z.literal('AdvanceQuest'), questId: id, to: z.enum(QUEST_STATE) }),
  z.object({ kind: z.literal('NpcSpeech'), npcId: id, text: z.string().trim().min(1).max(1000) }),
  z.object({ kind: z.literal('EmitNarration'), text: z.string().trim().min(1).max(2000) }),
]);

export const EffectProposalSchema: z.ZodType<EffectProposal, z.ZodTypeDef, unknown> = z.object({
  narration: z.string(),
  effects: z.array(EffectIntentSchema).max(20),
});
