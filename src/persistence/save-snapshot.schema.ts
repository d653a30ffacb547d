import { z } from 'zod';
import { GAME_STATUS, NPC_ROLE, QUEST_STATE, SAVE_FORMAT_VERSION, SPEAKER } from '../db/types/index.js';
import type { GameState, SaveSnapshot } from '../db/types/index.js';
import { PersistenceError } from '../common/errors/game-errors.js';
import { ObjectivePredicateSchema, QuestRewardSchema } from '../llm/response/effect-proposal.schema.js';

const id = z.string().min(1);
const version = z.number().int().min(0);
const inventory = z.record(z.string(), z.number().int().min(1));

const NpcSeedSchema = z.object({
  npcId: id,
  name: z.string(),
  role: z.enum(NPC_ROLE),
  description: z.string(),
  disposition: z.number().int(),
  inventory,
  health: z.number().int().min(0),
  strength: z.number().int().min(0),
});

const GameStateSchema: z.ZodType<GameState, z.ZodTypeDef, unknown> = z.object({
  world: z.object({
    version,
    currentLocationId: id,
    flags: z.array(z.string()),
    status: z.enum(GAME_STATUS),
    timestamp: z.string(),
  }),
  player: z.object({
    id,
    name: z.string(),
    characterClass: z.string(),
    stats: z.record(z.string(), z.number().int().min(0)),
    inventory,
    locationId: id,
  }),
  locations: z.record(
    z.string(),
    z.object({
      locationId: id,
      name: z.string(),
      description: z.string(),
      exits: z.array(id),
      residents: z.array(NpcSeedSchema),
      visited: z.boolean(),
    }),
  ),
  items: z.record(z.string(), z.object({ itemId: id, name: z.string(), description: z.string() })),
  npcs: z.record(
    z.string(),
    NpcSeedSchema.extend({
      locationId: id,
      maxHealth: z.number().int().min(1),
      active: z.boolean(),
      introducedAtVersion: version,
    }),
  ),
  quests: z.record(
    z.string(),
    z.object({
      questId: id,
      state: z.enum(QUEST_STATE),
      summary: z.string(),
      objective: ObjectivePredicateSchema,
      reward: QuestRewardSchema,
      giverNpcId: id.nullable(),
      offeredAtVersion: version,
      activatedAtVersion: version.nullable(),
      deliveryBaseline: z.number().int().min(0).optional(),
      updatedAtVersion: version,
    }),
  ),
  memories: z.record(
    z.string(),
    z.object({
      capacity: z.number().int().min(1),
      turns: z.array(z.object({ speaker: z.enum(SPEAKER), text: z.string(), worldVersion: version })),
    }),
  ),
});

export const SaveSnapshotSchema: z.ZodType<SaveSnapshot, z.ZodTypeDef, unknown> = z
  .object({
    formatVersion: z.literal(SAVE_FORMAT_VERSION),
    saveId: id,
    sessionId: id,
    playerId: id,
    worldVersion: version,
    savedAt: z.string().datetime(),
    state: GameStateSchema,
  })
  .refine((s) => s.worldVersion === s.state.world.version, {
    message: 'worldVersion does not match the saved state',
    path: ['worldVersion'],
  });

export function decodeSnapshot(raw: unknown, source: string): SaveSnapshot {
  const result = SaveSnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new PersistenceError('Save file is corrupt or from an unknown format', {
      source,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}
