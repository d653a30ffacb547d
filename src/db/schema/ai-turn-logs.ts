import {
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';

/** One row per AI Gateway attempt, successful or not. */
export const aiTurnLogs = pgTable('ai_turn_logs', {
  id: uuid('id').primaryKey().defaultRandom(),
  sessionId: text('session_id').notNull(),
  worldVersion: integer('world_version').notNull(),
  attempt: integer('attempt').notNull(),
  provider: text('provider').notNull(),
  modelUsed: text('model_used'),
  promptTokens: integer('prompt_tokens'),
  completionTokens: integer('completion_tokens'),
  latencyMs: integer('latency_ms'),
  rawPrompt: text('raw_prompt'),
  rawCompletion: text('raw_completion'),
  error: jsonb('error').$type<Record<string, unknown>>(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
