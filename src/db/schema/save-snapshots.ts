import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
} from 'drizzle-orm/pg-core';
import type { SaveSnapshot } from '../types/index.js';

export const saveSnapshots = pgTable(
  'save_snapshots',
  {
    saveId: text('save_id').primaryKey(),
    sessionId: text('session_id').notNull(),
    playerId: text('player_id').notNull(),
    formatVersion: integer('format_version').notNull(),
    worldVersion: integer('world_version').notNull(),
    /** the whole snapshot document, validated again on load */
    snapshot: jsonb('snapshot').$type<SaveSnapshot>().notNull(),
    savedAt: timestamp('saved_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    sessionIdx: index('save_snapshots_session_idx').on(table.sessionId),
  }),
);
