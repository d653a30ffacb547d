import { desc, eq } from 'drizzle-orm';
import type { DrizzleDB } from '../db/drizzle.module.js';
import { saveSnapshots } from '../db/schema/index.js';
import type { SaveSnapshot, SaveSummary } from '../db/types/index.js';
import { PersistenceError } from '../common/errors/game-errors.js';
import { decodeSnapshot } from './save-snapshot.schema.js';
import { SaveStore } from './save-store.js';

async function guarded<T>(action: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    throw new PersistenceError(`Could not ${action}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export class PgSaveStore extends SaveStore {
  readonly backend = 'postgres';

  constructor(private readonly db: DrizzleDB) {
    super();
  }

  async write(snapshot: SaveSnapshot): Promise<void> {
    await guarded('write save', () =>
      this.db.insert(saveSnapshots).values({
        saveId: snapshot.saveId,
        sessionId: snapshot.sessionId,
        playerId: snapshot.playerId,
        formatVersion: snapshot.formatVersion,
        worldVersion: snapshot.worldVersion,
        snapshot,
        savedAt: new Date(snapshot.savedAt),
      }),
    );
  }

  async read(saveId: string): Promise<SaveSnapshot | null> {
    const row = await guarded('read save', () =>
      this.db.query.saveSnapshots.findFirst({ where: eq(saveSnapshots.saveId, saveId) }),
    );
    return row ? decodeSnapshot(row.snapshot, saveId) : null;
  }

  async list(sessionId: string): Promise<SaveSummary[]> {
    const rows = await guarded('list saves', () =>
      this.db
        .select({
          saveId: saveSnapshots.saveId,
          sessionId: saveSnapshots.sessionId,
          worldVersion: saveSnapshots.worldVersion,
          savedAt: saveSnapshots.savedAt,
        })
        .from(saveSnapshots)
        .where(eq(saveSnapshots.sessionId, sessionId))
        .orderBy(desc(saveSnapshots.savedAt)),
    );
    return rows.map((r) => ({ ...r, savedAt: r.savedAt.toISOString() }));
  }
}
