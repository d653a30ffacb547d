import type { SaveSnapshot, SaveSummary } from '../db/types/index.js';

export type SaveBackend = 'file' | 'postgres';

/** Where snapshots live. Implementations raise PersistenceError on I/O failure. */
export abstract class SaveStore {
  abstract readonly backend: SaveBackend;

  abstract write(snapshot: SaveSnapshot): Promise<void>;

  /** `null` when no save has this id. */
  abstract read(saveId: string): Promise<SaveSnapshot | null>;

  /** Newest first. */
  abstract list(sessionId: string): Promise<SaveSummary[]>;
}
