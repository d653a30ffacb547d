import { mkdir, readFile, readdir, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import type { SaveSnapshot, SaveSummary } from '../db/types/index.js';
import { summarize } from '../db/types/index.js';
import { PersistenceError } from '../common/errors/game-errors.js';
import { decodeSnapshot } from './save-snapshot.schema.js';
import { SaveStore } from './save-store.js';

const SAVE_ID = /^[A-Za-z0-9_-]+$/;

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One JSON document per save under `dir`, written to a temp file and renamed into place. */
export class FileSaveStore extends SaveStore {
  readonly backend = 'file';

  constructor(private readonly dir: string) {
    super();
  }

  async write(snapshot: SaveSnapshot): Promise<void> {
    const path = this.pathOf(snapshot.saveId);
    const tmp = `${path}.tmp`;
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(tmp, JSON.stringify(snapshot, null, 2), 'utf-8');
      await rename(tmp, path);
    } catch (err) {
      throw new PersistenceError('Could not write save file', { saveId: snapshot.saveId, cause: reason(err) });
    }
  }

  async read(saveId: string): Promise<SaveSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathOf(saveId), 'utf-8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw new PersistenceError('Could not read save file', { saveId, cause: reason(err) });
    }
    return decodeSnapshot(this.parseJson(raw, saveId), saveId);
  }

  async list(sessionId: string): Promise<SaveSummary[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw new PersistenceError('Could not list saves', { cause: reason(err) });
    }

    const summaries: SaveSummary[] = [];
    for (const name of names.filter((n) => n.endsWith('.json'))) {
      const snapshot = await this.read(name.slice(0, -'.json'.length));
      if (snapshot && snapshot.sessionId === sessionId) {
        summaries.push(summarize(snapshot));
      }
    }
    return summaries.sort((a, b) => b.savedAt.localeCompare(a.savedAt));
  }

  private pathOf(saveId: string): string {
    if (!SAVE_ID.test(saveId)) {
      throw new PersistenceError('Invalid save id', { saveId });
    }
    return join(this.dir, `${saveId}.json`);
  }

  private parseJson(raw: string, saveId: string): unknown {
    try {
      return JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError('Save file is not valid JSON', { saveId, cause: reason(err) });
    }
  }
}
