import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { SAVE_FORMAT_VERSION, summarize } from '../db/types/index.js';
import type { SaveSnapshot, SaveSummary } from '../db/types/index.js';
import { ForbiddenError, NotFoundError, PersistenceError } from '../common/errors/game-errors.js';
import type { GameSession } from '../engine/world/session-registry.service.js';
import { SaveStore } from './save-store.js';

export interface LoadOptions {
  /** load even when the live session has moved past the save */
  force?: boolean;
}

@Injectable()
export class SaveService {
  private readonly logger = new Logger(SaveService.name);

  constructor(private readonly store: SaveStore) {}

  /** Snapshots the session's committed state. Callers hold the session's turn gate. */
  async save(session: GameSession, now: Date = new Date()): Promise<SaveSummary> {
    const state = session.store.read();
    const snapshot: SaveSnapshot = {
      formatVersion: SAVE_FORMAT_VERSION,
      saveId: randomUUID(),
      sessionId: session.sessionId,
      playerId: session.playerId,
      worldVersion: state.world.version,
      savedAt: now.toISOString(),
      state: structuredClone(state),
    };
    await this.store.write(snapshot);
    this.logger.log(`Saved ${session.sessionId} v${snapshot.worldVersion} as ${snapshot.saveId} (${this.store.backend})`);
    return summarize(snapshot);
  }

  list(session: GameSession): Promise<SaveSummary[]> {
    return this.store.list(session.sessionId);
  }

  /** Reads a save owned by `playerId`. */
  async fetch(saveId: string, playerId: string): Promise<SaveSnapshot> {
    const snapshot = await this.store.read(saveId);
    if (!snapshot) {
      throw new NotFoundError('Save not found', { saveId });
    }
    if (snapshot.playerId !== playerId) {
      throw new ForbiddenError('Save belongs to another player', { saveId });
    }
    return snapshot;
  }

  /**
   * Replaces the live state with a save. A save older than the live state
   * is refused unless `force` is set. Callers hold the session's turn gate.
   */
  async load(session: GameSession, saveId: string, options: LoadOptions = {}): Promise<SaveSummary> {
    const snapshot = await this.fetch(saveId, session.playerId);
    const liveVersion = session.store.version;

    if (snapshot.worldVersion < liveVersion && !options.force) {
      this.logger.warn(`Refused stale save ${saveId}: v${snapshot.worldVersion} < live v${liveVersion}`);
      throw new PersistenceError('Save is older than the live session', {
        reason: 'STALE_SAVE',
        saveVersion: snapshot.worldVersion,
        liveVersion,
      });
    }

    session.store.restore(snapshot.state);
    this.logger.log(`Loaded ${saveId} into ${session.sessionId} at v${snapshot.worldVersion}`);
    return summarize(snapshot);
  }
}
