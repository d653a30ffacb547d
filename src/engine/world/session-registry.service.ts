import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { GameState } from '../../db/types/index.js';
import { ForbiddenError, NotFoundError } from '../../common/errors/game-errors.js';
import { WorldStateStore } from './world-state.store.js';
import { TurnGate } from '../turn/turn-gate.js';

export interface GameSession {
  sessionId: string;
  playerId: string;
  store: WorldStateStore;
  gate: TurnGate;
  createdAt: Date;
}

/** Live sessions, in memory. Saves are how a session outlives the process. */
@Injectable()
export class SessionRegistryService {
  private readonly logger = new Logger(SessionRegistryService.name);
  private readonly sessions = new Map<string, GameSession>();

  open(playerId: string, state: GameState, sessionId: string = randomUUID()): GameSession {
    const session: GameSession = {
      sessionId,
      playerId,
      store: new WorldStateStore(state),
      gate: new TurnGate(),
      createdAt: new Date(),
    };
    this.sessions.set(sessionId, session);
    this.logger.log(`Session ${sessionId} opened for ${playerId} at v${state.world.version}`);
    return session;
  }

  /** Looks a session up and checks that `playerId` owns it. */
  get(sessionId: string, playerId: string): GameSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError('Session not found', { sessionId });
    }
    if (session.playerId !== playerId) {
      throw new ForbiddenError('Session belongs to another player', { sessionId });
    }
    return session;
  }

  close(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
