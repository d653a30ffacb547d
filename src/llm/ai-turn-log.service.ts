// AI turn log: one ai_turn_logs row per gateway attempt (postgres only)

import { Inject, Injectable, Logger } from '@nestjs/common';
import { DB, type OptionalDB } from '../db/drizzle.module.js';
import { aiTurnLogs } from '../db/schema/index.js';
import type { LlmMessage, LlmProviderResponse } from './types/index.js';

export interface AiTurnLogEntry {
  sessionId: string;
  worldVersion: number;
  attempt: number;
  provider: string;
  response?: LlmProviderResponse;
  messages?: LlmMessage[];
  error?: string;
}

@Injectable()
export class AiTurnLogService {
  private readonly logger = new Logger(AiTurnLogService.name);

  constructor(@Inject(DB) private readonly db: OptionalDB) {}

  /** Never throws; insert failures are only logged. */
  async log(entry: AiTurnLogEntry): Promise<void> {
    if (!this.db) return;
    try {
      await this.db.insert(aiTurnLogs).values({
        sessionId: entry.sessionId,
        worldVersion: entry.worldVersion,
        attempt: entry.attempt,
        provider: entry.provider,
        modelUsed: entry.response?.model ?? null,
        promptTokens: entry.response?.promptTokens ?? null,
        completionTokens: entry.response?.completionTokens ?? null,
        latencyMs: entry.response?.latencyMs ?? null,
        rawPrompt: entry.messages ? JSON.stringify(entry.messages) : null,
        rawCompletion: entry.response?.text ?? null,
        error: entry.error ? { error: entry.error } : null,
      });
    } catch (err) {
      this.logger.error(
        `Failed to log AI turn: session=${entry.sessionId} v${entry.worldVersion} attempt=${entry.attempt}`,
        err instanceof Error ? err.stack : String(err),
      );
    }
  }
}
