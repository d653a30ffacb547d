// AI Gateway: one model call with timeout, error classification and an attempt log.
// No retries and no game semantics; the Turn Orchestrator owns both.

import { Injectable, Logger } from '@nestjs/common';
import { GatewayError, type GatewayErrorKind } from '../common/errors/game-errors.js';
import { LlmConfigService } from './llm-config.service.js';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { AiTurnLogService } from './ai-turn-log.service.js';
import type { LlmConfig, LlmMessage } from './types/index.js';
import type { PromptPayload } from './prompts/prompt-builder.service.js';

export interface GatewayCallContext {
  sessionId: string;
  worldVersion: number;
  /** 1-based attempt number within the turn */
  attempt: number;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/** The model named in the live settings, so a settings change applies from the next call. */
function modelFor(config: LlmConfig): string | undefined {
  switch (config.provider) {
    case 'openai':
      return config.openaiModel;
    case 'claude':
      return config.claudeModel;
    case 'gemini':
      return config.geminiModel;
    case 'mock':
      return undefined;
  }
}

/** Maps whatever a provider SDK threw onto the four gateway failure kinds. */
export function classifyGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;

  const status = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);
  const lowered = `${err instanceof Error ? err.name : ''} ${message}`.toLowerCase();

  let kind: GatewayErrorKind = 'ServiceUnavailable';
  if (status === 401 || status === 403) {
    kind = 'AuthFailure';
  } else if (status === 429 || lowered.includes('rate limit')) {
    kind = 'RateLimited';
  } else if (status === 408 || status === 504 || /timed? ?out|aborterror/.test(lowered)) {
    kind = 'Timeout';
  }
  return new GatewayError(kind, message, status === undefined ? undefined : { status });
}

@Injectable()
export class AiGatewayService {
  private readonly logger = new Logger(AiGatewayService.name);

  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
    private readonly turnLog: AiTurnLogService,
  ) {}

  /**
   * Sends the payload, with the schema hint as an extra system message, to
   * the configured provider. Resolves with the raw reply text or rejects
   * with a GatewayError.
   */
  async generate(payload: PromptPayload, schemaHint: string, context: GatewayCallContext): Promise<string> {
    const config = this.configService.get();
    const provider = this.registry.getPrimary();
    const messages: LlmMessage[] = [
      ...payload.messages.filter((m) => m.role === 'system'),
      { role: 'system', content: schemaHint },
      ...payload.messages.filter((m) => m.role !== 'system'),
    ];

    try {
      if (!provider.isAvailable()) {
        throw new GatewayError('AuthFailure', `Provider "${provider.name}" has no credentials`);
      }
      const response = await this.withTimeout(
        (signal) =>
          provider.generate({
            messages,
            model: modelFor(config),
            maxTokens: config.maxTokens,
            temperature: config.temperature,
            signal,
          }),
        config.timeoutMs,
      );
      await this.turnLog.log({ ...context, provider: provider.name, messages, response });
      return response.text;
    } catch (err) {
      const error = classifyGatewayError(err);
      this.logger.warn(
        `${provider.name} attempt ${context.attempt} failed (${error.kind}): ${error.message}`,
      );
      await this.turnLog.log({ ...context, provider: provider.name, messages, error: `${error.kind}: ${error.message}` });
      throw error;
    }
  }

  private async withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // reject first so the race settles as Timeout, not as the abort it triggers
        reject(new GatewayError('Timeout', `AI call exceeded ${timeoutMs}ms`, { timeoutMs }));
        controller.abort();
      }, timeoutMs);
    });
    try {
      return await Promise.race([work(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
