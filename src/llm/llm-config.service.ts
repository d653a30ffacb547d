// LLM settings: environment defaults, runtime patches from the settings API

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors/game-errors.js';
import { LLM_PROVIDERS, type LlmConfig, type LlmProviderName } from './types/index.js';

const LlmEnvSchema = z.object({
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('mock'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  CLAUDE_API_KEY: z.string().default(''),
  CLAUDE_MODEL: z.string().min(1).default('claude-sonnet-4-5-20250929'),
  GEMINI_API_KEY: z.string().default(''),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  LLM_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(8000),
  LLM_MAX_TOKENS: z.coerce.number().int().min(1).max(16384).default(1024),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.8),
});

/** Fields PATCH /v1/settings/llm may change. Keys stay env-only. */
export const LlmConfigPatchSchema = z
  .object({
    provider: z.enum(LLM_PROVIDERS),
    openaiModel: z.string().min(1),
    claudeModel: z.string().min(1),
    geminiModel: z.string().min(1),
    maxRetries: z.number().int().min(0).max(5),
    timeoutMs: z.number().int().min(100).max(120_000),
    maxTokens: z.number().int().min(1).max(16384),
    temperature: z.number().min(0).max(2),
  })
  .partial()
  .strict();

export type LlmConfigPatch = z.infer<typeof LlmConfigPatchSchema>;

/** GET response: API keys are reported as set / not set only */
export interface LlmConfigPublic {
  provider: LlmProviderName;
  openaiModel: string;
  openaiApiKeySet: boolean;
  claudeModel: string;
  claudeApiKeySet: boolean;
  geminiModel: string;
  geminiApiKeySet: boolean;
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
  availableProviders: LlmProviderName[];
}

export function parseLlmConfig(env: Record<string, string | undefined>): LlmConfig {
  const result = LlmEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError('Invalid LLM configuration', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  const e = result.data;
  return {
    provider: e.LLM_PROVIDER,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    claudeApiKey: e.CLAUDE_API_KEY,
    claudeModel: e.CLAUDE_MODEL,
    geminiApiKey: e.GEMINI_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    maxRetries: e.LLM_MAX_RETRIES,
    timeoutMs: e.LLM_TIMEOUT_MS,
    maxTokens: e.LLM_MAX_TOKENS,
    temperature: e.LLM_TEMPERATURE,
  };
}

@Injectable()
export class LlmConfigService implements OnModuleInit {
  private readonly logger = new Logger(LlmConfigService.name);
  private config: LlmConfig;

  constructor() {
    this.config = parseLlmConfig(process.env);
  }

  /** Refuses to start with a provider whose credentials are missing. */
  onModuleInit(): void {
    if (!this.hasCredentials(this.config.provider)) {
      throw new ConfigurationError(`LLM_PROVIDER is "${this.config.provider}" but its API key is not set`);
    }
  }

  get(): LlmConfig {
    return this.config;
  }

  update(patch: LlmConfigPatch): LlmConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`LLM config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }

  hasCredentials(provider: LlmProviderName): boolean {
    switch (provider) {
      case 'mock':
        return true;
      case 'openai':
        return !!this.config.openaiApiKey;
      case 'claude':
        return !!this.config.claudeApiKey;
      case 'gemini':
        return !!this.config.geminiApiKey;
    }
  }

  getPublic(): LlmConfigPublic {
    return {
      provider: this.config.provider,
      openaiModel: this.config.openaiModel,
      openaiApiKeySet: !!this.config.openaiApiKey,
      claudeModel: this.config.claudeModel,
      claudeApiKeySet: !!this.config.claudeApiKey,
      geminiModel: this.config.geminiModel,
      geminiApiKeySet: !!this.config.geminiApiKey,
      maxRetries: this.config.maxRetries,
      timeoutMs: this.config.timeoutMs,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
      availableProviders: LLM_PROVIDERS.filter((p) => this.hasCredentials(p)),
    };
  }
}
