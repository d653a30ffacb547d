import { LlmConfigService, LlmConfigPatchSchema, parseLlmConfig } from './llm-config.service.js';
import { ConfigurationError } from '../common/errors/game-errors.js';

describe('parseLlmConfig', () => {
  it('falls back to the mock provider with two retries', () => {
    const config = parseLlmConfig({});

    expect(config.provider).toBe('mock');
    expect(config.maxRetries).toBe(2);
    expect(config.timeoutMs).toBe(8000);
    expect(config.temperature).toBe(0.8);
  });

  it('coerces numeric variables', () => {
    const config = parseLlmConfig({ LLM_TIMEOUT_MS: '2500', LLM_MAX_RETRIES: '0' });

    expect(config.timeoutMs).toBe(2500);
    expect(config.maxRetries).toBe(0);
  });

  it('rejects an unknown provider', () => {
    expect(() => parseLlmConfig({ LLM_PROVIDER: 'oracle' })).toThrow(ConfigurationError);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => parseLlmConfig({ LLM_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
  });
});

describe('LlmConfigService', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('refuses to start when the selected provider has no key', () => {
    process.env = { ...saved, LLM_PROVIDER: 'openai', OPENAI_API_KEY: '' };
    const service = new LlmConfigService();

    expect(() => service.onModuleInit()).toThrow(ConfigurationError);
  });

  it('masks keys in the public view', () => {
    process.env = { ...saved, LLM_PROVIDER: 'claude', CLAUDE_API_KEY: 'test-secret', OPENAI_API_KEY: '', GEMINI_API_KEY: '' };
    const service = new LlmConfigService();
    service.onModuleInit();

    const view = service.getPublic();
    expect(view.claudeApiKeySet).toBe(true);
    expect(view.availableProviders).toEqual(['mock', 'claude']);
    expect(JSON.stringify(view)).not.toContain('test-secret');
  });

  it('accepts only known fields in a patch', () => {
    expect(LlmConfigPatchSchema.safeParse({ temperature: 0.2 }).success).toBe(true);
    expect(LlmConfigPatchSchema.safeParse({ openaiApiKey: 'test-secret' }).success).toBe(false);
  });
});
