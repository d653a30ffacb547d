import { AiGatewayService, classifyGatewayError } from './ai-gateway.service.js';
import { AiTurnLogService } from './ai-turn-log.service.js';
import { LlmConfigService } from './llm-config.service.js';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { MockProvider } from './providers/mock.provider.js';
import { GatewayError } from '../common/errors/game-errors.js';
import type { LlmProvider, LlmProviderRequest, LlmProviderResponse } from './types/index.js';
import type { PromptPayload } from './prompts/prompt-builder.service.js';

const PAYLOAD: PromptPayload = {
  messages: [
    { role: 'system', content: 'narrator' },
    { role: 'user', content: '[Current location]\nForge\n\n[Player command]\nwave at the smith' },
  ],
  userMessage: '[Current location]\nForge\n\n[Player command]\nwave at the smith',
  charCount: 0,
  droppedDialogueTurns: 0,
  droppedQuestSummaries: 0,
  withinBudget: true,
  inScopeNpcIds: [],
};

const CONTEXT = { sessionId: 'session-1', worldVersion: 3, attempt: 1 };

function fakeProvider(generate: (request: LlmProviderRequest) => Promise<LlmProviderResponse>): LlmProvider {
  return { name: 'mock', isAvailable: () => true, generate: jest.fn(generate) };
}

function ok(text: string): LlmProviderResponse {
  return { text, model: 'fake', promptTokens: 1, completionTokens: 1, latencyMs: 1 };
}

describe('AiGatewayService', () => {
  let config: LlmConfigService;
  let registry: LlmProviderRegistryService;
  let gateway: AiGatewayService;

  beforeEach(() => {
    config = new LlmConfigService();
    config.update({ provider: 'mock', timeoutMs: 30 });
    registry = new LlmProviderRegistryService(config);
    gateway = new AiGatewayService(registry, config, new AiTurnLogService(null));
  });

  it('puts the schema hint after the narrator prompt and returns the raw text', async () => {
    const provider = fakeProvider(async () => ok('{"narration":"hi","effects":[]}'));
    registry.register(provider);

    await expect(gateway.generate(PAYLOAD, 'schema', CONTEXT)).resolves.toBe('{"narration":"hi","effects":[]}');
    expect(provider.generate).toHaveBeenCalledWith(
      expect.objectContaining({
        messages: [
          { role: 'system', content: 'narrator' },
          { role: 'system', content: 'schema' },
          PAYLOAD.messages[1],
        ],
      }),
    );
  });

  it('turns a call that outlives the timeout into GatewayError{Timeout} and aborts it', async () => {
    let aborted = false;
    registry.register(
      fakeProvider(
        (request) =>
          new Promise<LlmProviderResponse>((_, reject) => {
            request.signal?.addEventListener('abort', () => {
              aborted = true;
              reject(new Error('aborted'));
            });
          }),
      ),
    );

    const call = gateway.generate(PAYLOAD, 'schema', CONTEXT);
    await expect(call).rejects.toBeInstanceOf(GatewayError);
    await expect(call).rejects.toMatchObject({ kind: 'Timeout' });
    expect(aborted).toBe(true);
  });

  it('classifies provider failures', async () => {
    registry.register(
      fakeProvider(async () => {
        throw Object.assign(new Error('Too many requests'), { status: 429 });
      }),
    );

    await expect(gateway.generate(PAYLOAD, 'schema', CONTEXT)).rejects.toMatchObject({ kind: 'RateLimited' });
  });

  it('reports a provider without credentials as AuthFailure', async () => {
    registry.register({ ...fakeProvider(async () => ok('')), isAvailable: () => false });

    await expect(gateway.generate(PAYLOAD, 'schema', CONTEXT)).rejects.toMatchObject({ kind: 'AuthFailure' });
  });

  it('answers with a valid empty proposal through the mock provider', async () => {
    registry.register(new MockProvider());

    const text = await gateway.generate(PAYLOAD, 'schema', CONTEXT);
    expect(JSON.parse(text)).toEqual({
      narration: 'You wave at the smith. The world takes note, and waits.',
      effects: [],
    });
  });
});

describe('classifyGatewayError', () => {
  it.each([
    [{ status: 401 }, 'AuthFailure'],
    [{ status: 403 }, 'AuthFailure'],
    [{ status: 429 }, 'RateLimited'],
    [{ status: 504 }, 'Timeout'],
    [{ status: 500 }, 'ServiceUnavailable'],
    [{ status: 503 }, 'ServiceUnavailable'],
  ])('status %j → %s', (shape, kind) => {
    expect(classifyGatewayError(Object.assign(new Error('failed'), shape)).kind).toBe(kind);
  });

  it('recognizes SDK timeout messages', () => {
    expect(classifyGatewayError(new Error('Request timed out.')).kind).toBe('Timeout');
  });

  it('treats anything else as ServiceUnavailable', () => {
    expect(classifyGatewayError(new Error('socket hang up')).kind).toBe('ServiceUnavailable');
    expect(classifyGatewayError('weird').kind).toBe('ServiceUnavailable');
  });

  it('passes GatewayErrors through', () => {
    const err = new GatewayError('AuthFailure', 'no key');
    expect(classifyGatewayError(err)).toBe(err);
  });
});
