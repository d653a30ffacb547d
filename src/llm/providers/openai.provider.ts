// OpenAI provider: openai SDK v4, Chat Completions in JSON mode

import OpenAI from 'openai';
import type {
  LlmConfig,
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';

export class OpenAIProvider implements LlmProvider {
  readonly name = 'openai';
  private client: OpenAI | null = null;

  constructor(private readonly config: LlmConfig) {}

  private getClient(): OpenAI {
    if (!this.client) {
      // retries and timeouts belong to the turn loop and the gateway
      this.client = new OpenAI({ apiKey: this.config.openaiApiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();
    const model = request.model ?? this.config.openaiModel;

    const completion = await this.getClient().chat.completions.create(
      {
        model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        response_format: { type: 'json_object' },
      },
      { signal: request.signal },
    );

    return {
      text: completion.choices[0]?.message?.content ?? '',
      model: completion.model,
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.config.openaiApiKey;
  }
}
