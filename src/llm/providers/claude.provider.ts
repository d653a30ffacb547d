// Claude provider: @anthropic-ai/sdk
//
// - system messages → top-level `system` parameter
// - only user/assistant turns go in `messages`
// - text blocks of the reply are concatenated

import Anthropic from '@anthropic-ai/sdk';
import type {
  LlmConfig,
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';

export class ClaudeProvider implements LlmProvider {
  readonly name = 'claude';
  private client: Anthropic | null = null;

  constructor(private readonly config: LlmConfig) {}

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.config.claudeApiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();
    const model = request.model ?? this.config.claudeModel;

    const system = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const messages = request.messages
      .filter((m) => m.role !== 'system')
      .map(
        (m): Anthropic.Messages.MessageParam => ({
          role: m.role === 'assistant' ? 'assistant' : 'user',
          content: m.content,
        }),
      );

    const message = await this.getClient().messages.create(
      {
        model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        ...(system ? { system } : {}),
        messages,
      },
      { signal: request.signal },
    );

    const text = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      text,
      model: message.model,
      promptTokens: message.usage.input_tokens,
      completionTokens: message.usage.output_tokens,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.config.claudeApiKey;
  }
}
