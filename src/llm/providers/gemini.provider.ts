// Gemini provider: @google/genai SDK
//
// - role assistant → model
// - system messages → systemInstruction
// - JSON output requested through responseMimeType

import { GoogleGenAI } from '@google/genai';
import type {
  LlmConfig,
  LlmMessage,
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';

export class GeminiProvider implements LlmProvider {
  readonly name = 'gemini';
  private client: GoogleGenAI | null = null;

  constructor(private readonly config: LlmConfig) {}

  private getClient(): GoogleGenAI {
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.config.geminiApiKey });
    }
    return this.client;
  }

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();
    const model = request.model ?? this.config.geminiModel;

    const systemMessages = request.messages.filter((m) => m.role === 'system');
    const contents = request.messages
      .filter((m) => m.role !== 'system')
      .map((m: LlmMessage) => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      }));
    const systemInstruction =
      systemMessages.length > 0 ? systemMessages.map((m) => m.content).join('\n\n') : undefined;

    const response = await this.getClient().models.generateContent({
      model,
      contents,
      config: {
        maxOutputTokens: request.maxTokens,
        temperature: request.temperature,
        responseMimeType: 'application/json',
        ...(systemInstruction ? { systemInstruction } : {}),
      },
    });

    const usage = response.usageMetadata;
    return {
      text: response.text ?? '',
      model,
      promptTokens: usage?.promptTokenCount ?? 0,
      completionTokens: usage?.candidatesTokenCount ?? 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return !!this.config.geminiApiKey;
  }
}
