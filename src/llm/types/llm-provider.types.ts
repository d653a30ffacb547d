// LLM provider strategy. Messages use the OpenAI shape; each provider
// converts them to its own API inside generate().

export const LLM_PROVIDERS = ['mock', 'openai', 'claude', 'gemini'] as const;
export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmProviderRequest {
  messages: LlmMessage[];
  maxTokens: number;
  temperature: number;
  model?: string;
  /** aborted by the gateway when the call runs past its timeout */
  signal?: AbortSignal;
}

export interface LlmProviderResponse {
  text: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  latencyMs: number;
}

export interface LlmProvider {
  readonly name: LlmProviderName;
  generate(request: LlmProviderRequest): Promise<LlmProviderResponse>;
  isAvailable(): boolean;
}

export interface LlmConfig {
  provider: LlmProviderName;
  openaiApiKey: string;
  openaiModel: string;
  claudeApiKey: string;
  claudeModel: string;
  geminiApiKey: string;
  geminiModel: string;
  /** extra attempts after the first one, per turn */
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}
