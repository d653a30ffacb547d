// Mock provider: offline play and tests. Answers with a valid, effect-free
// proposal that narrates the player's command back.

import type {
  LlmProvider,
  LlmProviderRequest,
  LlmProviderResponse,
} from '../types/index.js';
import { COMMAND_HEADING } from '../prompts/system-prompts.js';

export class MockProvider implements LlmProvider {
  readonly name = 'mock';

  async generate(request: LlmProviderRequest): Promise<LlmProviderResponse> {
    const start = Date.now();

    const lastUserMsg = [...request.messages].reverse().find((m) => m.role === 'user');
    const command = this.extractCommand(lastUserMsg?.content ?? '');
    const text = JSON.stringify({
      narration: command
        ? `You ${command.replace(/[.!?]+$/, '')}. The world takes note, and waits.`
        : 'Nothing much happens.',
      effects: [],
    });

    return {
      text,
      model: 'mock-v1',
      promptTokens: 0,
      completionTokens: 0,
      latencyMs: Date.now() - start,
    };
  }

  isAvailable(): boolean {
    return true;
  }

  private extractCommand(content: string): string {
    const at = content.indexOf(COMMAND_HEADING);
    if (at < 0) return '';
    const [line = ''] = content.slice(at + COMMAND_HEADING.length).trim().split('\n');
    return line.trim();
  }
}
