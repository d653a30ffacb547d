// LLM provider registry: strategy lookup by configured name

import { Injectable, Logger } from '@nestjs/common';
import type { LlmProvider, LlmProviderName } from '../types/index.js';
import { LlmConfigService } from '../llm-config.service.js';
import { ConfigurationError } from '../../common/errors/game-errors.js';

@Injectable()
export class LlmProviderRegistryService {
  private readonly logger = new Logger(LlmProviderRegistryService.name);
  private readonly providers = new Map<LlmProviderName, LlmProvider>();

  constructor(private readonly configService: LlmConfigService) {}

  register(provider: LlmProvider): void {
    this.providers.set(provider.name, provider);
    this.logger.log(
      `Registered LLM provider: ${provider.name} (available: ${provider.isAvailable()})`,
    );
  }

  getPrimary(): LlmProvider {
    const name = this.configService.get().provider;
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ConfigurationError(`LLM provider "${name}" not registered`);
    }
    return provider;
  }
}
