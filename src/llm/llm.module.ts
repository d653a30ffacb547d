import { Module, type OnModuleInit } from '@nestjs/common';
import { LlmConfigService } from './llm-config.service.js';
import { PromptBuilderService } from './prompts/prompt-builder.service.js';
import { ResponseValidatorService } from './response/response-validator.service.js';
import { AiGatewayService } from './ai-gateway.service.js';
import { AiTurnLogService } from './ai-turn-log.service.js';
import { LlmProviderRegistryService } from './providers/llm-provider-registry.service.js';
import { LlmSettingsController } from './llm-settings.controller.js';
import { ClaudeProvider, GeminiProvider, MockProvider, OpenAIProvider } from './providers/index.js';
import { EngineModule } from '../engine/engine.module.js';

@Module({
  imports: [EngineModule],
  controllers: [LlmSettingsController],
  providers: [
    LlmConfigService,
    LlmProviderRegistryService,
    PromptBuilderService,
    ResponseValidatorService,
    AiGatewayService,
    AiTurnLogService,
  ],
  exports: [LlmConfigService, PromptBuilderService, ResponseValidatorService, AiGatewayService],
})
export class LlmModule implements OnModuleInit {
  constructor(
    private readonly registry: LlmProviderRegistryService,
    private readonly configService: LlmConfigService,
  ) {}

  onModuleInit(): void {
    const config = this.configService.get();

    this.registry.register(new MockProvider());
    this.registry.register(new OpenAIProvider(config));
    this.registry.register(new ClaudeProvider(config));
    this.registry.register(new GeminiProvider(config));
  }
}
