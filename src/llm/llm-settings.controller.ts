// LLM settings API: switch provider / model at runtime

import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import { LlmConfigService, LlmConfigPatchSchema, type LlmConfigPatch } from './llm-config.service.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { BadRequestError } from '../common/errors/game-errors.js';
import { PlayerGuard } from '../common/guards/player.guard.js';

@Controller('v1/settings/llm')
@UseGuards(PlayerGuard)
export class LlmSettingsController {
  constructor(private readonly configService: LlmConfigService) {}

  @Get()
  getSettings() {
    return this.configService.getPublic();
  }

  /** Applies from the next AI call on; turns already in flight keep their settings. */
  @Patch()
  updateSettings(@Body(new ZodValidationPipe(LlmConfigPatchSchema)) body: LlmConfigPatch) {
    if (body.provider && !this.configService.hasCredentials(body.provider)) {
      throw new BadRequestError(
        `Cannot switch to "${body.provider}": API key not configured in .env`,
      );
    }

    this.configService.update(body);

    return {
      message: 'LLM settings updated. Changes apply to the next AI call.',
      ...this.configService.getPublic(),
    };
  }
}
