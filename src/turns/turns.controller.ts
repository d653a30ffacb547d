import { Body, Controller, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { PlayerGuard } from '../common/guards/player.guard.js';
import { PlayerId } from '../common/decorators/player-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { TurnsService } from './turns.service.js';
import { SubmitTurnBodySchema, type SubmitTurnBody } from './dto/submit-turn.dto.js';

@Controller('v1/sessions/:sessionId/turns')
@UseGuards(PlayerGuard)
export class TurnsController {
  constructor(private readonly turnsService: TurnsService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async submitTurn(
    @Param('sessionId') sessionId: string,
    @PlayerId() playerId: string,
    @Body(new ZodValidationPipe(SubmitTurnBodySchema)) body: SubmitTurnBody,
  ) {
    return this.turnsService.submitTurn(sessionId, playerId, body.text);
  }

  @Post('cancel')
  @HttpCode(HttpStatus.OK)
  async cancel(@Param('sessionId') sessionId: string, @PlayerId() playerId: string) {
    return this.turnsService.cancel(sessionId, playerId);
  }
}
