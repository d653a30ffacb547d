import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { PlayerGuard } from '../common/guards/player.guard.js';
import { PlayerId } from '../common/decorators/player-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { SessionsService } from './sessions.service.js';
import { CreateSessionBodySchema, type CreateSessionBody } from './dto/create-session.dto.js';
import { LoadSaveBodySchema, type LoadSaveBody } from './dto/load-save.dto.js';

@Controller('v1/sessions')
@UseGuards(PlayerGuard)
export class SessionsController {
  constructor(private readonly sessionsService: SessionsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @PlayerId() playerId: string,
    @Body(new ZodValidationPipe(CreateSessionBodySchema)) body: CreateSessionBody,
  ) {
    return this.sessionsService.create(playerId, body);
  }

  @Get(':sessionId')
  get(@Param('sessionId') sessionId: string, @PlayerId() playerId: string) {
    return this.sessionsService.get(sessionId, playerId);
  }

  @Delete(':sessionId')
  close(@Param('sessionId') sessionId: string, @PlayerId() playerId: string) {
    return this.sessionsService.close(sessionId, playerId);
  }

  @Get(':sessionId/journal')
  journal(@Param('sessionId') sessionId: string, @PlayerId() playerId: string) {
    return this.sessionsService.journal(sessionId, playerId);
  }

  @Post(':sessionId/saves')
  @HttpCode(HttpStatus.CREATED)
  async save(@Param('sessionId') sessionId: string, @PlayerId() playerId: string) {
    return this.sessionsService.save(sessionId, playerId);
  }

  @Get(':sessionId/saves')
  async listSaves(@Param('sessionId') sessionId: string, @PlayerId() playerId: string) {
    return this.sessionsService.listSaves(sessionId, playerId);
  }

  @Post(':sessionId/saves/:saveId/load')
  @HttpCode(HttpStatus.OK)
  async load(
    @Param('sessionId') sessionId: string,
    @Param('saveId', ParseUUIDPipe) saveId: string,
    @PlayerId() playerId: string,
    @Body(new ZodValidationPipe(LoadSaveBodySchema)) body: LoadSaveBody,
  ) {
    return this.sessionsService.load(sessionId, playerId, saveId, body.force);
  }
}
