import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { PlayerRequest } from '../guards/player.guard.js';
import { UnauthorizedError } from '../errors/game-errors.js';

export const PlayerId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<PlayerRequest>();
    if (!req.playerId) throw new UnauthorizedError('No player on request');
    return req.playerId;
  },
);
