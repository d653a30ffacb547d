import { type CanActivate, type ExecutionContext, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { Request } from 'express';
import { UnauthorizedError } from '../errors/game-errors.js';

export interface PlayerRequest extends Request {
  playerId?: string;
}

interface PlayerTokenPayload {
  sub: string;
}

/**
 * Resolves the calling player from a Bearer token (`sub` claim). Outside
 * production an `x-player-id` header is accepted too, for local play.
 */
@Injectable()
export class PlayerGuard implements CanActivate {
  constructor(private readonly jwtService: JwtService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<PlayerRequest>();

    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      const token = authHeader.slice(7);
      let payload: PlayerTokenPayload;
      try {
        payload = this.jwtService.verify<PlayerTokenPayload>(token);
      } catch {
        throw new UnauthorizedError('Invalid or expired token');
      }
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw new UnauthorizedError('Token has no subject');
      }
      req.playerId = payload.sub;
      return true;
    }

    if (process.env.NODE_ENV !== 'production') {
      const playerId = req.headers['x-player-id'];
      if (typeof playerId === 'string' && playerId.length > 0) {
        req.playerId = playerId;
        return true;
      }
    }

    throw new UnauthorizedError('Authorization header with Bearer token is required');
  }
}
