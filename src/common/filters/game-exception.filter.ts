import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { GameError } from '../errors/game-errors.js';

export interface ErrorBody {
  code: string;
  message: string;
  details: unknown;
}

/** Maps any thrown value onto the `{ code, message, details }` error body. */
export function toErrorBody(exception: unknown): { status: number; body: ErrorBody } {
  if (exception instanceof GameError) {
    return {
      status: exception.httpStatus,
      body: {
        code: exception.code,
        message: exception.message,
        details: exception.details ?? null,
      },
    };
  }

  if (exception instanceof HttpException) {
    const body = exception.getResponse();
    let message = exception.message;
    if (typeof body === 'string') {
      message = body;
    } else if ('message' in body && typeof body.message === 'string') {
      message = body.message;
    }
    return {
      status: exception.getStatus(),
      body: {
        code: 'HTTP_ERROR',
        message,
        details: typeof body === 'object' ? body : null,
      },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { code: 'INTERNAL_ERROR', message: 'Internal server error', details: null },
  };
}

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = toErrorBody(exception);

    if (status >= 500) {
      this.logger.error(`${body.code}: ${body.message}`, exception instanceof Error ? exception.stack : undefined);
    }
    res.status(status).json(body);
  }
}
