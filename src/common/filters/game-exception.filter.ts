import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { GameError } from '../errors/game-errors.js';

export type ErrorBody = {
  code: string;
  message: string;
  details: unknown;
  path: string;
};

/** 모든 예외 → { code, message, details, path } */
@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const { status, body } = this.toErrorBody(exception, req.originalUrl);

    if (status >= 500) {
      this.logger.error(
        `${req.method} ${body.path} → ${status} ${body.code}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(`${req.method} ${body.path} → ${status} ${body.code}: ${body.message}`);
    }

    res.status(status).json(body);
  }

  toErrorBody(exception: unknown, path: string): { status: number; body: ErrorBody } {
    if (exception instanceof GameError) {
      return {
        status: exception.httpStatus,
        body: {
          code: exception.code,
          message: exception.message,
          details: exception.details ?? null,
          path,
        },
      };
    }

    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      return {
        status: exception.getStatus(),
        body: {
          code: 'HTTP_ERROR',
          message: exception.message,
          details: typeof response === 'object' ? response : null,
          path,
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
        details: null,
        path,
      },
    };
  }
}
