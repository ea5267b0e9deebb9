import { FastifyReply } from 'fastify';
import type { Result } from 'neverthrow';
import type { ServiceErrorResponse, ServiceResponse } from '../types';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

export class BaseController {
  protected log = logger;

  protected handleError(error: unknown, reply: FastifyReply): FastifyReply {
    const appError = error instanceof AppError ? error : null;
    const statusCode = appError ? appError.statusCode : 500;

    if (statusCode >= 500) {
      this.log.error('Controller error', { error });
    } else {
      this.log.warn('Request rejected', { code: appError?.code, message: appError?.message });
    }

    const body: ServiceErrorResponse = {
      success: false,
      error: {
        message: appError ? appError.message : 'Internal Server Error',
        code: appError ? appError.code : 'INTERNAL_ERROR',
        statusCode,
        ...(appError?.detail ? { detail: appError.detail } : {}),
      },
      timestamp: new Date().toISOString(),
    };

    return reply.code(statusCode).send(body);
  }

  protected success<T>(reply: FastifyReply, data: T, message?: string, status: number = 200): FastifyReply {
    const body: ServiceResponse<T> = {
      success: true,
      data,
      timestamp: new Date().toISOString(),
      ...(message ? { message } : {}),
    };
    return reply.code(status).send(body);
  }

  protected respond<T>(reply: FastifyReply, result: Result<T, AppError>, message: string): FastifyReply {
    return result.match(
      (data) => this.success(reply, data, message),
      (error) => this.handleError(error, reply)
    );
  }
}
