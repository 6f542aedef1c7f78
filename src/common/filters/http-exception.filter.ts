import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { StorageUnavailableError } from '../errors/storage.errors';

type DisplayType = 'error' | 'warning' | 'info';

const ERROR_TYPES: Partial<Record<number, { type: string; display: DisplayType }>> = {
  [HttpStatus.BAD_REQUEST]: { type: 'VALIDATION_ERROR', display: 'warning' },
  [HttpStatus.UNAUTHORIZED]: { type: 'UNAUTHORIZED', display: 'error' },
  [HttpStatus.FORBIDDEN]: { type: 'FORBIDDEN', display: 'error' },
  [HttpStatus.NOT_FOUND]: { type: 'NOT_FOUND', display: 'warning' },
  [HttpStatus.CONFLICT]: { type: 'CONFLICT', display: 'warning' },
  [HttpStatus.SERVICE_UNAVAILABLE]: { type: 'SERVICE_UNAVAILABLE', display: 'error' },
};

/**
 * Pulls a readable message out of an HttpException response body. Validation
 * pipe errors carry an array of messages; repeats are dropped.
 */
export function extractMessage(exceptionResponse: string | object, fallback: string): string {
  if (typeof exceptionResponse === 'string') {
    return exceptionResponse;
  }
  if ('message' in exceptionResponse) {
    const { message } = exceptionResponse;
    if (Array.isArray(message)) {
      const parts = message.filter((part): part is string => typeof part === 'string');
      if (parts.length > 0) {
        return [...new Set(parts)].join('; ');
      }
    } else if (typeof message === 'string' && message) {
      return message;
    }
  }
  return fallback || 'An error occurred';
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = extractMessage(exception.getResponse(), exception.message);
    } else if (exception instanceof StorageUnavailableError) {
      status = HttpStatus.SERVICE_UNAVAILABLE;
      message = 'Service unavailable - storage not reachable';
    } else if (exception instanceof Error) {
      this.logger.error(`❌ Unhandled error on ${request.method} ${request.url}`, exception.stack);
      message = exception.message || 'An error occurred';
    }

    const { type, display } = ERROR_TYPES[status] ?? {
      type: 'INTERNAL_ERROR',
      display: 'error',
    };

    // Format response with metadata for client notification display
    response.status(status).json({
      success: false,
      error: {
        type,
        statusCode: status,
        message,
        displayType: display,
        timestamp: new Date().toISOString(),
        path: request.url,
        method: request.method,
      },
    });
  }
}
