import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

/**
 * Error response structure
 */
interface ErrorResponse {
  statusCode: number;
  timestamp: string;
  path: string;
  method: string;
  message: string | string[];
  error?: string;
  details?: unknown;
}

interface DescribedException {
  status: number;
  message: string | string[];
  error?: string;
  details?: unknown;
  retryAfter?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readMessage(value: unknown): string | string[] | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) {
    return value;
  }
  return undefined;
}

export function describeException(exception: unknown): DescribedException {
  if (!(exception instanceof HttpException)) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      message:
        exception instanceof Error
          ? exception.message
          : 'An unexpected error occurred',
      error: 'Internal Server Error',
    };
  }

  const status = exception.getStatus();
  const body = exception.getResponse();
  if (!isRecord(body)) {
    return { status, message: String(body) };
  }

  return {
    status,
    message: readMessage(body.message) ?? exception.message,
    error: typeof body.error === 'string' ? body.error : undefined,
    details: body.details,
    retryAfter: typeof body.retryAfter === 'number' ? body.retryAfter : undefined,
  };
}

/**
 * The unit of work a failure belongs to, for the log line
 */
function failureScope(details: unknown): string {
  if (!isRecord(details)) return '';
  const parts = ['segmentId', 'queryId', 'fingerprint']
    .filter((key) => typeof details[key] === 'string')
    .map((key) => `${key}=${String(details[key])}`);
  return parts.length > 0 ? ` [${parts.join(' ')}]` : '';
}

/**
 * Global HTTP exception filter for consistent error responses
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const { status, message, error, details, retryAfter } =
      describeException(exception);

    if (!(exception instanceof HttpException) && exception instanceof Error) {
      this.logger.error(`Unexpected error: ${exception.message}`, exception.stack);
    }

    // rate limits and unavailable upstreams tell the caller when to come back
    if (
      retryAfter !== undefined &&
      (status === HttpStatus.TOO_MANY_REQUESTS ||
        status === HttpStatus.SERVICE_UNAVAILABLE)
    ) {
      response.setHeader('Retry-After', String(retryAfter));
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message,
    };
    if (error) {
      errorResponse.error = error;
    }
    if (details !== undefined) {
      errorResponse.details = details;
    }

    const line = `${request.method} ${request.url} - ${status} - ${JSON.stringify(message)}${failureScope(details)}`;
    if (status >= 500) {
      this.logger.error(line);
    } else {
      this.logger.warn(line);
    }

    response.status(status).json(errorResponse);
  }
}
