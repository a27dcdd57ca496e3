import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import type { AuthenticatedRequest } from '../auth/interfaces/authenticated-request';
import { ERROR_CODES, type ErrorCode } from '../common/http/error-codes';
import type { ErrorResponseBody } from '../common/http/error-response';
import { JsonLogger } from './json-logger.service';

export function errorCodeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case HttpStatus.UNAUTHORIZED:
      return ERROR_CODES.UNAUTHENTICATED;
    case HttpStatus.FORBIDDEN:
      return ERROR_CODES.FORBIDDEN;
    case HttpStatus.NOT_FOUND:
      return ERROR_CODES.NOT_FOUND;
    case HttpStatus.CONFLICT:
      return ERROR_CODES.CONFLICT;
    case HttpStatus.BAD_REQUEST:
    case HttpStatus.UNPROCESSABLE_ENTITY:
      return ERROR_CODES.VALIDATION_FAILED;
    default:
      return statusCode < 500 ? ERROR_CODES.BAD_REQUEST : ERROR_CODES.INTERNAL;
  }
}

/**
 * Status written to the client. Bad input is always 422, including the 400s
 * raised outside ValidationPipe (e.g. a body that is not valid JSON).
 */
export function responseStatusFor(exception: unknown): number {
  if (!(exception instanceof HttpException)) {
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }
  const status = exception.getStatus();
  return status === HttpStatus.BAD_REQUEST ? HttpStatus.UNPROCESSABLE_ENTITY : status;
}

/**
 * Pulls a client-facing message (and validation details) out of an HttpException.
 * ValidationPipe responses carry `message: string[]`.
 */
function describeHttpException(exception: HttpException): { message: string; details?: string[] } {
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return { message: response };
  }

  if (typeof response === 'object' && response !== null && 'message' in response) {
    const message: unknown = response.message;
    if (Array.isArray(message)) {
      return { message: 'Validation failed', details: message.map((m) => String(m)) };
    }
    if (typeof message === 'string') {
      return { message };
    }
  }

  return { message: exception.message };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(private readonly logger: JsonLogger) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<AuthenticatedRequest>();
    const res = ctx.getResponse<Response>();

    const isHttp = exception instanceof HttpException;
    const statusCode = responseStatusFor(exception);

    const path = req.originalUrl?.split('?')[0] ?? req.url;

    const meta: Record<string, unknown> = {
      requestId: req.requestId,
      method: req.method,
      path,
      statusCode
    };

    if (req.user) {
      meta.username = req.user.username;
      meta.role = req.user.role;
    }

    if (exception instanceof Error) {
      meta.errorName = exception.name;
      meta.errorMessage = exception.message;
    } else {
      meta.error = String(exception);
    }

    // 5xx as error with stack, 4xx as warn.
    if (statusCode >= 500) {
      this.logger.error('Unhandled exception', {
        ...meta,
        stack: exception instanceof Error ? exception.stack : undefined
      });
    } else {
      this.logger.warn('Request failed', meta);
    }

    // Stack traces stay in the logs; 5xx bodies get a fixed message.
    const described =
      isHttp && statusCode < 500 ? describeHttpException(exception) : { message: 'Internal server error' };

    const body: ErrorResponseBody = {
      statusCode,
      errorCode: errorCodeForStatus(statusCode),
      message: described.message,
      ...(described.details ? { details: described.details } : {}),
      timestamp: new Date().toISOString(),
      path,
      requestId: req.requestId
    };

    if (statusCode === HttpStatus.UNAUTHORIZED) {
      res.setHeader('WWW-Authenticate', 'Bearer');
    }

    res.status(statusCode).json(body);
  }
}
