import {
  type ExceptionFilter,
  Catch,
  type ArgumentsHost,
  HttpStatus,
  HttpException,
  Logger,
} from '@nestjs/common';
import { type Response } from 'express';
import {
  type RepositoryError,
  AuthenticationError,
  ConflictError,
  LockError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
  extractErrorInfo,
  isRepositoryError,
} from '@contractor-connect/core';

// Not in the HttpStatus enum
const HTTP_LOCKED = 423;
const SERVER_ERROR_THRESHOLD = 500;

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  timestamp: string;
  path: string;
}

export interface GlobalExceptionFilterOptions {
  /** Attach stack traces to 5xx responses */
  debug?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps domain errors to HTTP responses.
 *
 * - NotFoundError -> 404
 * - ValidationError -> 400
 * - AuthenticationError -> 401
 * - PermissionDeniedError -> 403
 * - ConflictError -> 409
 * - LockError -> 423
 * - other RepositoryError and unknown errors -> 500
 *
 * Plain errors fall back to message matching.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly options: GlobalExceptionFilterOptions = {}) {}

  public catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<{ url: string }>();

    const { status, errorResponse } = this.buildErrorResponse(exception, request.url);

    this.logError(exception, status, request.url);

    response.status(status).json(errorResponse);
  }

  public buildErrorResponse(
    exception: unknown,
    path: string
  ): { status: number; errorResponse: ErrorResponse } {
    const timestamp = new Date().toISOString();

    if (exception instanceof HttpException) {
      return { status: exception.getStatus(), errorResponse: { ...this.fromHttpException(exception), timestamp, path } };
    }

    if (isRepositoryError(exception)) {
      const status = this.mapRepositoryErrorToStatus(exception);
      return {
        status,
        errorResponse: {
          success: false,
          error: {
            code: exception.code,
            message: exception.message,
            details: this.withStack(status, exception, exception.details),
          },
          timestamp,
          path,
        },
      };
    }

    if (exception instanceof Error) {
      const status = this.mapErrorMessageToStatus(exception.message);
      return {
        status,
        errorResponse: {
          success: false,
          error: {
            code: status === HttpStatus.NOT_FOUND ? 'NOT_FOUND' : 'INTERNAL_ERROR',
            message: exception.message,
            details: this.withStack(status, exception),
          },
          timestamp,
          path,
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      errorResponse: {
        success: false,
        error: {
          code: 'UNKNOWN_ERROR',
          message: 'An unexpected error occurred',
        },
        timestamp,
        path,
      },
    };
  }

  private fromHttpException(exception: HttpException): Pick<ErrorResponse, 'success' | 'error'> {
    const status = exception.getStatus();
    const body = exception.getResponse();
    const fallbackCode = HttpStatus[status] ?? 'HTTP_ERROR';

    if (!isRecord(body)) {
      return { success: false, error: { code: fallbackCode, message: String(body) } };
    }

    const rawMessage = body.message;
    const message = Array.isArray(rawMessage)
      ? rawMessage.map(String).join(', ')
      : typeof rawMessage === 'string'
        ? rawMessage
        : exception.message;
    const code = typeof body.code === 'string' ? body.code : fallbackCode;
    const details = Array.isArray(body.errors) ? { errors: body.errors } : undefined;

    return { success: false, error: { code, message, details } };
  }

  private mapRepositoryErrorToStatus(error: RepositoryError): number {
    if (error instanceof NotFoundError) {
      return HttpStatus.NOT_FOUND;
    }
    if (error instanceof ValidationError) {
      return HttpStatus.BAD_REQUEST;
    }
    if (error instanceof AuthenticationError) {
      return HttpStatus.UNAUTHORIZED;
    }
    if (error instanceof PermissionDeniedError) {
      return HttpStatus.FORBIDDEN;
    }
    if (error instanceof ConflictError) {
      return HttpStatus.CONFLICT;
    }
    if (error instanceof LockError) {
      return HTTP_LOCKED;
    }
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  /**
   * Status for errors raised outside the RepositoryError hierarchy
   */
  private mapErrorMessageToStatus(message: string): HttpStatus {
    const lowerMessage = message.toLowerCase();

    if (lowerMessage.includes('enoent') || lowerMessage.includes('not found')) {
      return HttpStatus.NOT_FOUND;
    }
    if (lowerMessage.includes('invalid') || lowerMessage.includes('cannot') || lowerMessage.includes('must be')) {
      return HttpStatus.BAD_REQUEST;
    }
    if (lowerMessage.includes('already exists')) {
      return HttpStatus.CONFLICT;
    }
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  private withStack(
    status: number,
    error: Error,
    details?: Record<string, unknown>
  ): Record<string, unknown> | undefined {
    if (this.options.debug !== true || status < SERVER_ERROR_THRESHOLD) {
      return details;
    }
    return { ...details, stack: error.stack };
  }

  private logError(exception: unknown, status: number, path: string): void {
    const info = extractErrorInfo(exception);
    const prefix = `[${String(status)}] ${path} - ${info.code !== undefined ? `${info.code} ` : ''}`;

    if (status >= SERVER_ERROR_THRESHOLD) {
      this.logger.error(`${prefix}${info.message}`, info.stack);
    } else {
      this.logger.warn(`${prefix}${info.message}`);
    }
  }
}
