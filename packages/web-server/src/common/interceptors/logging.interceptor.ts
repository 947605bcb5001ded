import {
  Injectable,
  type NestInterceptor,
  type ExecutionContext,
  type CallHandler,
  Logger,
} from '@nestjs/common';
import { type Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { getRequestContext } from '@contractor-connect/core';

/**
 * Logs `METHOD url status - Nms - ip` per HTTP request.
 * The authenticated user id is appended when the request has one.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  public intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }
    const request = context.switchToHttp().getRequest<{
      method: string;
      originalUrl: string;
      ip?: string;
    }>();
    const { method, originalUrl } = request;
    const ip = request.ip ?? '-';
    const startTime = Date.now();

    const suffix = (): string => {
      const userId = getRequestContext()?.userId;
      return userId === undefined ? '' : ` - user ${userId}`;
    };

    return next.handle().pipe(
      tap({
        next: () => {
          const response = context.switchToHttp().getResponse<{ statusCode: number }>();
          const duration = Date.now() - startTime;
          this.logger.log(
            `${method} ${originalUrl} ${String(response.statusCode)} - ${String(duration)}ms - ${ip}${suffix()}`
          );
        },
        error: (error: unknown) => {
          const duration = Date.now() - startTime;
          const message = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error(`${method} ${originalUrl} ERROR - ${String(duration)}ms - ${ip} - ${message}`);
        },
      })
    );
  }
}
