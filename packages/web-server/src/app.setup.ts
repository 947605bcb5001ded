import type { NestExpressApplication } from '@nestjs/platform-express';
import { WsAdapter } from '@nestjs/platform-ws';
import type { AppConfig } from './config/index.js';
import {
  GlobalExceptionFilter,
  TransformInterceptor,
  LoggingInterceptor,
  createValidationPipe,
} from './common/index.js';

export const MEDIA_URL_PREFIX = '/media';

/**
 * Global HTTP and socket setup shared by the server entry point and the e2e tests
 */
export function configureApp(app: NestExpressApplication, config: AppConfig): void {
  app.enableCors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    credentials: true,
  });

  app.setGlobalPrefix(config.apiPrefix);
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new GlobalExceptionFilter({ debug: config.debug }));
  app.useGlobalInterceptors(new LoggingInterceptor(), new TransformInterceptor());

  // Uploaded files are served from the media root
  app.useStaticAssets(config.mediaPath, { prefix: MEDIA_URL_PREFIX, index: false });

  app.useWebSocketAdapter(new WsAdapter(app));
  app.enableShutdownHooks();
}
