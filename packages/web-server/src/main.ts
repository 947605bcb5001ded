import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { APP_NAME, CHAT_SOCKET_PATH } from '@contractor-connect/config';
import { AppModule } from './app.module.js';
import { configureApp } from './app.setup.js';
import { readAppConfig } from './config/index.js';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const logger = new Logger('Bootstrap');
  const config = readAppConfig(app.get(ConfigService));

  configureApp(app, config);

  // Swagger setup
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle(`${APP_NAME} API`)
      .setDescription('REST API of the contractor marketplace')
      .setVersion('1.0')
      .addBearerAuth()
      .addTag('auth', 'Registration, tokens and profile')
      .addTag('contractors', 'Contractor directory and profiles')
      .addTag('projects', 'Project postings, applications and milestones')
      .addTag('reviews', 'Contractor reviews')
      .addTag('chat', 'Rooms and messages')
      .addTag('notifications', 'In-app notifications and preferences')
      .addTag('moderation', 'Content reports')
      .addTag('advertisements', 'Ad placements')
      .addTag('admin-panel', 'Staff back office')
      .build()
  );
  SwaggerModule.setup(`${config.apiPrefix}/docs`, app, document);

  await app.listen(config.port);

  logger.log(`${APP_NAME} running on http://localhost:${String(config.port)}/${config.apiPrefix}`);
  logger.log(`Swagger UI available at http://localhost:${String(config.port)}/${config.apiPrefix}/docs`);
  logger.log(`Chat socket at ws://localhost:${String(config.port)}${CHAT_SOCKET_PATH}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start server', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
