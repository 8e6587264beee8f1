import 'reflect-metadata';

import { type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { envSchema } from './config/app-config.schema';
import { AppConfigService } from './config/app-config.service';
import type { LogLevel as AppLogLevel } from './config/app-config.types';
import { DOCS_PATH } from './health/health.service';

const NEST_LOG_LEVELS: Readonly<Record<AppLogLevel, LogLevel[]>> = {
  debug: ['error', 'warn', 'log', 'debug'],
  info: ['error', 'warn', 'log'],
  warn: ['error', 'warn'],
  error: ['error'],
};

// The logger is built before AppConfigService exists; an invalid value fails later in config.
const resolveNestLogLevels = (rawLogLevel: string | undefined): LogLevel[] => {
  const parsed = envSchema.shape.LOG_LEVEL.safeParse(rawLogLevel);
  return NEST_LOG_LEVELS[parsed.success ? parsed.data : 'info'];
};

const bootstrap = async (): Promise<void> => {
  const app: NestExpressApplication = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    logger: resolveNestLogLevels(process.env['LOG_LEVEL']),
  });
  const appConfigService: AppConfigService = app.get(AppConfigService);
  const logger: Logger = new Logger('Bootstrap');

  configureApp(app);
  app.enableShutdownHooks();

  logger.log(
    `runtime config logLevel=${appConfigService.logLevel} nodeEnv=${appConfigService.nodeEnv} signatureRequired=${String(appConfigService.webhookSignatureRequired)} queueMax=${appConfigService.deliveryQueueMax.toString()} workers=${appConfigService.deliveryQueueConcurrency.toString()}`,
  );

  if (!appConfigService.webhookSignatureRequired) {
    logger.warn('Webhook signature enforcement is disabled (WEBHOOK_SIGNATURE_REQUIRED=false)');
  }

  if (appConfigService.debug) {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Trading Signal Relay API')
      .setDescription('Relays trading alerts from webhooks to a Telegram chat')
      .setVersion(appConfigService.appVersion)
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup(DOCS_PATH, app, document);
  }

  await app.listen(appConfigService.port, appConfigService.host);
  logger.log(
    `${appConfigService.appName} is listening on ${appConfigService.host}:${appConfigService.port.toString()}.`,
  );
};

bootstrap().catch((error: unknown): void => {
  const reason: string = error instanceof Error ? (error.stack ?? error.message) : String(error);
  new Logger('Bootstrap').error(`startup failed reason=${reason}`);
  process.exitCode = 1;
});
