import 'reflect-metadata';

import { type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';

const resolveNestLogLevels = (logLevel: string): LogLevel[] => {
  if (logLevel === 'debug') {
    return ['error', 'warn', 'log', 'debug'];
  }

  if (logLevel === 'info') {
    return ['error', 'warn', 'log'];
  }

  if (logLevel === 'warn') {
    return ['error', 'warn'];
  }

  return ['error'];
};

const bootstrap = async (): Promise<void> => {
  const configuredLogLevel: string = process.env['LOG_LEVEL'] ?? 'info';
  const app = await NestFactory.create(AppModule, {
    logger: resolveNestLogLevels(configuredLogLevel),
  });
  const appConfigService: AppConfigService = app.get(AppConfigService);
  const logger: Logger = new Logger('Bootstrap');
  const corsOrigins: string[] = [...appConfigService.corsAllowedOrigins];

  if (appConfigService.nodeEnv !== 'production') {
    corsOrigins.push('http://localhost:5173');
  }

  app.enableCors({
    origin: corsOrigins,
    credentials: true,
  });
  app.enableShutdownHooks();

  logger.log(`Resolved log level: ${appConfigService.logLevel}`);
  logger.log(
    `Runtime config: nodeEnv=${appConfigService.nodeEnv}, reminderSchedulerEnabled=${String(appConfigService.reminderSchedulerEnabled)}, waterReminderStrategy=${appConfigService.waterReminderStrategy}`,
  );
  const swaggerConfig = new DocumentBuilder()
    .setTitle('Meal Reminder Service API')
    .setDescription('Reminder preferences and service health')
    .setVersion(appConfigService.appVersion)
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(appConfigService.port);
  logger.log(`Meal reminder service is listening on port ${String(appConfigService.port)}.`);
};

void bootstrap();
