import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

const LOG_LEVELS: readonly LogLevel[] = [
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
  'fatal',
];

function parseLogLevels(raw: string | undefined): LogLevel[] {
  const defaults: LogLevel[] = ['error', 'warn', 'log', 'debug'];
  if (!raw) return defaults;
  const levels = raw
    .split(',')
    .map((level) => level.trim().toLowerCase())
    .flatMap((level) => LOG_LEVELS.filter((known) => known === level));
  return levels.length > 0 ? levels : defaults;
}

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: parseLogLevels(process.env.LOG_LEVELS),
  });

  const configService = app.get(ConfigService);
  const port = Number(configService.get<string | number>('PORT', 3000));

  // Enable validation pipe globally
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableCors();
  app.enableShutdownHooks();

  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`Index endpoint: POST http://localhost:${port}/segments/index`);
  logger.log(`Search endpoint: POST http://localhost:${port}/search`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
