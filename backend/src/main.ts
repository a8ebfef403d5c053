import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './app.module.js';
import type { AppConfig } from './config/index.js';

async function bootstrap() {
  const nodeEnv = process.env.NODE_ENV ?? 'development';

  // 生产环境只输出 warn 和 error，测试环境只输出 error
  const logLevels: LogLevel[] =
    nodeEnv === 'production'
      ? ['error', 'warn']
      : nodeEnv === 'test'
        ? ['error']
        : ['log', 'error', 'warn', 'debug'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
  });
  app.setGlobalPrefix('api');
  app.enableCors();
  app.useBodyParser('json', { limit: '10mb' });

  const configService = app.get<ConfigService<AppConfig>>(ConfigService);
  const port = configService.get<AppConfig['app']>('app')?.port ?? 8000;

  try {
    await app.listen(port);
    Logger.log(
      `HTTP server listening on port ${port} (env: ${nodeEnv})`,
      'Bootstrap',
    );
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      error.code === 'EADDRINUSE'
    ) {
      Logger.error(
        `Port ${port} is already in use. Please stop other instances or change the port.`,
        'Bootstrap',
      );
      process.exit(1);
    }
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exit(1);
});
