import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { Server } from 'node:http';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.enableShutdownHooks();

  // Image jobs can poll for minutes; keep idle sockets open past the poll budget
  const server: Server = app.getHttpServer();
  server.setTimeout(
    configService.get<number>('IMAGE_POLL_TIMEOUT_MS', 120000) + 30000,
  );

  const port = configService.get<number>('PORT', 3000);
  await app.listen(port);
  Logger.log(`Listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Failed to start: ${error instanceof Error ? error.message : error}`,
    'Bootstrap',
  );
  process.exit(1);
});
