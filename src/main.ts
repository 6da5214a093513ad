import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';
import { toNestLogLevels } from './lib/logger';

async function bootstrap() {
  const adapter = new FastifyAdapter({ logger: true });
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    bufferLogs: true,
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  app.useLogger(toNestLogLevels(configService.get<string>('app.logLevel')));
  const port = configService.get<number>('app.port') ?? 3000;

  await setupApp(app, {
    corsOrigin: configService.get<string>('cors.origin') ?? '*',
    maxFiles: configService.get<number>('uploads.maxFiles') ?? 20,
  });

  await app.listen({ port, host: '0.0.0.0' });
  new Logger('Bootstrap').log(`Photo gallery listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start server',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
