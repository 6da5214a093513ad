import { ValidationPipe } from '@nestjs/common';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import fastifyCors from '@fastify/cors';
import fastifyMultipart from '@fastify/multipart';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { MAX_FILE_SIZE_BYTES } from './modules/photos/domain/upload-policy';

export interface AppSetupOptions {
  corsOrigin: string;
  maxFiles: number;
}

/**
 * Plugins, pipes and filters shared by the server and the e2e tests.
 */
export async function setupApp(app: NestFastifyApplication, options: AppSetupOptions) {
  await app.register(fastifyMultipart, {
    // Oversized parts are truncated one byte past the limit so the
    // upload policy can reject them per file
    throwFileSizeLimit: false,
    limits: {
      fileSize: MAX_FILE_SIZE_BYTES + 1,
      files: options.maxFiles,
    },
  });

  await app.register(fastifyCors, {
    origin:
      options.corsOrigin === '*'
        ? true
        : options.corsOrigin.split(',').map((item) => item.trim()),
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    exposedHeaders: ['X-Photo-ID', 'X-Photo-Name'],
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(new AllExceptionsFilter());
}
