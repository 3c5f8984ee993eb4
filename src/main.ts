import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { AppConfigService } from './config/app-config.service.js';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const { port } = app.get(AppConfigService);
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on :${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
