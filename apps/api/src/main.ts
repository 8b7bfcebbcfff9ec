import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  configureApp(app);

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: configService.get<string>('API_CORS_ORIGIN', '*'),
  });

  // Runs OnModuleDestroy (stops the retention sweep) on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = configService.get<number>('API_PORT', 8000);
  await app.listen(port);

  logger.log(`PDF to Images API running on http://localhost:${port}`);
  logger.log(
    `Workspace root: ${configService.get<string>('WORKSPACE_ROOT', '(os tmpdir)/pdf2img')}`,
  );
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? err.stack ?? err.message : String(err);
  new Logger('Bootstrap').error(`Failed to start: ${message}`);
  process.exit(1);
});
