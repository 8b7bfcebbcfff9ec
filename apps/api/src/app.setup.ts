import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';

/**
 * Global pipes and filters, shared by main.ts and the e2e suite so both
 * run the exact same request pipeline.
 */
export function configureApp(app: INestApplication): void {
  // ── Global Pipes ──────────────────────────────────────
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

  // ── Global Filters ────────────────────────────────────
  app.useGlobalFilters(new ApiExceptionFilter());
}
