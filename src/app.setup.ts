import { HttpStatus, INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllExceptionsFilter } from './logging/all-exceptions.filter';
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import { JsonLogger } from './logging/json-logger.service';

export function parseOrigins(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim().replace(/\/$/, ''))
    .filter(Boolean);
}

/**
 * Global pipes, filters, middleware and CORS. Shared by main.ts and the e2e tests
 * so both run the same request pipeline.
 */
export function configureApp(app: INestApplication): JsonLogger {
  const logger = app.get(JsonLogger);
  app.useLogger(logger);
  const config = app.get(ConfigService);

  logger.setLogLevels(JsonLogger.levelsFor(config.get<string>('NODE_ENV') ?? 'dev'));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY
    })
  );

  // Request/response logs (no headers/body).
  app.use(createHttpLoggingMiddleware(logger));

  app.useGlobalFilters(new AllExceptionsFilter(logger));

  // CORS only when origins are configured; non-browser clients send no Origin.
  const allowList = parseOrigins(config.get<string>('CORS_ORIGINS'));
  if (allowList.length > 0) {
    const allowSet = new Set(allowList);
    app.enableCors({
      origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
        if (!origin || allowSet.has(origin.replace(/\/$/, ''))) return callback(null, true);
        logger.warn('CORS blocked origin', { origin });
        return callback(new Error(`CORS blocked origin: ${origin}`), false);
      },
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      optionsSuccessStatus: 204,
      maxAge: 86400
    });
    logger.log('CORS enabled', { allowList });
  }

  return logger;
}
