import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { JsonLogger } from './logging/json-logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
    logger: new JsonLogger('bootstrap')
  });

  const logger = configureApp(app);
  const config = app.get(ConfigService);

  const port = Number(config.get<number>('PORT') ?? 3000);
  const env = config.get<string>('NODE_ENV') ?? 'dev';

  if (config.get<boolean>('SWAGGER_ENABLED') !== false) {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Product Catalog API')
      .setDescription(
        'Product CRUD guarded by JWT bearer tokens.' +
          '\n\n1. `POST /auth/register` or ask an admin for an account' +
          '\n2. `POST /auth/login` returns a token' +
          '\n3. Send it as `Authorization: Bearer <token>`' +
          '\n\nReads need any valid token; create, replace, update and delete need the admin role.'
      )
      .setVersion('1.0.0')
      .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT', name: 'Authorization', in: 'header' }, 'bearer')
      .addTag('Auth', 'Registration, login and the current account')
      .addTag('Health', 'Health check (public)')
      .addTag('Products', 'Product catalogue')
      .addTag('Users', 'User administration (admin)')
      .build();

    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: { persistAuthorization: true, docExpansion: 'none', tagsSorter: 'alpha' }
    });

    logger.log('Swagger documentation available', { url: `http://localhost:${port}/docs` });
  }

  app.enableShutdownHooks();

  process.on('unhandledRejection', (reason) => {
    logger.error('unhandledRejection', { reason: reason instanceof Error ? reason.stack ?? reason.message : String(reason) });
  });

  await app.listen(port);
  logger.log('product api listening', { port, env });
}

bootstrap().catch((error) => {
  console.error(JSON.stringify({ level: 'error', msg: 'bootstrap failed', error: String(error) }));
  process.exit(1);
});
