import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import * as express from 'express';
import { AppModule } from './app.module';
import { createAppLogger } from './common/logging/app-logger';

const DEFAULT_PORT = 5000;
const DEFAULT_BODY_LIMIT = '50mb';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    cors: true,
    bodyParser: false,
    logger: createAppLogger(),
  });
  const bodyLimit = process.env.BODY_LIMIT || DEFAULT_BODY_LIMIT; // log exports get large
  app.use(express.json({ limit: bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: bodyLimit }));
  app.useGlobalPipes(new ValidationPipe());

  const config = new DocumentBuilder()
    .setTitle('Session Log Debugger')
    .setVersion('0.1.0')
    .addApiKey(
      { type: 'apiKey', name: 'x-admin-token', in: 'header' },
      'adminToken',
    )
    .build();

  const doc = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, doc, {
    swaggerOptions: { persistAuthorization: true },
  });

  await app.listen(process.env.PORT || DEFAULT_PORT);
}

bootstrap().catch((err: unknown) => {
  console.error('[bootstrap] failed to start', err);
  process.exit(1);
});
