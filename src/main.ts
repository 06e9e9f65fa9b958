import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableCors();
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Ledger API')
    .setDescription(
      `## Ledger API

      Customer accounts with an append-only history of every balance change.

      ### Quick Start
      1. **POST /accounts** opens an account and returns its account number.
      2. **POST /sessions** logs in with username and password.
      3. **POST /accounts/{accountNumber}/deposit**, **/withdraw** and **/transfer** move money; each takes the account's PIN.
      4. **GET /accounts/{accountNumber}/history** lists entries, newest first.

      A 503 with \`retryable: true\` means the account was locked by another operation; retry the request.`,
    )
    .setVersion('1.0')
    .addTag('accounts', 'Accounts, balances and money movement')
    .addTag('sessions', 'Login')
    .build();

  const document = SwaggerModule.createDocument(app, config);

  SwaggerModule.setup('api', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      displayRequestDuration: true,
      docExpansion: 'list',
      filter: true,
    },
    customSiteTitle: 'Ledger API Docs',
  });

  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
