import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';
import { configureApp } from '@/app.setup';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  const port = app.get(ConfigService).get<string>('PORT') ?? '3000';

  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

bootstrap().catch((error) => {
  logger.error(`Fatal error: ${(error as Error).stack}`);
  process.exit(1);
});
