import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  configureApp(app);

  const port = app.get(ConfigService).get<string>('PORT') || 3000;
  await app.listen(port);

  logger.log(`🚀 License server is running at http://localhost:${port}/api`);
}

bootstrap().catch((err: unknown) => {
  logger.error('❌ License server failed to start', err instanceof Error ? err.stack : String(err));
  process.exitCode = 1;
});
