import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppConfig, appConfig } from './config/app.config';

async function bootstrap() {
  // rawBody keeps the exact bytes LINE signed
  const app = await NestFactory.create(AppModule, { rawBody: true });

  const cfg = app.get<AppConfig>(appConfig.KEY);
  await app.listen(cfg.port, cfg.host);
  Logger.log(`🚀 Webhook listening on http://${cfg.host}:${cfg.port}/callback`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    `Startup failed: ${err instanceof Error ? err.message : String(err)}`,
    'Bootstrap',
  );
  process.exit(1);
});
