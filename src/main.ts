import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { WeatherConfigService } from './config/weather-config.service.js';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const { port } = app.get(WeatherConfigService).get();
  await app.listen(port);
  Logger.log(`River weather server listening on ${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    err instanceof Error ? (err.stack ?? err.message) : String(err),
    'Bootstrap',
  );
  process.exit(1);
});
