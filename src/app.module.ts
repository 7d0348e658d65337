import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from './config/config.module.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { WeatherExceptionFilter } from './common/filters/weather-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { JourneysModule } from './journeys/journeys.module.js';

@Module({
  imports: [
    ConfigModule,
    DrizzleModule,
    ContentModule,
    EngineModule,
    JourneysModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: WeatherExceptionFilter,
    },
  ],
})
export class AppModule {}
