import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { JourneysController } from './journeys.controller.js';
import { JourneysService } from './journeys.service.js';
import { StageOrchestratorService } from './stage-orchestrator.service.js';
import { DrizzleWeatherStore } from './storage/drizzle-weather.store.js';
import { WEATHER_STORE } from './storage/weather-store.js';

@Module({
  imports: [EngineModule],
  controllers: [JourneysController],
  providers: [
    { provide: WEATHER_STORE, useClass: DrizzleWeatherStore },
    StageOrchestratorService,
    JourneysService,
  ],
  exports: [JourneysService],
})
export class JourneysModule {}
