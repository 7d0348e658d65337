// 여정 수명주기: 시작 / 조회 / 구간 설정 / 생성 / 덮어쓰기 / 종료

import { Inject, Injectable, Logger } from '@nestjs/common';
import { InvalidInputError, NotFoundError } from '../common/errors/weather-errors.js';
import { WeatherConfigService } from '../config/weather-config.service.js';
import type {
  DailyWeatherRecord,
  JourneyState,
  Region,
  Season,
} from '../db/types/index.js';
import { RngService } from '../engine/rng/rng.service.js';
import { initialCarry } from '../engine/temperature/temperature-event.service.js';
import { StageOrchestratorService } from './stage-orchestrator.service.js';
import type { OverrideRequest, StageResult } from './stage-orchestrator.service.js';
import { WEATHER_STORE } from './storage/weather-store.js';
import type { WeatherStore } from './storage/weather-store.js';

export interface JourneySummary {
  journeyKey: string;
  region: Region;
  season: Season;
  daysTravelled: number;
  stagesCompleted: number;
  coldFrontsSeen: number;
  heatWavesSeen: number;
}

export function createJourneyState(params: {
  journeyKey: string;
  region: Region;
  season: Season;
  stageDays: number;
  seed: string;
}): JourneyState {
  return {
    ...params,
    currentDay: 1,
    currentStage: 1,
    rngCursor: 0,
    lastWind: null,
    carry: initialCarry(),
    coldFrontsSeen: 0,
    heatWavesSeen: 0,
  };
}

@Injectable()
export class JourneysService {
  private readonly logger = new Logger(JourneysService.name);

  constructor(
    @Inject(WEATHER_STORE) private readonly store: WeatherStore,
    private readonly orchestrator: StageOrchestratorService,
    private readonly rng: RngService,
    private readonly config: WeatherConfigService,
  ) {}

  /** 같은 키의 기존 여정은 기록째 교체 */
  async startJourney(
    journeyKey: string,
    region: Region,
    season: Season,
    stageDays?: number,
  ): Promise<JourneyState> {
    const days = stageDays ?? this.config.get().defaultStageDays;
    this.assertStageDays(days);

    const state = createJourneyState({
      journeyKey,
      region,
      season,
      stageDays: days,
      seed: this.rng.newSeed(),
    });
    const replaced = await this.store.replaceJourney(state);
    this.logger.log(
      `${journeyKey}: journey ${replaced ? 'restarted' : 'started'} in ${region}/${season}, ${days} days per stage`,
    );
    return state;
  }

  async endJourney(journeyKey: string): Promise<JourneySummary> {
    const state = await this.getJourney(journeyKey);
    await this.store.removeJourney(journeyKey);
    const summary: JourneySummary = {
      journeyKey,
      region: state.region,
      season: state.season,
      daysTravelled: state.currentDay - 1,
      stagesCompleted: state.currentStage - 1,
      coldFrontsSeen: state.coldFrontsSeen,
      heatWavesSeen: state.heatWavesSeen,
    };
    this.logger.log(
      `${journeyKey}: journey ended after ${summary.daysTravelled} days`,
    );
    return summary;
  }

  async getJourney(journeyKey: string): Promise<JourneyState> {
    const state = await this.store.findJourney(journeyKey);
    if (!state) {
      throw new NotFoundError(`Journey not found: ${journeyKey}`, { journeyKey });
    }
    return state;
  }

  async configureStage(journeyKey: string, stageDays: number): Promise<JourneyState> {
    this.assertStageDays(stageDays);
    const state = await this.getJourney(journeyKey);
    const updated = { ...state, stageDays };
    await this.store.saveJourney(updated);
    return updated;
  }

  generateStage(journeyKey: string, days?: number): Promise<StageResult> {
    return this.orchestrator.generateDays(journeyKey, days);
  }

  overrideDay(journeyKey: string, request: OverrideRequest): Promise<StageResult> {
    return this.orchestrator.overrideDay(journeyKey, request);
  }

  async getDay(journeyKey: string, day: number): Promise<DailyWeatherRecord> {
    const record = await this.store.findDay(journeyKey, day);
    if (!record) {
      throw new NotFoundError(`Day ${day} has not been generated`, {
        journeyKey,
        day,
      });
    }
    return record;
  }

  private assertStageDays(days: number): void {
    const { maxStageDays } = this.config.get();
    if (!Number.isInteger(days) || days < 1 || days > maxStageDays) {
      throw new InvalidInputError(`Stage length must be 1-${maxStageDays} days`, {
        stageDays: days,
      });
    }
  }
}
