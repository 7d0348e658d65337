// 구간(stage) 단위 날씨 생성: N 일을 순서대로 생성하고 하루씩 커밋한다.
// 실패하면 직전 날까지는 저장된 채로 남고, 같은 요청을 다시 보내면 이어서 생성한다.

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ConflictError,
  InvalidInputError,
  NotFoundError,
  StorageError,
} from '../common/errors/weather-errors.js';
import { WeatherConfigService } from '../config/weather-config.service.js';
import type {
  DailyWeatherRecord,
  EventCarry,
  JourneyState,
  Region,
  Season,
  WindState,
} from '../db/types/index.js';
import { DailyWeatherService } from '../engine/daily/daily-weather.service.js';
import type { GeneratedDay } from '../engine/daily/daily-weather.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import type { Rng } from '../engine/rng/rng.service.js';
import { initialCarry } from '../engine/temperature/temperature-event.service.js';
import { WindService } from '../engine/wind/wind.service.js';
import { WEATHER_STORE } from './storage/weather-store.js';
import type { WeatherStore } from './storage/weather-store.js';

export interface StageResult {
  journey: JourneyState;
  records: DailyWeatherRecord[];
}

export interface OverrideRequest {
  /** 생략하면 다음 날 */
  day?: number;
  region: Region;
  season: Season;
}

/** 기록에서 "그날 시작된 이벤트" 판별: 시작일은 remaining === total */
function startedEvents(record: DailyWeatherRecord) {
  return {
    coldFront: record.coldFrontTotal > 0 && record.coldFrontRemaining === record.coldFrontTotal,
    heatWave: record.heatWaveTotal > 0 && record.heatWaveRemaining === record.heatWaveTotal,
  };
}

@Injectable()
export class StageOrchestratorService {
  private readonly logger = new Logger(StageOrchestratorService.name);

  constructor(
    @Inject(WEATHER_STORE) private readonly store: WeatherStore,
    private readonly daily: DailyWeatherService,
    private readonly wind: WindService,
    private readonly rngService: RngService,
    private readonly config: WeatherConfigService,
  ) {}

  /**
   * 한 구간 생성. stage 는 마지막 날과 같은 트랜잭션에서 올라간다.
   * days 생략 시 여정의 stageDays.
   */
  async generateDays(journeyKey: string, days?: number): Promise<StageResult> {
    const start = await this.loadJourney(journeyKey);
    const count = days ?? start.stageDays;
    this.assertDayCount(count);

    const rng = this.rngService.create(start.seed, start.rngCursor);
    const records: DailyWeatherRecord[] = [];
    let state = start;
    for (let i = 0; i < count; i++) {
      // 마지막 날 커밋에 stage 증가를 함께 싣는다
      const result = await this.commitNext(state, rng, i === count - 1);
      state = result.journey;
      records.push(result.record);
    }

    this.logger.log(
      `${journeyKey}: stage ${start.currentStage} complete (days ${start.currentDay}-${state.currentDay - 1})`,
    );
    return { journey: state, records };
  }

  /** 하루만 생성. stage 는 그대로 */
  async advanceDay(journeyKey: string): Promise<StageResult> {
    const state = await this.loadJourney(journeyKey);
    const rng = this.rngService.create(state.seed, state.rngCursor);
    const { journey, record } = await this.commitNext(state, rng);
    return { journey, records: [record] };
  }

  /**
   * 지정한 지역/계절로 하루를 다시 생성.
   * 대상은 다음 날(추가) 또는 마지막으로 생성된 날(교체)만 가능하다.
   */
  async overrideDay(journeyKey: string, request: OverrideRequest): Promise<StageResult> {
    const state = await this.loadJourney(journeyKey);
    const lastGenerated = state.currentDay - 1;
    const day = request.day ?? state.currentDay;

    if (day !== state.currentDay && !(day === lastGenerated && day >= 1)) {
      throw new ConflictError(
        `Day ${day} cannot be overridden; only day ${state.currentDay} or the last generated day`,
        { day, currentDay: state.currentDay },
      );
    }

    const rng = this.rngService.create(state.seed, state.rngCursor);

    if (day === state.currentDay) {
      const generated = this.daily.generateDay(
        {
          journeyKey,
          day,
          region: request.region,
          season: request.season,
          previousWind: state.lastWind,
          carry: state.carry,
        },
        rng,
      );
      const journey = this.applyDay(state, generated, rng);
      await this.persist(() => this.store.commitDay(journey, generated.record), day - 1);
      this.logger.log(`${journeyKey}: day ${day} generated with override ${request.region}/${request.season}`);
      return { journey, records: [generated.record] };
    }

    // 마지막 날 교체: 그날 이전의 이월 상태로 다시 돌린다
    const replaced = await this.store.findDay(journeyKey, day);
    if (!replaced) {
      throw new NotFoundError(`Day ${day} not found`, { journeyKey, day });
    }
    const before = await this.stateBefore(journeyKey, day);
    const generated = this.daily.generateDay(
      {
        journeyKey,
        day,
        region: request.region,
        season: request.season,
        previousWind: before.wind,
        carry: before.carry,
      },
      rng,
    );

    const old = startedEvents(replaced);
    const rolledBack: JourneyState = {
      ...state,
      currentDay: day,
      coldFrontsSeen: state.coldFrontsSeen - (old.coldFront ? 1 : 0),
      heatWavesSeen: state.heatWavesSeen - (old.heatWave ? 1 : 0),
    };
    const journey = this.applyDay(rolledBack, generated, rng);
    // 교체 실패 시 기존 기록은 그대로 남는다
    await this.persist(() => this.store.commitDay(journey, generated.record), lastGenerated);
    this.logger.log(`${journeyKey}: day ${day} replaced with override ${request.region}/${request.season}`);
    return { journey, records: [generated.record] };
  }

  private async commitNext(
    state: JourneyState,
    rng: Rng,
    completesStage = false,
  ): Promise<{ journey: JourneyState; record: DailyWeatherRecord }> {
    const generated = this.daily.generateDay(
      {
        journeyKey: state.journeyKey,
        day: state.currentDay,
        region: state.region,
        season: state.season,
        previousWind: state.lastWind,
        carry: state.carry,
      },
      rng,
    );
    const applied = this.applyDay(state, generated, rng);
    const journey = completesStage
      ? { ...applied, currentStage: applied.currentStage + 1 }
      : applied;
    await this.persist(
      () => this.store.commitDay(journey, generated.record),
      state.currentDay - 1,
    );
    return { journey, record: generated.record };
  }

  private applyDay(state: JourneyState, generated: GeneratedDay, rng: Rng): JourneyState {
    const { record, temperature, lastWind } = generated;
    const event = temperature.event;
    if (event?.started) {
      this.logger.log(
        `${state.journeyKey}: ${event.kind} started on day ${record.day} (${event.total} days)`,
      );
    }
    if (event?.finalDay) {
      this.logger.log(`${state.journeyKey}: ${event.kind} ends on day ${record.day}`);
    }
    const started = startedEvents(record);
    return {
      ...state,
      currentDay: record.day + 1,
      rngCursor: rng.cursor,
      lastWind,
      carry: temperature.next,
      coldFrontsSeen: state.coldFrontsSeen + (started.coldFront ? 1 : 0),
      heatWavesSeen: state.heatWavesSeen + (started.heatWave ? 1 : 0),
    };
  }

  /** day 직전까지의 이월 상태: day 1 이면 여정 초기값 */
  private async stateBefore(
    journeyKey: string,
    day: number,
  ): Promise<{ carry: EventCarry; wind: WindState | null }> {
    if (day <= 1) return { carry: initialCarry(), wind: null };
    const previous = await this.store.findDay(journeyKey, day - 1);
    if (!previous) {
      throw new NotFoundError(`Day ${day - 1} not found`, { journeyKey, day: day - 1 });
    }
    return {
      carry: previous.nextCarry,
      wind: this.wind.lastReading(previous.windTimeline),
    };
  }

  private async loadJourney(journeyKey: string): Promise<JourneyState> {
    const state = await this.store.findJourney(journeyKey);
    if (!state) {
      throw new NotFoundError(`Journey not found: ${journeyKey}`, { journeyKey });
    }
    return state;
  }

  private assertDayCount(days: number): void {
    const { maxStageDays } = this.config.get();
    if (!Number.isInteger(days) || days < 1 || days > maxStageDays) {
      throw new InvalidInputError(`Stage length must be 1-${maxStageDays} days`, {
        days,
      });
    }
  }

  private async persist(write: () => Promise<void>, persistedThroughDay: number): Promise<void> {
    try {
      await write();
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      this.logger.error(
        `Commit failed after day ${persistedThroughDay}: ${err.message}`,
      );
      throw new StorageError(
        `Weather generation interrupted after day ${persistedThroughDay}`,
        err.details,
        persistedThroughDay,
      );
    }
  }
}
