// 하루치 날씨 조립: 바람 → 날씨 유형 → 기온 roll → 기온/이벤트 엔진
// 난수 소비 순서가 고정이어야 같은 seed 로 같은 여정이 재현된다.

import { Injectable } from '@nestjs/common';
import { InvariantViolationError } from '../../common/errors/weather-errors.js';
import { WeatherTablesService } from '../../content/weather-tables.service.js';
import type {
  DailyWeatherRecord,
  EventCarry,
  Region,
  Season,
  WindState,
  WindStrength,
} from '../../db/types/index.js';
import { d100 } from '../rng/random-source.js';
import type { RandomSource } from '../rng/random-source.js';
import { TemperatureEventService } from '../temperature/temperature-event.service.js';
import type { TemperatureResult } from '../temperature/temperature-event.service.js';
import { WeatherTypeService } from '../weather/weather-type.service.js';
import { WindService } from '../wind/wind.service.js';

// 체감 기온 보정 (그날 가장 잦은 풍속 기준)
const WIND_CHILL: Record<WindStrength, number> = {
  calm: 0,
  light: -5,
  bracing: -5,
  strong: -10,
  very_strong: -10,
};

export interface DayInput {
  journeyKey: string;
  day: number;
  region: Region;
  season: Season;
  /** 전날 midnight, 첫날은 null */
  previousWind: WindState | null;
  carry: EventCarry;
  generatedAt?: Date;
}

export interface GeneratedDay {
  record: DailyWeatherRecord;
  temperature: TemperatureResult;
  lastWind: WindState;
}

@Injectable()
export class DailyWeatherService {
  constructor(
    private readonly tables: WeatherTablesService,
    private readonly wind: WindService,
    private readonly weatherType: WeatherTypeService,
    private readonly temperature: TemperatureEventService,
  ) {}

  generateDay(input: DayInput, rng: RandomSource): GeneratedDay {
    // 지역/계절 오류는 난수를 건드리기 전에
    this.tables.baseTemperature(input.region, input.season);

    const windTimeline = this.wind.generateDay(input.previousWind, rng);
    const weather = this.weatherType.roll(input.season, rng);
    const temperature = this.temperature.resolveDay(
      {
        region: input.region,
        season: input.season,
        roll: d100(rng),
        carry: input.carry,
      },
      rng,
    );

    const lastWind = this.wind.lastReading(windTimeline);
    if (!lastWind) {
      throw new InvariantViolationError('Wind timeline is empty', {
        day: input.day,
      });
    }
    const chill = WIND_CHILL[this.wind.dominantStrength(windTimeline)];
    const { next } = temperature;

    const record: DailyWeatherRecord = {
      journeyKey: input.journeyKey,
      day: input.day,
      region: input.region,
      season: input.season,
      windTimeline,
      continuityNote: this.wind.continuityNote(input.previousWind, input.day - 1),
      weatherRoll: weather.roll,
      weatherType: weather.type,
      weatherEffects: weather.effects,
      temperatureRoll: temperature.roll,
      baseTemperature: temperature.baseTemperature,
      actualTemperature: temperature.actualTemperature,
      perceivedTemperature: temperature.actualTemperature + chill,
      category: temperature.category,
      description: temperature.description,
      coldFrontRemaining: this.eventField(temperature, 'COLD_FRONT', 'remaining'),
      coldFrontTotal: this.eventField(temperature, 'COLD_FRONT', 'total'),
      heatWaveRemaining: this.eventField(temperature, 'HEAT_WAVE', 'remaining'),
      heatWaveTotal: this.eventField(temperature, 'HEAT_WAVE', 'total'),
      nextCarry: next,
      generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    };

    return { record, temperature, lastWind };
  }

  /** 기록에는 그날 기준 진행도(오늘 포함 남은 일수)를 남긴다 */
  private eventField(
    temperature: TemperatureResult,
    kind: 'COLD_FRONT' | 'HEAT_WAVE',
    field: 'remaining' | 'total',
  ): number {
    const { event } = temperature;
    return event && event.kind === kind ? event[field] : 0;
  }
}
