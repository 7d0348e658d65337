import { Injectable } from '@nestjs/common';
import { WeatherTablesService } from '../../content/weather-tables.service.js';
import type {
  Season,
  WeatherEffects,
  WeatherType,
} from '../../db/types/index.js';
import { d100 } from '../rng/random-source.js';
import type { RandomSource } from '../rng/random-source.js';

export interface WeatherTypeResult {
  roll: number;
  type: WeatherType;
  effects: WeatherEffects;
}

@Injectable()
export class WeatherTypeService {
  constructor(private readonly tables: WeatherTablesService) {}

  /** d100 1회 → 계절 테이블. 알 수 없는 계절은 테이블에서 ConfigurationError */
  roll(season: Season, rng: RandomSource): WeatherTypeResult {
    const roll = d100(rng);
    return this.resolve(season, roll);
  }

  resolve(season: Season, roll: number): WeatherTypeResult {
    const type = this.tables.weatherType(season, roll);
    return { roll, type, effects: this.tables.weatherEffects(type) };
  }
}
