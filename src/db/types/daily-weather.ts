import type {
  Region,
  Season,
  TemperatureCategory,
  WeatherType,
} from './enums.js';
import type { EventCarry } from './event-carry.js';
import type { WindReading } from './wind.js';

export interface WeatherEffects {
  name: string;
  description: string;
  effects: string[];
}

/** 하루 한 건, 생성 후 불변 (override 시 같은 엔진을 거쳐 교체) */
export interface DailyWeatherRecord {
  journeyKey: string;
  day: number;
  region: Region;
  season: Season;
  windTimeline: WindReading[];
  continuityNote: string | null;
  weatherRoll: number;
  weatherType: WeatherType;
  weatherEffects: WeatherEffects;
  temperatureRoll: number;
  baseTemperature: number;
  actualTemperature: number;
  perceivedTemperature: number;
  category: TemperatureCategory;
  description: string;
  coldFrontRemaining: number;
  coldFrontTotal: number;
  heatWaveRemaining: number;
  heatWaveTotal: number;
  nextCarry: EventCarry;
  generatedAt: string;
}
