// 테스트 전용: 실제 content/weather JSON 을 읽어 테이블 서비스를 만든다

import { join } from 'path';
import { WeatherConfigService } from '../config/weather-config.service.js';
import {
  WeatherTablesService,
  buildWeatherTables,
  loadWeatherContent,
} from '../content/weather-tables.service.js';
import type { WeatherContentFiles } from '../content/content.types.js';

export const CONTENT_DIR = join(__dirname, '..', '..', 'content', 'weather');

let cached: WeatherContentFiles | null = null;

export async function loadTestContent(): Promise<WeatherContentFiles> {
  if (!cached) cached = await loadWeatherContent(CONTENT_DIR);
  return cached;
}

export async function loadTestTables(): Promise<WeatherTablesService> {
  const service = new WeatherTablesService(
    new WeatherConfigService({ WEATHER_CONTENT_DIR: CONTENT_DIR }),
  );
  return service.install(buildWeatherTables(await loadTestContent()));
}
