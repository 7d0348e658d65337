// 환경 변수 기본값: 생성 시 1회 읽는다

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';

export interface WeatherConfig {
  port: number;
  databaseUrl: string;
  contentDir: string;
  defaultStageDays: number;
  maxStageDays: number;
}

const DEFAULT_PORT = 3000;
const DEFAULT_STAGE_DAYS = 3;
const DEFAULT_MAX_STAGE_DAYS = 14;

@Injectable()
export class WeatherConfigService {
  private readonly logger = new Logger(WeatherConfigService.name);
  private readonly config: WeatherConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const maxStageDays = this.readInt(
      env,
      'MAX_STAGE_DAYS',
      DEFAULT_MAX_STAGE_DAYS,
      1,
      365,
    );
    this.config = {
      port: this.readInt(env, 'PORT', DEFAULT_PORT, 1, 65535),
      databaseUrl: env.DATABASE_URL ?? '',
      contentDir:
        env.WEATHER_CONTENT_DIR ?? join(process.cwd(), 'content', 'weather'),
      defaultStageDays: this.readInt(
        env,
        'DEFAULT_STAGE_DAYS',
        Math.min(DEFAULT_STAGE_DAYS, maxStageDays),
        1,
        maxStageDays,
      ),
      maxStageDays,
    };
  }

  get(): WeatherConfig {
    return this.config;
  }

  private readInt(
    env: NodeJS.ProcessEnv,
    key: string,
    fallback: number,
    min: number,
    max: number,
  ): number {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      this.logger.warn(
        `${key}=${raw} is not an integer in [${min}, ${max}], using ${fallback}`,
      );
      return fallback;
    }
    return value;
  }
}
