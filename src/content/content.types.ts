// content/weather/*.json 스키마: 로드 시 1회 검증

import { z } from 'zod';
import {
  REGION,
  SEASON,
  TEMPERATURE_CATEGORY,
  VARIATION_BUCKET,
  WEATHER_TYPE,
  WIND_DIRECTION,
  WIND_STRENGTH,
} from '../db/types/index.js';
import type {
  Season,
  TemperatureCategory,
  VariationBucket,
  WeatherEffects,
  WeatherType,
  WindDirection,
  WindModifiers,
  WindStrength,
} from '../db/types/index.js';

const rollRange = {
  min: z.number().int(),
  max: z.number().int(),
};

const seasonTemperatures = z.object({
  spring: z.number().int(),
  summer: z.number().int(),
  autumn: z.number().int(),
  winter: z.number().int(),
});

export const RegionsFileSchema = z.record(z.enum(REGION), seasonTemperatures);

const weatherRange = z.object({ ...rollRange, type: z.enum(WEATHER_TYPE) });

export const WeatherTypesFileSchema = z.object({
  ranges: z.record(z.enum(SEASON), z.array(weatherRange).min(1)),
  effects: z.record(
    z.enum(WEATHER_TYPE),
    z.object({
      name: z.string().min(1),
      description: z.string(),
      effects: z.array(z.string()),
    }),
  ),
});

export const WindFileSchema = z.object({
  strengthRolls: z
    .array(z.object({ ...rollRange, value: z.enum(WIND_STRENGTH) }))
    .min(1),
  directionRolls: z
    .array(z.object({ ...rollRange, value: z.enum(WIND_DIRECTION) }))
    .min(1),
  modifiers: z.array(
    z.object({
      strength: z.enum(WIND_STRENGTH),
      direction: z.enum(WIND_DIRECTION),
      speedPct: z.number().int(),
      handlingPenalty: z.number().int().max(0),
      requiresTacking: z.boolean(),
      notes: z.string().nullable(),
    }),
  ),
});

export const TemperatureFileSchema = z.object({
  variation: z
    .array(
      z.object({
        ...rollRange,
        bucket: z.enum(VARIATION_BUCKET),
        delta: z.number().int(),
      }),
    )
    .min(1),
  descriptions: z.record(z.enum(TEMPERATURE_CATEGORY), z.string().min(1)),
});

export type RegionsFile = z.infer<typeof RegionsFileSchema>;
export type WeatherTypesFile = z.infer<typeof WeatherTypesFileSchema>;
export type WindFile = z.infer<typeof WindFileSchema>;
export type TemperatureFile = z.infer<typeof TemperatureFileSchema>;

export interface WeatherContentFiles {
  regions: RegionsFile;
  weatherTypes: WeatherTypesFile;
  wind: WindFile;
  temperature: TemperatureFile;
}

export interface RollRange<T> {
  min: number;
  max: number;
  value: T;
}

export interface VariationEntry {
  bucket: VariationBucket;
  delta: number;
}

/** 검증이 끝난 조회 테이블 (키 → 값) */
export interface WeatherTables {
  baseTemperatures: Map<string, number>; // `${region}:${season}`
  weatherRanges: Map<Season, RollRange<WeatherType>[]>;
  weatherEffects: Map<WeatherType, WeatherEffects>;
  strengthRolls: RollRange<WindStrength>[];
  directionRolls: RollRange<WindDirection>[];
  windModifiers: Map<string, WindModifiers>; // `${strength}:${direction}`
  variation: RollRange<VariationEntry>[];
  descriptions: Map<TemperatureCategory, string>;
}

export function temperatureKey(region: string, season: string): string {
  return `${region}:${season}`;
}

export function windKey(strength: string, direction: string): string {
  return `${strength}:${direction}`;
}
