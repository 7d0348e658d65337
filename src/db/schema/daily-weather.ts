import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';
import {
  REGION,
  SEASON,
  TEMPERATURE_CATEGORY,
  WEATHER_TYPE,
} from '../types/index.js';
import type {
  EventCarry,
  WeatherEffects,
  WindReading,
} from '../types/index.js';
import { journeys } from './journeys.js';

export const dailyWeather = pgTable(
  'daily_weather',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    journeyKey: text('journey_key')
      .notNull()
      .references(() => journeys.journeyKey, { onDelete: 'cascade' }),
    dayNumber: integer('day_number').notNull(),
    region: text('region', { enum: REGION }).notNull(),
    season: text('season', { enum: SEASON }).notNull(),

    // 바람
    windTimeline: jsonb('wind_timeline').$type<WindReading[]>().notNull(),
    continuityNote: text('continuity_note'),

    // 날씨 유형
    weatherRoll: integer('weather_roll').notNull(),
    weatherType: text('weather_type', { enum: WEATHER_TYPE }).notNull(),
    weatherEffects: jsonb('weather_effects').$type<WeatherEffects>().notNull(),

    // 기온
    temperatureRoll: integer('temperature_roll').notNull(),
    baseTemperature: integer('base_temperature').notNull(),
    actualTemperature: integer('actual_temperature').notNull(),
    perceivedTemperature: integer('perceived_temperature').notNull(),
    category: text('category', { enum: TEMPERATURE_CATEGORY }).notNull(),
    description: text('description').notNull(),

    // 이벤트 진행 (그날 기준, 0 = 비활성)
    coldFrontRemaining: integer('cold_front_remaining').notNull().default(0),
    coldFrontTotal: integer('cold_front_total').notNull().default(0),
    heatWaveRemaining: integer('heat_wave_remaining').notNull().default(0),
    heatWaveTotal: integer('heat_wave_total').notNull().default(0),
    nextCarry: jsonb('next_carry').$type<EventCarry>().notNull(),

    generatedAt: timestamp('generated_at').defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex('daily_weather_journey_day_idx').on(
      table.journeyKey,
      table.dayNumber,
    ),
    index('daily_weather_generated_at_idx').on(table.generatedAt),
  ],
);
