import { integer, jsonb, pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import { REGION, SEASON } from '../types/index.js';
import type { EventCarry, WindState } from '../types/index.js';

export const journeys = pgTable('journeys', {
  journeyKey: text('journey_key').primaryKey(),
  currentDay: integer('current_day').notNull().default(1),
  currentStage: integer('current_stage').notNull().default(1),
  stageDays: integer('stage_days').notNull(),
  region: text('region', { enum: REGION }).notNull(),
  season: text('season', { enum: SEASON }).notNull(),

  // 재현용 난수 상태
  seed: text('seed').notNull(),
  rngCursor: integer('rng_cursor').notNull().default(0),

  // 다음 날로 이월
  lastWind: jsonb('last_wind').$type<WindState>(),
  carry: jsonb('carry').$type<EventCarry>().notNull(),

  coldFrontsSeen: integer('cold_fronts_seen').notNull().default(0),
  heatWavesSeen: integer('heat_waves_seen').notNull().default(0),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
