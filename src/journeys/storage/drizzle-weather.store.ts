import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import { StorageError } from '../../common/errors/weather-errors.js';
import { DB, type DrizzleDB } from '../../db/drizzle.module.js';
import { dailyWeather, journeys } from '../../db/schema/index.js';
import type { DailyWeatherRecord, JourneyState } from '../../db/types/index.js';
import type { WeatherStore } from './weather-store.js';

type JourneyRow = typeof journeys.$inferSelect;
type DailyWeatherRow = typeof dailyWeather.$inferSelect;

function toJourneyState(row: JourneyRow): JourneyState {
  return {
    journeyKey: row.journeyKey,
    currentDay: row.currentDay,
    currentStage: row.currentStage,
    stageDays: row.stageDays,
    region: row.region,
    season: row.season,
    seed: row.seed,
    rngCursor: row.rngCursor,
    lastWind: row.lastWind,
    carry: row.carry,
    coldFrontsSeen: row.coldFrontsSeen,
    heatWavesSeen: row.heatWavesSeen,
  };
}

function toJourneyValues(state: JourneyState) {
  return {
    journeyKey: state.journeyKey,
    currentDay: state.currentDay,
    currentStage: state.currentStage,
    stageDays: state.stageDays,
    region: state.region,
    season: state.season,
    seed: state.seed,
    rngCursor: state.rngCursor,
    lastWind: state.lastWind,
    carry: state.carry,
    coldFrontsSeen: state.coldFrontsSeen,
    heatWavesSeen: state.heatWavesSeen,
    updatedAt: new Date(),
  };
}

function toRecord(row: DailyWeatherRow): DailyWeatherRecord {
  return {
    journeyKey: row.journeyKey,
    day: row.dayNumber,
    region: row.region,
    season: row.season,
    windTimeline: row.windTimeline,
    continuityNote: row.continuityNote,
    weatherRoll: row.weatherRoll,
    weatherType: row.weatherType,
    weatherEffects: row.weatherEffects,
    temperatureRoll: row.temperatureRoll,
    baseTemperature: row.baseTemperature,
    actualTemperature: row.actualTemperature,
    perceivedTemperature: row.perceivedTemperature,
    category: row.category,
    description: row.description,
    coldFrontRemaining: row.coldFrontRemaining,
    coldFrontTotal: row.coldFrontTotal,
    heatWaveRemaining: row.heatWaveRemaining,
    heatWaveTotal: row.heatWaveTotal,
    nextCarry: row.nextCarry,
    generatedAt: row.generatedAt.toISOString(),
  };
}

function toRecordValues(record: DailyWeatherRecord) {
  const { day, generatedAt, ...rest } = record;
  return { ...rest, dayNumber: day, generatedAt: new Date(generatedAt) };
}

@Injectable()
export class DrizzleWeatherStore implements WeatherStore {
  private readonly logger = new Logger(DrizzleWeatherStore.name);

  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async findJourney(journeyKey: string): Promise<JourneyState | null> {
    const row = await this.guard('findJourney', () =>
      this.db.query.journeys.findFirst({
        where: eq(journeys.journeyKey, journeyKey),
      }),
    );
    return row ? toJourneyState(row) : null;
  }

  async saveJourney(state: JourneyState): Promise<void> {
    const values = toJourneyValues(state);
    await this.guard('saveJourney', () =>
      this.db
        .insert(journeys)
        .values(values)
        .onConflictDoUpdate({ target: journeys.journeyKey, set: values }),
    );
  }

  async replaceJourney(state: JourneyState): Promise<boolean> {
    const values = toJourneyValues(state);
    return this.guard('replaceJourney', () =>
      this.db.transaction(async (tx) => {
        const deleted = await tx
          .delete(journeys)
          .where(eq(journeys.journeyKey, state.journeyKey))
          .returning({ journeyKey: journeys.journeyKey });
        await tx.insert(journeys).values(values);
        return deleted.length > 0;
      }),
    );
  }

  async removeJourney(journeyKey: string): Promise<boolean> {
    // daily_weather 는 FK cascade 로 함께 삭제
    const deleted = await this.guard('removeJourney', () =>
      this.db
        .delete(journeys)
        .where(eq(journeys.journeyKey, journeyKey))
        .returning({ journeyKey: journeys.journeyKey }),
    );
    return deleted.length > 0;
  }

  async findDay(journeyKey: string, day: number): Promise<DailyWeatherRecord | null> {
    const row = await this.guard('findDay', () =>
      this.db.query.dailyWeather.findFirst({
        where: and(
          eq(dailyWeather.journeyKey, journeyKey),
          eq(dailyWeather.dayNumber, day),
        ),
      }),
    );
    return row ? toRecord(row) : null;
  }

  async commitDay(state: JourneyState, record: DailyWeatherRecord): Promise<void> {
    const journeyValues = toJourneyValues(state);
    const recordValues = toRecordValues(record);
    await this.guard('commitDay', () =>
      this.db.transaction(async (tx) => {
        // 여정 행이 먼저 있어야 FK 가 성립
        await tx
          .insert(journeys)
          .values(journeyValues)
          .onConflictDoUpdate({ target: journeys.journeyKey, set: journeyValues });
        await tx
          .insert(dailyWeather)
          .values(recordValues)
          .onConflictDoUpdate({
            target: [dailyWeather.journeyKey, dailyWeather.dayNumber],
            set: recordValues,
          });
      }),
    );
  }

  private async guard<T>(op: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      const cause = err instanceof Error ? err.message : String(err);
      this.logger.error(`${op} failed: ${cause}`);
      throw new StorageError(`Storage operation failed: ${op}`, { op, cause });
    }
  }
}
