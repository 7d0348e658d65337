// 테스트 전용: DB 없이 WeatherStore 계약을 흉내낸다 (실패 주입 가능)

import { StorageError } from '../common/errors/weather-errors.js';
import type { DailyWeatherRecord, JourneyState } from '../db/types/index.js';
import type { WeatherStore } from '../journeys/storage/weather-store.js';

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryWeatherStore implements WeatherStore {
  private readonly journeys = new Map<string, JourneyState>();
  private readonly days = new Map<string, Map<number, DailyWeatherRecord>>();
  private failOnDay: number | null = null;
  private readonly failNext = new Set<'saveJourney' | 'replaceJourney'>();
  commits = 0;

  /** 해당 날짜의 commitDay 를 한 번 실패시킨다 */
  failCommitOnDay(day: number): this {
    this.failOnDay = day;
    return this;
  }

  /** 다음 한 번의 op 호출을 실패시킨다 */
  failNextCall(op: 'saveJourney' | 'replaceJourney'): this {
    this.failNext.add(op);
    return this;
  }

  async findJourney(journeyKey: string): Promise<JourneyState | null> {
    const state = this.journeys.get(journeyKey);
    return state ? clone(state) : null;
  }

  async saveJourney(state: JourneyState): Promise<void> {
    this.injectFailure('saveJourney');
    this.journeys.set(state.journeyKey, clone(state));
  }

  async replaceJourney(state: JourneyState): Promise<boolean> {
    this.injectFailure('replaceJourney');
    this.days.delete(state.journeyKey);
    const existed = this.journeys.has(state.journeyKey);
    this.journeys.set(state.journeyKey, clone(state));
    return existed;
  }

  async removeJourney(journeyKey: string): Promise<boolean> {
    this.days.delete(journeyKey);
    return this.journeys.delete(journeyKey);
  }

  async findDay(journeyKey: string, day: number): Promise<DailyWeatherRecord | null> {
    const record = this.days.get(journeyKey)?.get(day);
    return record ? clone(record) : null;
  }

  async commitDay(state: JourneyState, record: DailyWeatherRecord): Promise<void> {
    if (this.failOnDay === record.day) {
      this.failOnDay = null;
      throw new StorageError('Storage operation failed: commitDay', {
        op: 'commitDay',
        cause: 'injected failure',
      });
    }
    let days = this.days.get(record.journeyKey);
    if (!days) {
      days = new Map();
      this.days.set(record.journeyKey, days);
    }
    days.set(record.day, clone(record));
    this.journeys.set(state.journeyKey, clone(state));
    this.commits++;
  }

  private injectFailure(op: 'saveJourney' | 'replaceJourney'): void {
    if (!this.failNext.delete(op)) return;
    throw new StorageError(`Storage operation failed: ${op}`, {
      op,
      cause: 'injected failure',
    });
  }

  /** 저장된 날짜 번호 (오름차순) */
  storedDays(journeyKey: string): number[] {
    return [...(this.days.get(journeyKey)?.keys() ?? [])].sort((a, b) => a - b);
  }
}
