import type { DailyWeatherRecord, JourneyState } from '../../db/types/index.js';

export const WEATHER_STORE = Symbol('WEATHER_STORE');

/**
 * 여정 상태 + 일별 기록 저장소.
 * 구현체는 실패를 StorageError 로 감싸서 던진다.
 */
export interface WeatherStore {
  findJourney(journeyKey: string): Promise<JourneyState | null>;
  saveJourney(state: JourneyState): Promise<void>;
  /** 기존 여정과 기록을 지우고 새 상태를 한 트랜잭션으로 저장. 기존 여정이 있었으면 true */
  replaceJourney(state: JourneyState): Promise<boolean>;
  /** 여정과 일별 기록을 함께 삭제. 없던 여정이면 false */
  removeJourney(journeyKey: string): Promise<boolean>;
  findDay(journeyKey: string, day: number): Promise<DailyWeatherRecord | null>;
  /** 기록(upsert) + 여정 상태를 한 트랜잭션으로: 하루 단위 원자성 경계 */
  commitDay(state: JourneyState, record: DailyWeatherRecord): Promise<void>;
}
