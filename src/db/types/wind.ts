import type { DayPeriod, WindDirection, WindStrength } from './enums.js';

/** 다음 구간(또는 다음 날 dawn)으로 이월되는 최소 바람 정보 */
export interface WindState {
  strength: WindStrength;
  direction: WindDirection;
}

export interface WindModifiers {
  speedPct: number; // 기본 이동 속도 대비 증감 %
  handlingPenalty: number; // Boat Handling 판정 보정 (0 또는 음수)
  requiresTacking: boolean;
  notes: string | null;
}

export interface WindReading extends WindState {
  period: DayPeriod;
  speedPct: number;
  handlingPenalty: number;
  requiresTacking: boolean;
  changed: boolean;
}
