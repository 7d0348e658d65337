// 날짜 사이에 이월되는 특수 이벤트/쿨다운 상태

import type { WeatherEventKind } from './enums.js';

export interface EventProgress {
  remaining: number; // 0 = 비활성
  total: number; // 시작 시 확정, 진행 중 불변
}

export interface CooldownState {
  daysSinceColdFront: number;
  daysSinceHeatWave: number;
}

/** 다음 날 엔진 호출에 그대로 넘기는 묶음 */
export interface EventCarry {
  coldFront: EventProgress;
  heatWave: EventProgress;
  cooldown: CooldownState;
}

/** 그날 기록에 표시되는 이벤트 진행 정보 */
export interface ActiveEvent {
  kind: WeatherEventKind;
  remaining: number; // 오늘 포함 남은 일수
  total: number;
  daysElapsed: number;
  finalDay: boolean;
  started: boolean;
}
