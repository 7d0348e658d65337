// 이벤트 종류별 "마지막 발생 이후 일수" 카운터
// Inactive(counter) 중 counter < 7 구간이 곧 쿨다운

import type { CooldownState } from '../../db/types/index.js';

/** 한 번도 발생하지 않음 */
export const COOLDOWN_NEVER = 99;
export const EVENT_COOLDOWN_DAYS = 7;

/** 그날 해당 이벤트의 상태 */
export type EventActivity = 'started' | 'active' | 'idle';

export function initialCooldown(): CooldownState {
  return {
    daysSinceColdFront: COOLDOWN_NEVER,
    daysSinceHeatWave: COOLDOWN_NEVER,
  };
}

export function canTrigger(daysSince: number): boolean {
  return daysSince >= EVENT_COOLDOWN_DAYS;
}

/**
 * started → 0, active → 0 유지, idle → +1 (상한 없음).
 * 마지막 날까지 active 이므로 증가는 종료 다음 날부터 시작된다.
 */
export function advanceCounter(counter: number, activity: EventActivity): number {
  return activity === 'idle' ? counter + 1 : 0;
}

export function advanceCooldown(
  state: CooldownState,
  activity: { coldFront: EventActivity; heatWave: EventActivity },
): CooldownState {
  return {
    daysSinceColdFront: advanceCounter(state.daysSinceColdFront, activity.coldFront),
    daysSinceHeatWave: advanceCounter(state.daysSinceHeatWave, activity.heatWave),
  };
}
