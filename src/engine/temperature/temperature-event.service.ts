// 기온 + 특수 이벤트(한파/폭염) 상태 기계
// (입력, 전날 이월 상태) → (오늘 결과, 다음 날 이월 상태). 전역 상태 없음.

import { Injectable } from '@nestjs/common';
import { InvariantViolationError } from '../../common/errors/weather-errors.js';
import { WeatherTablesService } from '../../content/weather-tables.service.js';
import type { VariationBucket } from '../../db/types/index.js';
import type {
  ActiveEvent,
  EventCarry,
  EventProgress,
  Region,
  Season,
  TemperatureCategory,
  WeatherEventKind,
} from '../../db/types/index.js';
import { d10 } from '../rng/random-source.js';
import type { RandomSource } from '../rng/random-source.js';
import { advanceCooldown, canTrigger, initialCooldown } from './cooldown.js';
import type { EventActivity } from './cooldown.js';

export const COLD_FRONT_TRIGGER_ROLL = 2;
export const HEAT_WAVE_TRIGGER_ROLL = 99;

export const COLD_FRONT_MIN_DAYS = 1;
export const COLD_FRONT_MAX_DAYS = 5;
export const HEAT_WAVE_BASE_DAYS = 10; // + d10 → 11~20
export const HEAT_WAVE_MIN_DAYS = HEAT_WAVE_BASE_DAYS + 1;
export const HEAT_WAVE_MAX_DAYS = HEAT_WAVE_BASE_DAYS + 10;

const EVENT_TEMP_MODIFIER: Record<WeatherEventKind, number> = {
  COLD_FRONT: -10,
  HEAT_WAVE: 10,
};

/** 이벤트 중 일일 변동은 ±5 로 묶는다 */
const EVENT_VARIATION_LIMIT = 5;

const ROLL_MIN = 1;
const ROLL_MAX = 100;

const EVENT_LABEL: Record<WeatherEventKind, string> = {
  COLD_FRONT: 'Cold Front',
  HEAT_WAVE: 'Heat Wave',
};

const COLD_FRONT_FIRST_DAY_NOTE = 'the sky is filled with flocks of emigrating birds';

// 실제 − 기준 온도차 → 표시 분류 (상한 inclusive, 오름차순)
const CATEGORY_THRESHOLDS: Array<[number, TemperatureCategory]> = [
  [-15, 'extremely_low'],
  [-10, 'very_low'],
  [-6, 'low'],
  [-3, 'cool'],
  [2, 'average'],
  [5, 'warm'],
  [9, 'high'],
  [14, 'very_high'],
];

export interface TemperatureInput {
  region: Region;
  season: Season;
  roll: number;
  carry: EventCarry;
}

export interface TemperatureResult {
  roll: number;
  variationBucket: VariationBucket;
  baseTemperature: number;
  actualTemperature: number;
  category: TemperatureCategory;
  description: string;
  event: ActiveEvent | null;
  next: EventCarry;
}

export function categorizeTemperature(diff: number): TemperatureCategory {
  for (const [limit, category] of CATEGORY_THRESHOLDS) {
    if (diff <= limit) return category;
  }
  return 'extremely_high';
}

export function emptyProgress(): EventProgress {
  return { remaining: 0, total: 0 };
}

/** 여정 첫날 입력: 이벤트 없음, 쿨다운 센티넬 */
export function initialCarry(): EventCarry {
  return {
    coldFront: emptyProgress(),
    heatWave: emptyProgress(),
    cooldown: initialCooldown(),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

const DURATION_RANGE: Record<WeatherEventKind, [number, number]> = {
  COLD_FRONT: [COLD_FRONT_MIN_DAYS, COLD_FRONT_MAX_DAYS],
  HEAT_WAVE: [HEAT_WAVE_MIN_DAYS, HEAT_WAVE_MAX_DAYS],
};

function assertProgress(kind: WeatherEventKind, p: EventProgress): void {
  if (!Number.isInteger(p.remaining) || !Number.isInteger(p.total)) {
    throw new InvariantViolationError(`${kind} progress must be integers`, {
      kind,
      ...p,
    });
  }
  if (p.remaining === 0) {
    if (p.total !== 0) {
      throw new InvariantViolationError(`Inactive ${kind} must carry total 0`, {
        kind,
        ...p,
      });
    }
    return;
  }
  const [min, max] = DURATION_RANGE[kind];
  // 마지막 날은 0 으로 넘기므로 이월되는 remaining 은 2 이상
  if (p.total < min || p.total > max || p.remaining < 2 || p.remaining > p.total) {
    throw new InvariantViolationError(`${kind} progress out of range`, {
      kind,
      ...p,
      totalRange: [min, max],
    });
  }
}

/** 이월 상태 검증: 위반은 보정하지 않고 던진다 */
export function assertCarry(carry: EventCarry): void {
  if (carry.coldFront.remaining > 0 && carry.heatWave.remaining > 0) {
    throw new InvariantViolationError(
      'Cold front and heat wave cannot both be active',
      { coldFront: carry.coldFront, heatWave: carry.heatWave },
    );
  }
  assertProgress('COLD_FRONT', carry.coldFront);
  assertProgress('HEAT_WAVE', carry.heatWave);
  const { daysSinceColdFront, daysSinceHeatWave } = carry.cooldown;
  for (const [name, value] of [
    ['daysSinceColdFront', daysSinceColdFront],
    ['daysSinceHeatWave', daysSinceHeatWave],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvariantViolationError(`${name} must be a non-negative integer`, {
        [name]: value,
      });
    }
  }
}

@Injectable()
export class TemperatureEventService {
  constructor(private readonly tables: WeatherTablesService) {}

  /**
   * 하루치 기온 판정.
   * 1. 활성 이벤트가 있으면 roll 을 트리거 값과 비교하지 않는다 (중첩 방지)
   * 2. 없으면 roll=2 & 한파 쿨다운 ≥7 → 한파(d5일), roll=99 & 폭염 쿨다운 ≥7 → 폭염(10+d10일)
   * 3. 쿨다운: 시작/진행 중이면 0, 아니면 +1
   * 4. 기온: 기준 + (이벤트 ±10 + 변동 ±5 | 일반 변동)
   * 5. 분류는 보정 후 실제 기온에서 다시 산출
   * 6. 시작일은 remaining=total, 이후 매일 −1, remaining=1 인 날이 마지막 날
   */
  resolveDay(input: TemperatureInput, rng: RandomSource): TemperatureResult {
    const { carry, roll } = input;
    if (!Number.isFinite(roll) || !Number.isInteger(roll)) {
      throw new InvariantViolationError('Temperature roll must be an integer', {
        roll,
      });
    }
    assertCarry(carry);
    // 난수를 소비하기 전에 조회: 알 수 없는 지역/계절이면 아무것도 바뀌지 않는다
    const baseTemperature = this.tables.baseTemperature(input.region, input.season);

    const coldActive = carry.coldFront.remaining > 0;
    const heatActive = carry.heatWave.remaining > 0;

    let event: ActiveEvent | null = null;
    if (coldActive) {
      event = this.continueEvent('COLD_FRONT', carry.coldFront);
    } else if (heatActive) {
      event = this.continueEvent('HEAT_WAVE', carry.heatWave);
    } else if (
      roll === COLD_FRONT_TRIGGER_ROLL &&
      canTrigger(carry.cooldown.daysSinceColdFront)
    ) {
      event = this.startEvent(
        'COLD_FRONT',
        rng.range(COLD_FRONT_MIN_DAYS, COLD_FRONT_MAX_DAYS),
      );
    } else if (
      roll === HEAT_WAVE_TRIGGER_ROLL &&
      canTrigger(carry.cooldown.daysSinceHeatWave)
    ) {
      event = this.startEvent('HEAT_WAVE', HEAT_WAVE_BASE_DAYS + d10(rng));
    }

    const cooldown = advanceCooldown(carry.cooldown, {
      coldFront: this.activityOf('COLD_FRONT', event),
      heatWave: this.activityOf('HEAT_WAVE', event),
    });

    // 범위 밖 roll 은 트리거 없이 테이블 양 끝 구간으로 취급
    const variation = this.tables.temperatureVariation(clamp(roll, ROLL_MIN, ROLL_MAX));
    const actualTemperature = event
      ? baseTemperature +
        EVENT_TEMP_MODIFIER[event.kind] +
        clamp(variation.delta, -EVENT_VARIATION_LIMIT, EVENT_VARIATION_LIMIT)
      : baseTemperature + variation.delta;

    const category = categorizeTemperature(actualTemperature - baseTemperature);
    const description = event
      ? `${this.tables.temperatureDescription(category)}\n${this.describeEvent(event)}`
      : this.tables.temperatureDescription(category);

    return {
      roll,
      variationBucket: variation.bucket,
      baseTemperature,
      actualTemperature,
      category,
      description,
      event,
      next: {
        coldFront: this.carryForward('COLD_FRONT', event),
        heatWave: this.carryForward('HEAT_WAVE', event),
        cooldown,
      },
    };
  }

  private startEvent(kind: WeatherEventKind, duration: number): ActiveEvent {
    return {
      kind,
      remaining: duration,
      total: duration,
      daysElapsed: 1,
      finalDay: duration === 1,
      started: true,
    };
  }

  private continueEvent(kind: WeatherEventKind, carried: EventProgress): ActiveEvent {
    const remaining = carried.remaining - 1;
    return {
      kind,
      remaining,
      total: carried.total,
      daysElapsed: carried.total - remaining + 1,
      finalDay: remaining === 1,
      started: false,
    };
  }

  private activityOf(kind: WeatherEventKind, event: ActiveEvent | null): EventActivity {
    if (!event || event.kind !== kind) return 'idle';
    return event.started ? 'started' : 'active';
  }

  /** 마지막 날이 지나면 0/0 으로 넘겨 다음 날은 비활성 */
  private carryForward(kind: WeatherEventKind, event: ActiveEvent | null): EventProgress {
    if (!event || event.kind !== kind || event.finalDay) return emptyProgress();
    return { remaining: event.remaining, total: event.total };
  }

  private describeEvent(event: ActiveEvent): string {
    let line = `${EVENT_LABEL[event.kind]}: Day ${event.daysElapsed} of ${event.total}`;
    if (event.finalDay) line += ' (Final Day)';
    if (event.started && event.kind === 'COLD_FRONT') {
      line += ` - ${COLD_FRONT_FIRST_DAY_NOTE}`;
    }
    return line;
  }
}
