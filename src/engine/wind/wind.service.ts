import { Injectable } from '@nestjs/common';
import { WeatherTablesService } from '../../content/weather-tables.service.js';
import { DAY_PERIOD, WIND_STRENGTH } from '../../db/types/index.js';
import type {
  DayPeriod,
  WindReading,
  WindState,
  WindStrength,
} from '../../db/types/index.js';
import { d10 } from '../rng/random-source.js';
import type { RandomSource } from '../rng/random-source.js';

/** 구간마다 d10=1 (10%) 이면 세기/방향을 새로 굴린다 */
const WIND_CHANGE_ROLL = 1;

@Injectable()
export class WindService {
  constructor(private readonly tables: WeatherTablesService) {}

  /**
   * 하루 4구간 바람.
   * - dawn 은 전날 midnight 을 이어받는다 (첫날은 새로 굴림, changed=false)
   * - 각 구간 10% 확률로 새 세기+방향, 아니면 직전 구간 유지
   */
  generateDay(previous: WindState | null, rng: RandomSource): WindReading[] {
    const timeline: WindReading[] = [];
    let current: WindState | null = previous;

    for (const period of DAY_PERIOD) {
      if (current === null) {
        current = this.rollWind(rng);
        timeline.push(this.annotate(period, current, false));
        continue;
      }

      let changed = false;
      if (d10(rng) === WIND_CHANGE_ROLL) {
        const rolled = this.rollWind(rng);
        changed =
          rolled.strength !== current.strength ||
          rolled.direction !== current.direction;
        current = rolled;
      }
      timeline.push(this.annotate(period, current, changed));
    }

    return timeline;
  }

  /** d10 세기 + d10 방향 */
  rollWind(rng: RandomSource): WindState {
    const strength = this.tables.windStrength(d10(rng));
    const direction = this.tables.windDirection(d10(rng));
    return { strength, direction };
  }

  /** 그날 가장 잦은 세기: 동률이면 더 센 쪽 */
  dominantStrength(timeline: WindReading[]): WindStrength {
    const counts = new Map<WindStrength, number>();
    for (const w of timeline) {
      counts.set(w.strength, (counts.get(w.strength) ?? 0) + 1);
    }
    let best: WindStrength = 'calm';
    let bestCount = 0;
    for (const strength of WIND_STRENGTH) {
      const count = counts.get(strength) ?? 0;
      if (count > 0 && count >= bestCount) {
        best = strength;
        bestCount = count;
      }
    }
    return best;
  }

  lastReading(timeline: WindReading[]): WindState | null {
    const last = timeline[timeline.length - 1];
    return last ? { strength: last.strength, direction: last.direction } : null;
  }

  continuityNote(previous: WindState | null, previousDay: number): string | null {
    if (!previous || previousDay < 1) return null;
    return `Wind carried over from day ${previousDay} midnight: ${previous.strength} ${previous.direction}`;
  }

  private annotate(
    period: DayPeriod,
    wind: WindState,
    changed: boolean,
  ): WindReading {
    const mods = this.tables.windModifiers(wind.strength, wind.direction);
    return {
      period,
      strength: wind.strength,
      direction: wind.direction,
      speedPct: mods.speedPct,
      handlingPenalty: mods.handlingPenalty,
      requiresTacking: mods.requiresTacking,
      changed,
    };
  }
}
