import { WindService } from './wind.service.js';
import { ScriptedRandom } from '../../testing/scripted-random.js';
import { loadTestTables } from '../../testing/weather-tables.fixture.js';
import type { WindReading, WindStrength } from '../../db/types/index.js';

function reading(strength: WindStrength): WindReading {
  return {
    period: 'dawn',
    strength,
    direction: 'sidewind',
    speedPct: 0,
    handlingPenalty: 0,
    requiresTacking: false,
    changed: false,
  };
}

describe('WindService', () => {
  let service: WindService;

  beforeEach(async () => {
    service = new WindService(await loadTestTables());
  });

  describe('generateDay', () => {
    it('첫날 dawn 은 새로 굴리고 changed=false', () => {
      // dawn: 세기 5(bracing) 방향 9(headwind)
      // midday: 변화 판정 4 → 유지
      // dusk: 변화 판정 1 → 세기 10(very_strong) 방향 2(tailwind)
      // midnight: 변화 판정 7 → 유지
      const rng = new ScriptedRandom([5, 9, 4, 1, 10, 2, 7]);
      const timeline = service.generateDay(null, rng);

      expect(timeline.map((w) => w.period)).toEqual([
        'dawn',
        'midday',
        'dusk',
        'midnight',
      ]);
      expect(timeline[0]).toEqual({
        period: 'dawn',
        strength: 'bracing',
        direction: 'headwind',
        speedPct: -10,
        handlingPenalty: 0,
        requiresTacking: false,
        changed: false,
      });
      expect(timeline[1].strength).toBe('bracing');
      expect(timeline[1].changed).toBe(false);
      expect(timeline[2]).toEqual({
        period: 'dusk',
        strength: 'very_strong',
        direction: 'tailwind',
        speedPct: 25,
        handlingPenalty: 0,
        requiresTacking: true,
        changed: true,
      });
      expect(timeline[3].strength).toBe('very_strong');
      expect(timeline[3].direction).toBe('tailwind');
      expect(timeline[3].changed).toBe(false);
      expect(rng.remaining).toBe(0);
    });

    it('전날 midnight 을 이어받고, 변화가 없으면 4구간 모두 유지', () => {
      const rng = new ScriptedRandom([2, 3, 4, 5]);
      const timeline = service.generateDay(
        { strength: 'strong', direction: 'sidewind' },
        rng,
      );
      for (const w of timeline) {
        expect(w.strength).toBe('strong');
        expect(w.direction).toBe('sidewind');
        expect(w.speedPct).toBe(10);
        expect(w.requiresTacking).toBe(true);
        expect(w.changed).toBe(false);
      }
      // 구간당 변화 판정 1회씩만 소비
      expect(rng.calls).toHaveLength(4);
    });

    it('dawn 에서도 10% 변화 판정을 한다', () => {
      const rng = new ScriptedRandom([1, 1, 1, 6, 6, 6]);
      const timeline = service.generateDay(
        { strength: 'light', direction: 'headwind' },
        rng,
      );
      expect(timeline[0].strength).toBe('calm');
      expect(timeline[0].direction).toBe('tailwind');
      expect(timeline[0].changed).toBe(true);
      expect(timeline[0].speedPct).toBe(-75);
      expect(timeline[0].handlingPenalty).toBe(-10);
    });

    it('새로 굴린 값이 직전과 같으면 changed=false', () => {
      // dawn 변화 판정 1 → 세기 3(light) 방향 9(headwind) = 직전과 동일
      const rng = new ScriptedRandom([1, 3, 9, 5, 5, 5]);
      const timeline = service.generateDay(
        { strength: 'light', direction: 'headwind' },
        rng,
      );
      expect(timeline[0].changed).toBe(false);
      expect(timeline[0].speedPct).toBe(-5);
    });
  });

  describe('dominantStrength', () => {
    it('가장 잦은 세기', () => {
      const strengths: WindStrength[] = ['light', 'light', 'light', 'strong'];
      const timeline = strengths.map((s) => reading(s));
      expect(service.dominantStrength(timeline)).toBe('light');
    });

    it('동률이면 더 센 쪽', () => {
      const timeline = [
        reading('calm'),
        reading('strong'),
        reading('calm'),
        reading('strong'),
      ];
      expect(service.dominantStrength(timeline)).toBe('strong');
    });
  });

  describe('lastReading / continuityNote', () => {
    it('midnight 값을 다음 날로 넘긴다', () => {
      const timeline = [reading('calm'), reading('light')];
      expect(service.lastReading(timeline)).toEqual({
        strength: 'light',
        direction: 'sidewind',
      });
      expect(service.lastReading([])).toBeNull();
    });

    it('이월된 바람이 있을 때만 안내 문구', () => {
      expect(
        service.continuityNote({ strength: 'strong', direction: 'headwind' }, 3),
      ).toBe('Wind carried over from day 3 midnight: strong headwind');
      expect(service.continuityNote(null, 3)).toBeNull();
    });
  });
});
