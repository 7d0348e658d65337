import { DailyWeatherService } from './daily-weather.service.js';
import type { DayInput } from './daily-weather.service.js';
import { initialCooldown } from '../temperature/cooldown.js';
import { WeatherTablesService } from '../../content/weather-tables.service.js';
import { WeatherConfigService } from '../../config/weather-config.service.js';
import { ConfigurationError } from '../../common/errors/weather-errors.js';
import { ScriptedRandom } from '../../testing/scripted-random.js';
import { createDailyWeatherService } from '../../testing/engine.fixture.js';
import { loadTestTables } from '../../testing/weather-tables.fixture.js';

const FIXED_AT = new Date('2026-03-01T08:00:00.000Z');

function dayInput(overrides: Partial<DayInput> = {}): DayInput {
  return {
    journeyKey: 'guild-1',
    day: 1,
    region: 'reikland',
    season: 'spring',
    previousWind: null,
    carry: {
      coldFront: { remaining: 0, total: 0 },
      heatWave: { remaining: 0, total: 0 },
      cooldown: initialCooldown(),
    },
    generatedAt: FIXED_AT,
    ...overrides,
  };
}

describe('DailyWeatherService', () => {
  let tables: WeatherTablesService;
  let service: DailyWeatherService;

  beforeEach(async () => {
    tables = await loadTestTables();
    service = createDailyWeatherService(tables);
  });

  it('바람 → 날씨 → 기온 → 지속일 순서로 소비', () => {
    // 바람 7회, 날씨 50(rain), 기온 2(한파), 지속 3일
    const rng = new ScriptedRandom([5, 9, 4, 1, 10, 2, 7, 50, 2, 3]);
    const { record, temperature, lastWind } = service.generateDay(dayInput(), rng);

    expect(rng.calls.map((c) => c.max)).toEqual([10, 10, 10, 10, 10, 10, 10, 100, 100, 5]);
    expect(rng.remaining).toBe(0);

    expect(record.windTimeline.map((w) => w.strength)).toEqual([
      'bracing',
      'bracing',
      'very_strong',
      'very_strong',
    ]);
    expect(lastWind).toEqual({ strength: 'very_strong', direction: 'tailwind' });
    expect(record.continuityNote).toBeNull();

    expect(record.weatherRoll).toBe(50);
    expect(record.weatherType).toBe('rain');
    expect(record.weatherEffects.name).toBe('Rain');

    expect(record.temperatureRoll).toBe(2);
    expect(record.baseTemperature).toBe(9);
    expect(record.actualTemperature).toBe(-6);
    // 동률(bracing 2, very_strong 2) → very_strong → −10
    expect(record.perceivedTemperature).toBe(-16);
    expect(record.category).toBe('extremely_low');
    expect(record.coldFrontRemaining).toBe(3);
    expect(record.coldFrontTotal).toBe(3);
    expect(record.heatWaveRemaining).toBe(0);
    expect(record.heatWaveTotal).toBe(0);
    expect(record.nextCarry).toEqual(temperature.next);
    expect(record.generatedAt).toBe('2026-03-01T08:00:00.000Z');
  });

  it('전날 바람을 이어받으면 continuityNote 를 남긴다', () => {
    const rng = new ScriptedRandom([2, 3, 4, 5, 95, 50]);
    const { record } = service.generateDay(
      dayInput({ day: 2, previousWind: { strength: 'strong', direction: 'sidewind' } }),
      rng,
    );

    expect(record.day).toBe(2);
    expect(record.continuityNote).toBe(
      'Wind carried over from day 1 midnight: strong sidewind',
    );
    expect(record.weatherType).toBe('downpour');
    expect(record.actualTemperature).toBe(9);
    expect(record.perceivedTemperature).toBe(-1);
    expect(record.category).toBe('average');
    expect(record.description).toBe('Average for the season and region');
    expect(record.nextCarry.cooldown).toEqual({
      daysSinceColdFront: 100,
      daysSinceHeatWave: 100,
    });
  });

  it('calm 이 우세하면 체감 기온 보정 없음', () => {
    const rng = new ScriptedRandom([2, 3, 4, 5, 1, 60]);
    const { record } = service.generateDay(
      dayInput({ previousWind: { strength: 'calm', direction: 'headwind' }, day: 5 }),
      rng,
    );
    expect(record.weatherType).toBe('dry');
    expect(record.perceivedTemperature).toBe(record.actualTemperature);
  });

  it('기준 기온이 없으면 난수를 하나도 쓰지 않는다', () => {
    const broken = new WeatherTablesService(new WeatherConfigService({})).install({
      ...tables.snapshot(),
      baseTemperatures: new Map(),
    });
    const rng = new ScriptedRandom([5, 9, 4, 1, 10, 2, 7, 50, 2, 3]);

    expect(() =>
      createDailyWeatherService(broken).generateDay(dayInput(), rng),
    ).toThrow(ConfigurationError);
    expect(rng.calls).toHaveLength(0);
  });
});
