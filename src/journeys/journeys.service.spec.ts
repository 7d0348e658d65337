import { JourneysService } from './journeys.service.js';
import { StageOrchestratorService } from './stage-orchestrator.service.js';
import { WeatherConfigService } from '../config/weather-config.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { WindService } from '../engine/wind/wind.service.js';
import { COOLDOWN_NEVER } from '../engine/temperature/cooldown.js';
import {
  InvalidInputError,
  NotFoundError,
  StorageError,
} from '../common/errors/weather-errors.js';
import { InMemoryWeatherStore } from '../testing/in-memory-weather.store.js';
import { createDailyWeatherService } from '../testing/engine.fixture.js';
import { loadTestTables } from '../testing/weather-tables.fixture.js';

describe('JourneysService', () => {
  let store: InMemoryWeatherStore;
  let service: JourneysService;

  beforeEach(async () => {
    const tables = await loadTestTables();
    const config = new WeatherConfigService({ DEFAULT_STAGE_DAYS: '4' });
    const rng = new RngService();
    store = new InMemoryWeatherStore();
    const orchestrator = new StageOrchestratorService(
      store,
      createDailyWeatherService(tables),
      new WindService(tables),
      rng,
      config,
    );
    service = new JourneysService(store, orchestrator, rng, config);
  });

  describe('startJourney', () => {
    it('첫날, stage 1, 쿨다운 센티넬, 이벤트 없음으로 시작', async () => {
      const state = await service.startJourney('barge-1', 'stirland', 'summer');

      expect(state).toMatchObject({
        journeyKey: 'barge-1',
        currentDay: 1,
        currentStage: 1,
        stageDays: 4,
        region: 'stirland',
        season: 'summer',
        rngCursor: 0,
        lastWind: null,
        coldFrontsSeen: 0,
        heatWavesSeen: 0,
      });
      expect(state.carry).toEqual({
        coldFront: { remaining: 0, total: 0 },
        heatWave: { remaining: 0, total: 0 },
        cooldown: {
          daysSinceColdFront: COOLDOWN_NEVER,
          daysSinceHeatWave: COOLDOWN_NEVER,
        },
      });
      expect(state.seed).not.toBe('');
      expect(await service.getJourney('barge-1')).toEqual(state);
    });

    it('같은 키로 다시 시작하면 기존 기록을 지운다', async () => {
      await service.startJourney('barge-1', 'stirland', 'summer');
      await service.generateStage('barge-1', 2);
      expect(store.storedDays('barge-1')).toEqual([1, 2]);

      const restarted = await service.startJourney('barge-1', 'kislev', 'winter', 2);
      expect(restarted.currentDay).toBe(1);
      expect(restarted.stageDays).toBe(2);
      expect(store.storedDays('barge-1')).toEqual([]);
      await expect(service.getDay('barge-1', 1)).rejects.toThrow(NotFoundError);
    });

    it('교체 저장이 실패하면 기존 여정과 기록이 남는다', async () => {
      const original = await service.startJourney('barge-1', 'stirland', 'summer');
      await service.generateStage('barge-1', 2);
      store.failNextCall('replaceJourney');

      await expect(
        service.startJourney('barge-1', 'kislev', 'winter'),
      ).rejects.toThrow(StorageError);

      const kept = await service.getJourney('barge-1');
      expect(kept.seed).toBe(original.seed);
      expect(kept.region).toBe('stirland');
      expect(kept.currentDay).toBe(3);
      expect(store.storedDays('barge-1')).toEqual([1, 2]);
    });

    it('stageDays 가 범위 밖이면 InvalidInputError', async () => {
      await expect(
        service.startJourney('barge-1', 'stirland', 'summer', 15),
      ).rejects.toThrow(InvalidInputError);
      expect(await store.findJourney('barge-1')).toBeNull();
    });
  });

  describe('configureStage / generateStage', () => {
    it('구간 길이를 바꾸면 다음 구간부터 적용', async () => {
      await service.startJourney('barge-2', 'averland', 'autumn');
      const updated = await service.configureStage('barge-2', 2);
      expect(updated.stageDays).toBe(2);

      const { records, journey } = await service.generateStage('barge-2');
      expect(records.map((r) => r.day)).toEqual([1, 2]);
      expect(journey.currentStage).toBe(2);
    });

    it('0 일 구간은 거부', async () => {
      await service.startJourney('barge-2', 'averland', 'autumn');
      await expect(service.configureStage('barge-2', 0)).rejects.toThrow(
        InvalidInputError,
      );
    });
  });

  describe('getDay', () => {
    it('생성된 날은 저장된 기록을 그대로 돌려준다', async () => {
      await service.startJourney('barge-3', 'reikland', 'spring');
      const { records } = await service.generateStage('barge-3', 3);

      expect(await service.getDay('barge-3', 2)).toEqual(records[1]);
      // 조회는 상태를 바꾸지 않는다
      expect((await service.getJourney('barge-3')).currentDay).toBe(4);
    });

    it('생성 전 날짜는 NotFoundError', async () => {
      await service.startJourney('barge-3', 'reikland', 'spring');
      await expect(service.getDay('barge-3', 1)).rejects.toThrow(NotFoundError);
    });
  });

  describe('endJourney', () => {
    it('요약을 돌려주고 여정과 기록을 삭제', async () => {
      await service.startJourney('barge-4', 'nordland', 'winter', 3);
      const { journey } = await service.generateStage('barge-4');
      await service.overrideDay('barge-4', { region: 'kislev', season: 'winter' });

      const summary = await service.endJourney('barge-4');
      expect(summary).toMatchObject({
        journeyKey: 'barge-4',
        region: 'nordland',
        season: 'winter',
        daysTravelled: 4,
        stagesCompleted: 1,
      });
      expect(summary.coldFrontsSeen).toBeGreaterThanOrEqual(journey.coldFrontsSeen);
      expect(summary.heatWavesSeen).toBeGreaterThanOrEqual(journey.heatWavesSeen);
      await expect(service.getJourney('barge-4')).rejects.toThrow(NotFoundError);
      expect(store.storedDays('barge-4')).toEqual([]);
    });

    it('없는 여정 종료는 NotFoundError', async () => {
      await expect(service.endJourney('ghost')).rejects.toThrow(NotFoundError);
    });
  });
});
