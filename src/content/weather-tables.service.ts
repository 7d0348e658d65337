// content/weather JSON 로드 + 검증 + 메모리 조회 테이블

import { HttpStatus, Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { ConfigurationError } from '../common/errors/weather-errors.js';
import { WeatherConfigService } from '../config/weather-config.service.js';
import {
  REGION,
  SEASON,
  TEMPERATURE_CATEGORY,
  WEATHER_TYPE,
  WIND_DIRECTION,
  WIND_STRENGTH,
} from '../db/types/index.js';
import type {
  Region,
  Season,
  TemperatureCategory,
  WeatherEffects,
  WeatherType,
  WindDirection,
  WindModifiers,
  WindStrength,
} from '../db/types/index.js';
import {
  RegionsFileSchema,
  TemperatureFileSchema,
  WeatherTypesFileSchema,
  WindFileSchema,
  temperatureKey,
  windKey,
} from './content.types.js';
import type {
  RollRange,
  VariationEntry,
  WeatherContentFiles,
  WeatherTables,
} from './content.types.js';

const D10_MAX = 10;
const D100_MAX = 100;

/** 테이블 자체가 깨진 경우: 시작 실패 */
function brokenContent(message: string, details?: Record<string, unknown>) {
  return new ConfigurationError(
    message,
    details,
    HttpStatus.INTERNAL_SERVER_ERROR,
  );
}

/** 1..max 를 빈틈/중복 없이 덮는지 확인하고 min 기준 정렬본을 돌려준다 */
function checkCoverage<T>(
  name: string,
  ranges: RollRange<T>[],
  max: number,
): RollRange<T>[] {
  const sorted = [...ranges].sort((a, b) => a.min - b.min);
  let expected = 1;
  for (const r of sorted) {
    if (r.min !== expected || r.max < r.min) {
      throw brokenContent(`${name}: roll ranges must cover 1-${max}`, {
        at: expected,
        range: [r.min, r.max],
      });
    }
    expected = r.max + 1;
  }
  if (expected !== max + 1) {
    throw brokenContent(`${name}: roll ranges must cover 1-${max}`, {
      at: expected,
    });
  }
  return sorted;
}

function findInRanges<T>(ranges: RollRange<T>[], roll: number): T | undefined {
  return ranges.find((r) => roll >= r.min && roll <= r.max)?.value;
}

export function buildWeatherTables(files: WeatherContentFiles): WeatherTables {
  const baseTemperatures = new Map<string, number>();
  for (const region of REGION) {
    const temps = files.regions[region];
    if (!temps) throw brokenContent(`regions: missing region ${region}`);
    for (const season of SEASON) {
      baseTemperatures.set(temperatureKey(region, season), temps[season]);
    }
  }

  const weatherRanges = new Map<Season, RollRange<WeatherType>[]>();
  for (const season of SEASON) {
    const ranges = files.weatherTypes.ranges[season];
    if (!ranges) throw brokenContent(`weather-types: missing season ${season}`);
    weatherRanges.set(
      season,
      checkCoverage(
        `weather-types.${season}`,
        ranges.map((r) => ({ min: r.min, max: r.max, value: r.type })),
        D100_MAX,
      ),
    );
  }

  const weatherEffects = new Map<WeatherType, WeatherEffects>();
  for (const type of WEATHER_TYPE) {
    const effects = files.weatherTypes.effects[type];
    if (!effects) throw brokenContent(`weather-types: missing effects for ${type}`);
    weatherEffects.set(type, effects);
  }

  const windModifiers = new Map<string, WindModifiers>();
  for (const m of files.wind.modifiers) {
    windModifiers.set(windKey(m.strength, m.direction), {
      speedPct: m.speedPct,
      handlingPenalty: m.handlingPenalty,
      requiresTacking: m.requiresTacking,
      notes: m.notes,
    });
  }
  for (const strength of WIND_STRENGTH) {
    for (const direction of WIND_DIRECTION) {
      if (!windModifiers.has(windKey(strength, direction))) {
        throw brokenContent(`wind: missing modifiers for ${strength}/${direction}`);
      }
    }
  }

  const descriptions = new Map<TemperatureCategory, string>();
  for (const category of TEMPERATURE_CATEGORY) {
    const text = files.temperature.descriptions[category];
    if (!text) throw brokenContent(`temperature: missing description for ${category}`);
    descriptions.set(category, text);
  }

  return {
    baseTemperatures,
    weatherRanges,
    weatherEffects,
    strengthRolls: checkCoverage('wind.strength', files.wind.strengthRolls, D10_MAX),
    directionRolls: checkCoverage('wind.direction', files.wind.directionRolls, D10_MAX),
    windModifiers,
    variation: checkCoverage(
      'temperature.variation',
      files.temperature.variation.map((v) => ({
        min: v.min,
        max: v.max,
        value: { bucket: v.bucket, delta: v.delta },
      })),
      D100_MAX,
    ),
    descriptions,
  };
}

async function readContentFile<T>(
  dir: string,
  file: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  const path = join(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw brokenContent(`Cannot read weather content ${file}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw brokenContent(`Invalid weather content ${file}`, {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

export async function loadWeatherContent(dir: string): Promise<WeatherContentFiles> {
  const [regions, weatherTypes, wind, temperature] = await Promise.all([
    readContentFile(dir, 'regions.json', RegionsFileSchema),
    readContentFile(dir, 'weather-types.json', WeatherTypesFileSchema),
    readContentFile(dir, 'wind.json', WindFileSchema),
    readContentFile(dir, 'temperature.json', TemperatureFileSchema),
  ]);
  return { regions, weatherTypes, wind, temperature };
}

function normalizeKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, '_');
}

function isRegion(value: string): value is Region {
  return REGION.some((r) => r === value);
}

function isSeason(value: string): value is Season {
  return SEASON.some((s) => s === value);
}

function isWeatherType(value: string): value is WeatherType {
  return WEATHER_TYPE.some((t) => t === value);
}

/** 호출자가 넘긴 지역명: 대소문자 무시, 공백은 '_' */
export function parseRegion(raw: string): Region {
  const key = normalizeKey(raw);
  if (!isRegion(key)) {
    throw new ConfigurationError(`Unknown region: ${raw}`, {
      available: [...REGION],
    });
  }
  return key;
}

export function parseSeason(raw: string): Season {
  const key = normalizeKey(raw);
  if (!isSeason(key)) {
    throw new ConfigurationError(`Unknown season: ${raw}`, {
      available: [...SEASON],
    });
  }
  return key;
}

@Injectable()
export class WeatherTablesService implements OnModuleInit {
  private readonly logger = new Logger(WeatherTablesService.name);
  private tables: WeatherTables | null = null;

  constructor(private readonly config: WeatherConfigService) {}

  async onModuleInit() {
    const dir = this.config.get().contentDir;
    this.install(buildWeatherTables(await loadWeatherContent(dir)));
    this.logger.log(`Weather tables loaded from ${dir}`);
  }

  /** 검증된 테이블 장착 (테스트는 직접 주입) */
  install(tables: WeatherTables): this {
    this.tables = tables;
    return this;
  }

  snapshot(): WeatherTables {
    return this.loaded;
  }

  baseTemperature(region: string, season: string): number {
    const value = this.loaded.baseTemperatures.get(temperatureKey(region, season));
    if (value === undefined) {
      throw new ConfigurationError(
        `No base temperature for ${region}/${season}`,
        { region, season },
      );
    }
    return value;
  }

  weatherType(season: string, roll: number): WeatherType {
    const ranges = isSeason(season)
      ? this.loaded.weatherRanges.get(season)
      : undefined;
    if (!ranges) {
      throw new ConfigurationError(`Unknown season: ${season}`, { season });
    }
    const type = findInRanges(ranges, roll);
    if (type === undefined) {
      throw new ConfigurationError(`Weather roll out of range: ${roll}`, {
        season,
        roll,
      });
    }
    return type;
  }

  weatherEffects(type: string): WeatherEffects {
    const effects = isWeatherType(type)
      ? this.loaded.weatherEffects.get(type)
      : undefined;
    if (!effects) {
      throw new ConfigurationError(`Unknown weather type: ${type}`, { type });
    }
    return effects;
  }

  windStrength(roll: number): WindStrength {
    const strength = findInRanges(this.loaded.strengthRolls, roll);
    if (strength === undefined) {
      throw new ConfigurationError(`Wind strength roll out of range: ${roll}`);
    }
    return strength;
  }

  windDirection(roll: number): WindDirection {
    const direction = findInRanges(this.loaded.directionRolls, roll);
    if (direction === undefined) {
      throw new ConfigurationError(`Wind direction roll out of range: ${roll}`);
    }
    return direction;
  }

  windModifiers(strength: string, direction: string): WindModifiers {
    const mods = this.loaded.windModifiers.get(windKey(strength, direction));
    if (!mods) {
      throw new ConfigurationError(
        `No wind modifiers for ${strength}/${direction}`,
        { strength, direction },
      );
    }
    return mods;
  }

  /** d100 → 변동 구간. 범위 밖 roll 은 ConfigurationError */
  temperatureVariation(roll: number): VariationEntry {
    const entry = findInRanges(this.loaded.variation, roll);
    if (entry === undefined) {
      throw new ConfigurationError(`Temperature roll out of range: ${roll}`, {
        roll,
      });
    }
    return entry;
  }

  temperatureDescription(category: TemperatureCategory): string {
    const text = this.loaded.descriptions.get(category);
    if (text === undefined) {
      throw new ConfigurationError(`No description for ${category}`);
    }
    return text;
  }

  private get loaded(): WeatherTables {
    if (!this.tables) {
      throw brokenContent('Weather tables are not loaded');
    }
    return this.tables;
  }
}
