// 기준 열거형: 날씨 테이블 키와 DB 텍스트 컬럼이 공유한다

export const REGION = [
  'reikland',
  'nordland',
  'ostland',
  'middenland',
  'hochland',
  'talabecland',
  'ostermark',
  'stirland',
  'sylvania',
  'wissenland',
  'averland',
  'solland',
  'kislev',
  'wasteland',
  'border_princes',
] as const;
export type Region = (typeof REGION)[number];

export const SEASON = ['spring', 'summer', 'autumn', 'winter'] as const;
export type Season = (typeof SEASON)[number];

export const WIND_STRENGTH = [
  'calm',
  'light',
  'bracing',
  'strong',
  'very_strong',
] as const;
export type WindStrength = (typeof WIND_STRENGTH)[number];

export const WIND_DIRECTION = ['tailwind', 'sidewind', 'headwind'] as const;
export type WindDirection = (typeof WIND_DIRECTION)[number];

/** 하루 4구간: 순서가 곧 생성 순서 */
export const DAY_PERIOD = ['dawn', 'midday', 'dusk', 'midnight'] as const;
export type DayPeriod = (typeof DAY_PERIOD)[number];

export const WEATHER_TYPE = [
  'dry',
  'fair',
  'rain',
  'downpour',
  'snow',
  'blizzard',
] as const;
export type WeatherType = (typeof WEATHER_TYPE)[number];

/** 실제 기온 − 기준 기온으로 재산출되는 표시 분류 */
export const TEMPERATURE_CATEGORY = [
  'extremely_low',
  'very_low',
  'low',
  'cool',
  'average',
  'warm',
  'high',
  'very_high',
  'extremely_high',
] as const;
export type TemperatureCategory = (typeof TEMPERATURE_CATEGORY)[number];

/** d100 변동 테이블의 구간 이름 (cold_front / heat_wave 는 트리거 구간) */
export const VARIATION_BUCKET = [
  'extremely_low',
  'cold_front',
  'very_low',
  'low',
  'average',
  'high',
  'very_high',
  'heat_wave',
  'extremely_high',
] as const;
export type VariationBucket = (typeof VARIATION_BUCKET)[number];

export const WEATHER_EVENT_KIND = ['COLD_FRONT', 'HEAT_WAVE'] as const;
export type WeatherEventKind = (typeof WEATHER_EVENT_KIND)[number];
