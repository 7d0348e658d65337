import type { Region, Season } from './enums.js';
import type { EventCarry } from './event-carry.js';
import type { WindState } from './wind.js';

export interface JourneyState {
  journeyKey: string;
  currentDay: number; // 다음에 생성할 날 (≥1)
  currentStage: number; // ≥1
  stageDays: number;
  region: Region;
  season: Season;
  seed: string;
  rngCursor: number;
  lastWind: WindState | null; // 직전 날 midnight
  carry: EventCarry;
  coldFrontsSeen: number;
  heatWavesSeen: number;
}
