/** 엔진이 받는 난수원: 테스트는 고정 시퀀스를 주입한다 */
export interface RandomSource {
  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number;
}

export function d10(rng: RandomSource): number {
  return rng.range(1, 10);
}

export function d100(rng: RandomSource): number {
  return rng.range(1, 100);
}
