// splitmix64 기반 결정적 RNG: 여정마다 seed + cursor 를 저장해 이어서 굴린다

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { RandomSource } from './random-source.js';

const MASK_64 = 0xffffffffffffffffn;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

export class Rng implements RandomSource {
  readonly seed: string;
  private state: bigint;
  private _cursor: number;

  constructor(seed: string, cursor: number = 0) {
    this.seed = seed;
    this.state = Rng.hashSeed(seed);
    this._cursor = cursor;
    // 커서 위치까지 상태만 진행
    for (let i = 0; i < cursor; i++) {
      this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
    }
  }

  private static hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) 실수 */
  next(): number {
    // 상위 53비트만 사용해야 1.0 이 나오지 않는다
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  get cursor(): number {
    return this._cursor;
  }
}

@Injectable()
export class RngService {
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }

  newSeed(): string {
    return randomUUID();
  }
}
