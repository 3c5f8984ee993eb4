// splitmix64 기반 결정적 RNG: 세션마다 인스턴스 하나, 모든 무작위 추첨이 이곳을 거친다

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';

const MASK64 = 0xffffffffffffffffn;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

/** 문자열 seed → 64비트 초기 상태 (0은 1로) */
function seedState(seed: string): bigint {
  let h = 0n;
  for (const ch of seed) {
    h = (h * 31n + BigInt(ch.codePointAt(0) ?? 0)) & MASK64;
  }
  return h === 0n ? 1n : h;
}

function mix64(x: bigint): bigint {
  let z = x;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK64;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK64;
  return z ^ (z >> 31n);
}

export class Rng {
  private state: bigint;
  private draws = 0;

  constructor(readonly seed: string) {
    this.state = seedState(seed);
  }

  /** 지금까지 소비한 추첨 횟수. 같은 seed + 같은 명령이면 같은 값 */
  get cursor(): number {
    return this.draws;
  }

  /** [0, 1) 실수 */
  next(): number {
    this.draws++;
    this.state = (this.state + GOLDEN_GAMMA) & MASK64;
    // 상위 53비트만 사용
    return Number(mix64(this.state) >> 11n) / 2 ** 53;
  }

  /** 0 ~ n-1 정수 */
  index(n: number): number {
    return Math.min(n - 1, Math.floor(this.next() * n));
  }

  /** 균등 추첨 1개. 빈 목록이면 undefined (추첨 소비 없음) */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.index(items.length)];
  }

  /** 비복원 균등 표본 k개: 부분 Fisher–Yates, 정확히 min(k, n)회 소비 */
  sample<T>(items: readonly T[], k: number): T[] {
    const pool = [...items];
    const count = Math.min(k, pool.length);
    for (let i = 0; i < count; i++) {
      const j = i + this.index(pool.length - i);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, count);
  }
}

@Injectable()
export class RngService {
  /** seed가 없으면 UUID */
  create(seed?: string): Rng {
    return new Rng(seed ?? randomUUID());
  }
}
