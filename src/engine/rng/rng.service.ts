// splitmix64 기반 결정적 RNG — 전투의 유일한 비결정 원천

import { Injectable } from '@nestjs/common';
import { InvalidInputError } from '../../common/errors/game-errors.js';

export interface RngState {
  seed: string;
  cursor: number;
}

const MASK_64 = 0xffffffffffffffffn;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const TWO_POW_53 = 2 ** 53;

export class Rng {
  private state: bigint;
  private _cursor: number;
  private _consumed: number;

  constructor(
    readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    this._consumed = 0;
    // 커서 위치까지 상태만 진행 (cursor/consumed 변경 없음)
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this._consumed++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) 실수 — 상위 53비트 사용 */
  next(): number {
    return Number(this.nextRaw() >> 11n) / TWO_POW_53;
  }

  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number {
    if (max < min) {
      throw new InvalidInputError(`range max ${max} < min ${min}`, { min, max });
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  choice<T>(seq: readonly T[]): T {
    if (seq.length === 0) {
      throw new InvalidInputError('choice from empty sequence');
    }
    return seq[this.range(0, seq.length - 1)];
  }

  /** Fisher–Yates, 제자리 셔플 */
  shuffle<T>(seq: T[]): T[] {
    for (let i = seq.length - 1; i > 0; i--) {
      const j = this.range(0, i);
      const tmp = seq[i];
      seq[i] = seq[j];
      seq[j] = tmp;
    }
    return seq;
  }

  /** 저장용 상태 (JSON 안전) */
  exportState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }

  get consumed(): number {
    return this._consumed;
  }
}

@Injectable()
export class RngService {
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }

  /** exportState() 결과로부터 동일한 후속 시퀀스를 재현 */
  restore(state: RngState): Rng {
    if (!Number.isInteger(state.cursor) || state.cursor < 0) {
      throw new InvalidInputError('invalid rng cursor', { cursor: state.cursor });
    }
    return new Rng(state.seed, state.cursor);
  }
}
