/**
 * @glstream/generator — Seeded random source.
 *
 * Every generator receives a RandomSource explicitly. Nothing in the
 * generation path reads Math.random, so a given seed plus a given call
 * order always reproduces the same values.
 */

import { GeneratorError } from "./types.js";

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;

  /** Uniform float in [min, max). */
  uniform(min: number, max: number): number;

  /** Uniform integer in [min, max], both inclusive. */
  integer(min: number, max: number): number;

  /** One element of a non-empty list. */
  choice<T>(items: readonly T[]): T;
}

/**
 * Mulberry32 generator.
 *
 * State is a single 32-bit integer; each draw advances it once.
 */
export class SeededRandom implements RandomSource {
  private _state: number;
  private _draws = 0;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new GeneratorError("INVALID_CONFIG", `Seed must be an integer, got ${String(seed)}`);
    }
    this._state = seed >>> 0;
  }

  /** Number of raw draws consumed so far. */
  get draws(): number {
    return this._draws;
  }

  next(): number {
    this._draws++;
    this._state = (this._state + 0x6d2b79f5) | 0;
    let t = Math.imul(this._state ^ (this._state >>> 15), 1 | this._state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  uniform(min: number, max: number): number {
    if (!(max > min)) {
      throw new GeneratorError("INVALID_RANGE", `uniform(${min}, ${max}) requires max > min`);
    }
    return min + (max - min) * this.next();
  }

  integer(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new GeneratorError("INVALID_RANGE", `integer(${min}, ${max}) requires integers with max >= min`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  choice<T>(items: readonly T[]): T {
    const item = items[Math.floor(this.next() * items.length)];
    if (item === undefined) {
      throw new GeneratorError("EMPTY_CHOICE", "Cannot choose from an empty list");
    }
    return item;
  }
}
