/**
 * Test helpers for @glstream/generator.
 */

import type { RandomSource } from "../src/random.js";

/**
 * RandomSource that replays a fixed list of raw draws.
 *
 * Each method consumes exactly one value, mirroring SeededRandom, and
 * records its name so tests can assert the draw order.
 */
export class ScriptedRandom implements RandomSource {
  readonly calls: string[] = [];
  private _index = 0;

  constructor(private readonly _values: readonly number[]) {}

  get remaining(): number {
    return this._values.length - this._index;
  }

  next(): number {
    return this._take("next");
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this._take("uniform");
  }

  integer(min: number, max: number): number {
    return min + Math.floor(this._take("integer") * (max - min + 1));
  }

  choice<T>(items: readonly T[]): T {
    const item = items[Math.floor(this._take("choice") * items.length)];
    if (item === undefined) {
      throw new Error("ScriptedRandom: empty choice");
    }
    return item;
  }

  private _take(kind: string): number {
    const value = this._values[this._index];
    if (value === undefined) {
      throw new Error(`ScriptedRandom exhausted after ${this._index} draws (${kind})`);
    }
    this._index++;
    this.calls.push(kind);
    return value;
  }
}

/** Array-backed sink. */
export function collectingSink<T>(): { readonly records: T[]; append(record: T): void } {
  const records: T[] = [];
  return {
    records,
    append(record: T) {
      records.push(record);
    },
  };
}
