import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { SeededRandom } from "../src/random.js";
import { GeneratorError } from "../src/types.js";

describe("SeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("diverges for different seeds", () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    expect(a.next()).not.toBe(b.next());
  });

  it("counts raw draws across all methods", () => {
    const rng = new SeededRandom(7);
    rng.next();
    rng.uniform(1, 2);
    rng.integer(1, 6);
    rng.choice(["a", "b"]);
    expect(rng.draws).toBe(4);
  });

  it("keeps next() in [0, 1)", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 2 ** 31 - 1 }), (seed) => {
        const rng = new SeededRandom(seed);
        for (let i = 0; i < 50; i++) {
          const v = rng.next();
          if (v < 0 || v >= 1) return false;
        }
        return true;
      }),
      { numRuns: 50 },
    );
  });

  it("keeps integer() within inclusive bounds", () => {
    fc.assert(
      fc.property(
        fc.integer(),
        fc.integer({ min: -1000, max: 1000 }),
        fc.integer({ min: 0, max: 1000 }),
        (seed, min, span) => {
          const rng = new SeededRandom(seed);
          const v = rng.integer(min, min + span);
          return Number.isInteger(v) && v >= min && v <= min + span;
        },
      ),
    );
  });

  it("returns min from integer() when min equals max", () => {
    expect(new SeededRandom(3).integer(5, 5)).toBe(5);
  });

  it("keeps uniform() within [min, max)", () => {
    const rng = new SeededRandom(99);
    for (let i = 0; i < 200; i++) {
      const v = rng.uniform(500, 15000);
      expect(v).toBeGreaterThanOrEqual(500);
      expect(v).toBeLessThan(15000);
    }
  });

  it("throws EMPTY_CHOICE for an empty list", () => {
    const rng = new SeededRandom(1);
    expect(() => rng.choice([])).toThrow(GeneratorError);
    try {
      rng.choice([]);
    } catch (error) {
      expect((error as GeneratorError).code).toBe("EMPTY_CHOICE");
    }
  });

  it("rejects inverted ranges", () => {
    const rng = new SeededRandom(1);
    expect(() => rng.integer(10, 1)).toThrow("requires integers with max >= min");
    expect(() => rng.uniform(5, 5)).toThrow("requires max > min");
  });

  it("rejects a non-integer seed", () => {
    expect(() => new SeededRandom(1.5)).toThrow("Seed must be an integer");
  });
});
