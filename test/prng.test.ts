import { describe, expect, it } from "vitest";

import { PolicyError } from "../src/neutopia/errors.js";
import { formatSeed, MAX_SEED, parseSeed, Pcg32 } from "../src/rando/prng.js";
import { catchError } from "./support/errors.js";

describe("Pcg32", () => {
  it("matches the reference generator output", () => {
    const rng = new Pcg32(42n, 54n);
    const out = Array.from({ length: 6 }, () => rng.nextU32());
    expect(out).toEqual([0xa15c02b7, 0x7b47f409, 0xba1d3330, 0x83d2f293, 0xbfa4784b, 0xcbed606e]);
  });

  it("is deterministic per seed", () => {
    const a = new Pcg32(1234n);
    const b = new Pcg32(1234n);
    for (let i = 0; i < 32; i++) expect(a.nextU32()).toBe(b.nextU32());
  });

  it("keeps bounded draws in range", () => {
    const rng = new Pcg32(7n);
    for (let i = 0; i < 200; i++) {
      const v = rng.nextBelow(6);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(6);
    }
    expect(() => rng.nextBelow(0)).toThrow(RangeError);
    expect(() => rng.pick([])).toThrow(RangeError);
  });

  it("shuffles into a permutation", () => {
    const items = Array.from({ length: 20 }, (_, i) => i);
    const shuffled = new Pcg32(99n).shuffle([...items]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
  });
});

describe("seeds", () => {
  it("parses base 36", () => {
    expect(parseSeed("z")).toBe(35n);
    expect(parseSeed("10")).toBe(36n);
    expect(parseSeed(" AbC ")).toBe(parseSeed("abc"));
  });

  it("round-trips the largest seed", () => {
    expect(parseSeed(formatSeed(MAX_SEED))).toBe(MAX_SEED);
    expect(formatSeed(36n)).toBe("10");
  });

  it("rejects seeds that overflow or use other characters", () => {
    const tooBig = catchError(PolicyError, () => parseSeed("z".repeat(14)));
    expect(tooBig.code).toBe("INVALID_SEED");
    expect(tooBig.message).toBe(`Seed "${"z".repeat(14)}" does not fit in 64 bits`);

    expect(catchError(PolicyError, () => parseSeed("12-3")).code).toBe("INVALID_SEED");
    expect(catchError(PolicyError, () => parseSeed("")).code).toBe("INVALID_SEED");
  });
});
