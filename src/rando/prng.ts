import { randomBytes } from "node:crypto";

import { PolicyError } from "../neutopia/errors.js";

const MASK64 = (1n << 64n) - 1n;
const MULTIPLIER = 6364136223846793005n;
const DEFAULT_STREAM = 0xda3e39cb94b95bdbn;

export const MAX_SEED = MASK64;

/**
 * PCG-XSH-RR 64/32. All randomness in a run comes from one instance, so a seed
 * fully determines the output.
 */
export class Pcg32 {
  private state = 0n;
  private readonly inc: bigint;

  public constructor(
    public readonly seed: bigint,
    stream: bigint = DEFAULT_STREAM,
  ) {
    this.inc = ((stream << 1n) | 1n) & MASK64;
    this.step();
    this.state = (this.state + (seed & MASK64)) & MASK64;
    this.step();
  }

  private step(): void {
    this.state = (this.state * MULTIPLIER + this.inc) & MASK64;
  }

  public nextU32(): number {
    const old = this.state;
    this.step();
    const xorshifted = Number((((old >> 18n) ^ old) >> 27n) & 0xffffffffn);
    const rot = Number(old >> 59n);
    return ((xorshifted >>> rot) | (xorshifted << (-rot & 31))) >>> 0;
  }

  /** Uniform integer in [0, bound). */
  public nextBelow(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0 || bound > 0x1_0000_0000) {
      throw new RangeError(`Invalid bound: ${bound}`);
    }
    const threshold = (0x1_0000_0000 - bound) % bound;
    for (;;) {
      const r = this.nextU32();
      if (r >= threshold) return r % bound;
    }
  }

  /** In-place Fisher-Yates shuffle; returns the same array. */
  public shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextBelow(i + 1);
      const tmp = items[i]!;
      items[i] = items[j]!;
      items[j] = tmp;
    }
    return items;
  }

  public pick<T>(items: ReadonlyArray<T>): T {
    if (items.length === 0) throw new RangeError("Cannot pick from an empty list");
    return items[this.nextBelow(items.length)]!;
  }
}

/** Seeds are unsigned 64-bit numbers written in base 36 (case-insensitive). */
export function parseSeed(text: string): bigint {
  const s = text.trim().toLowerCase();
  if (!/^[0-9a-z]+$/.test(s)) {
    throw new PolicyError("INVALID_SEED", `Seed "${text}" must be a base-36 number (0-9, a-z)`);
  }
  let v = 0n;
  for (const ch of s) {
    v = v * 36n + BigInt(parseInt(ch, 36));
    if (v > MAX_SEED) {
      throw new PolicyError("INVALID_SEED", `Seed "${text}" does not fit in 64 bits`);
    }
  }
  return v;
}

export function formatSeed(seed: bigint): string {
  return seed.toString(36);
}

export function randomSeed(): bigint {
  return randomBytes(8).readBigUInt64BE(0);
}
