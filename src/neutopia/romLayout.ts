import { PolicyError } from "./errors.js";

export type AreaRange = Readonly<{
  firstArea: number;
  lastArea: number; // inclusive
}>;

/** Where the level data lives in the cartridge, and which part of it gets rewritten. */
export type RomLayout = Readonly<{
  areaTable: number;
  areaCount: number;
  roomOrderTable: number;
  chestTable: number;
  chestTableCount: number;

  /** Free space that receives rewritten chest tables, one `chestTableStride` slot per area. */
  chestTableFreeSpace: number;
  chestTableStride: number;

  /** Areas whose room data is repacked by `Neutopia.write`. */
  relocation: AreaRange;

  /** Chests at or beyond this area are never shuffled. */
  endgameArea: number;
}>;

export const ROOMS_PER_AREA = 0x40;
export const ROM_SIZE = 384 * 1024;

// Table offsets of the NA cartridge. Use `--layout` to point the tools at a
// different dump.
export const DEFAULT_LAYOUT: RomLayout = {
  areaTable: 0x1d69c,
  areaCount: 0x11,
  roomOrderTable: 0x1d6cf,
  chestTable: 0x1d702,
  chestTableCount: 0x10,
  chestTableFreeSpace: 0x4fe00,
  chestTableStride: 0x20,
  relocation: { firstArea: 0x4, lastArea: 0xf },
  endgameArea: 0x10,
};

export function areasInRange(range: AreaRange): number[] {
  const out: number[] = [];
  for (let a = range.firstArea; a <= range.lastArea; a++) out.push(a);
  return out;
}

export function chestTableSlot(layout: RomLayout, area: number): number {
  return layout.chestTableFreeSpace + layout.chestTableStride * area;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseIntField(
  input: Record<string, unknown>,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const v = input[key];
  if (v === undefined) return fallback;
  // Offsets are commonly written in hex, so accept "0x..." strings as well.
  const n = typeof v === "string" && /^0x[0-9a-f]+$/i.test(v) ? parseInt(v.slice(2), 16) : v;
  if (typeof n !== "number" || !Number.isInteger(n) || n < min || n > max) {
    throw new PolicyError("INVALID_CONFIG", `Invalid layout.${key}: expected integer in [${min}, ${max}]`);
  }
  return n;
}

/** Validates a JSON layout override; missing fields keep their defaults. */
export function parseRomLayout(input: unknown, base: RomLayout = DEFAULT_LAYOUT): RomLayout {
  if (!isRecord(input)) throw new PolicyError("INVALID_CONFIG", "Invalid layout: expected object");

  const areaCount = parseIntField(input, "areaCount", base.areaCount, 1, 0xff);

  let relocation = base.relocation;
  if (input.relocation !== undefined) {
    const r = input.relocation;
    if (!isRecord(r)) throw new PolicyError("INVALID_CONFIG", "Invalid layout.relocation: expected object");
    relocation = {
      firstArea: parseIntField(r, "firstArea", base.relocation.firstArea, 0, areaCount - 1),
      lastArea: parseIntField(r, "lastArea", base.relocation.lastArea, 0, areaCount - 1),
    };
    if (relocation.lastArea < relocation.firstArea) {
      throw new PolicyError("INVALID_CONFIG", "Invalid layout.relocation: lastArea < firstArea");
    }
  }

  return {
    areaTable: parseIntField(input, "areaTable", base.areaTable, 0, ROM_SIZE - 1),
    areaCount,
    roomOrderTable: parseIntField(input, "roomOrderTable", base.roomOrderTable, 0, ROM_SIZE - 1),
    chestTable: parseIntField(input, "chestTable", base.chestTable, 0, ROM_SIZE - 1),
    chestTableCount: parseIntField(input, "chestTableCount", base.chestTableCount, 0, areaCount),
    chestTableFreeSpace: parseIntField(
      input,
      "chestTableFreeSpace",
      base.chestTableFreeSpace,
      0,
      ROM_SIZE - 1,
    ),
    chestTableStride: parseIntField(input, "chestTableStride", base.chestTableStride, 0x20, 0x100),
    relocation,
    endgameArea: parseIntField(input, "endgameArea", base.endgameArea, 0, 0xff),
  };
}
