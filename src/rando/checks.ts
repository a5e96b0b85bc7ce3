import { readFile } from "node:fs/promises";

import { areaName } from "../neutopia/areas.js";
import { isShuffleableItem, itemName } from "../neutopia/chest.js";
import { ConsistencyError, PolicyError } from "../neutopia/errors.js";
import type { Neutopia } from "../neutopia/game.js";
import { isRecord } from "../neutopia/romLayout.js";

export const GATES = ["rainbow-drop", "falcon-shoes", "fire-wand", "bell"] as const;

export type Gate = (typeof GATES)[number];

export type LocationId = Readonly<{
  area: number;
  room: number;
  index: number;
}>;

export type Check = Readonly<{
  name: string;
  area: number;
  room: number;
  index: number;
  gates: ReadonlyArray<Gate>;
}>;

function isGate(v: unknown): v is Gate {
  return GATES.some((g) => g === v);
}

export function locationKey(loc: LocationId): string {
  return `${loc.area}:${loc.room}:${loc.index}`;
}

export function compareLocations(a: LocationId, b: LocationId): number {
  return a.area - b.area || a.room - b.room || a.index - b.index;
}

function parseU8(rec: Record<string, unknown>, key: string, label: string, fallback?: number): number {
  const v = rec[key] ?? fallback;
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0 || v > 0xff) {
    throw new PolicyError("INVALID_CONFIG", `Invalid ${label}.${key}: expected integer in [0, 255]`);
  }
  return v;
}

function parseCheck(input: unknown, i: number): Check {
  const label = `checks[${i}]`;
  if (!isRecord(input)) throw new PolicyError("INVALID_CONFIG", `Invalid ${label}: expected object`);
  if (typeof input.name !== "string") {
    throw new PolicyError("INVALID_CONFIG", `Invalid ${label}.name: expected string`);
  }

  const gatesRaw = input.gates ?? [];
  if (!Array.isArray(gatesRaw)) {
    throw new PolicyError("INVALID_CONFIG", `Invalid ${label}.gates: expected array`);
  }
  const gates = gatesRaw.map((g: unknown, j) => {
    if (!isGate(g)) {
      throw new PolicyError(
        "INVALID_CONFIG",
        `Invalid ${label}.gates[${j}]: expected one of ${GATES.join(", ")}`,
      );
    }
    return g;
  });

  return {
    name: input.name,
    area: parseU8(input, "area", label),
    room: parseU8(input, "room", label),
    index: parseU8(input, "index", label, 0),
    gates,
  };
}

/** Validates catalog JSON: an array of `{ name, area, room, index?, gates }`. */
export function parseCheckCatalog(input: unknown): Check[] {
  if (!Array.isArray(input)) throw new PolicyError("INVALID_CONFIG", "Invalid check catalog: expected array");
  return input.map((c: unknown, i) => parseCheck(c, i));
}

/** Checks keyed by location, in location order. */
export function indexChecks(checks: ReadonlyArray<Check>): Map<string, Check> {
  const out = new Map<string, Check>();
  for (const check of [...checks].sort(compareLocations)) {
    const key = locationKey(check);
    const prev = out.get(key);
    if (prev) {
      throw new ConsistencyError(
        "DUPLICATE_LOCATION",
        `Checks "${prev.name}" and "${check.name}" share location ${key}`,
      );
    }
    out.set(key, check);
  }
  return out;
}

export async function loadCheckCatalog(file: string): Promise<Check[]> {
  const text = await readFile(file, "utf8");
  const parsed: unknown = JSON.parse(text);
  return parseCheckCatalog(parsed);
}

/**
 * Skeleton catalog with one ungated check per shuffleable chest before the
 * endgame area. Gates are filled in by hand.
 */
export function generateCheckCatalog(game: Neutopia): Check[] {
  const endgame = game.layout.endgameArea;
  return game
    .filterChests((c) => c.area < endgame && isShuffleableItem(c.info))
    .map((c) => ({
      name: `${areaName(c.area)} - ${itemName(c.info)}`,
      area: c.area,
      room: c.room,
      index: c.index,
      gates: [],
    }));
}
