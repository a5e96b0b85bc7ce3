// src/neutopia/objectTable.ts
//
// Room object tables are a sequence of tagged records. Every tag has a fixed
// payload size, so a table ends where the next byte is not a known tag (the
// cartridge uses 0xFF). Unmodified tables must write back byte-for-byte.

import { BinaryReader, BinaryWriter } from "./binary.js";
import { FormatError, hex } from "./errors.js";

export type ObjectInfo = Readonly<{
  x: number; // 0..15
  y: number; // 0..15
  id: number; // u8
}>;

export type ObjectEntryKind =
  | "OBJECT"
  | "PUSH_BLOCK_GATED_OBJECT"
  | "ENEMY_GATED_OBJECT"
  | "BELL_GATED_OBJECT"
  | "BURNABLE"
  | "OUCH_ROPE"
  | "ARROW_LAUNCHER"
  | "SWORDS"
  | "GHOST_SPAWNER"
  | "FIREBALL_SPAWNER";

export type ValueEntryKind =
  | "OPEN_DOOR"
  | "PUSH_BLOCK_GATED_DOOR"
  | "ENEMY_GATED_DOOR"
  | "BOMBABLE_DOOR"
  | "BOSS_DOOR";

export type FlagEntryKind = "DARK_ROOM" | "FALCON_BOOTS_NEEDED";

// UNKNOWN_* payloads were never decoded; they are carried as opaque bytes.
export type DataEntryKind =
  | "UNKNOWN_0B"
  | "HIDDEN_ROOM"
  | "NPC"
  | "SHOP_ITEM"
  | "UNKNOWN_E1"
  | "UNKNOWN_F4";

export type TableEntry =
  | Readonly<{ kind: ObjectEntryKind; object: ObjectInfo }>
  | Readonly<{ kind: ValueEntryKind; value: number }>
  | Readonly<{ kind: FlagEntryKind }>
  | Readonly<{ kind: DataEntryKind; data: ReadonlyArray<number> }>;

export type TableEntryKind = TableEntry["kind"];

export const TABLE_TERMINATOR = 0xff;

type Rule =
  | Readonly<{ shape: "object"; kind: ObjectEntryKind }>
  | Readonly<{ shape: "value"; kind: ValueEntryKind }>
  | Readonly<{ shape: "flag"; kind: FlagEntryKind }>
  | Readonly<{ shape: "data"; kind: DataEntryKind; size: number }>;

const RULES: ReadonlyArray<readonly [tag: number, rule: Rule]> = [
  [0x00, { shape: "object", kind: "OBJECT" }],
  [0x01, { shape: "value", kind: "OPEN_DOOR" }],
  [0x02, { shape: "value", kind: "PUSH_BLOCK_GATED_DOOR" }],
  [0x03, { shape: "value", kind: "ENEMY_GATED_DOOR" }],
  [0x05, { shape: "value", kind: "BOMBABLE_DOOR" }],
  [0x06, { shape: "object", kind: "PUSH_BLOCK_GATED_OBJECT" }],
  [0x07, { shape: "object", kind: "ENEMY_GATED_OBJECT" }],
  [0x08, { shape: "object", kind: "BELL_GATED_OBJECT" }],
  [0x09, { shape: "flag", kind: "DARK_ROOM" }],
  [0x0a, { shape: "value", kind: "BOSS_DOOR" }],
  [0x0b, { shape: "data", kind: "UNKNOWN_0B", size: 3 }],
  [0x0c, { shape: "object", kind: "BURNABLE" }],
  [0x0d, { shape: "data", kind: "HIDDEN_ROOM", size: 3 }],
  [0x81, { shape: "flag", kind: "FALCON_BOOTS_NEEDED" }],
  [0x9a, { shape: "data", kind: "NPC", size: 5 }],
  [0xbd, { shape: "object", kind: "OUCH_ROPE" }],
  [0xbf, { shape: "object", kind: "ARROW_LAUNCHER" }],
  [0xc0, { shape: "object", kind: "SWORDS" }],
  [0xc1, { shape: "object", kind: "GHOST_SPAWNER" }],
  [0xc6, { shape: "object", kind: "FIREBALL_SPAWNER" }],
  [0xda, { shape: "data", kind: "SHOP_ITEM", size: 7 }],
  [0xe1, { shape: "data", kind: "UNKNOWN_E1", size: 9 }],
  [0xf4, { shape: "data", kind: "UNKNOWN_F4", size: 5 }],
];

const RULE_BY_TAG = new Map<number, Rule>();
const TAG_BY_KIND = new Map<TableEntryKind, readonly [tag: number, rule: Rule]>();
for (const [tag, rule] of RULES) {
  RULE_BY_TAG.set(tag, rule);
  TAG_BY_KIND.set(rule.kind, [tag, rule]);
}

/** Tags with a parse rule, in ascending order. */
export const KNOWN_TAGS: ReadonlyArray<number> = [...RULE_BY_TAG.keys()].sort((a, b) => a - b);

export function isKnownTag(tag: number): boolean {
  return RULE_BY_TAG.has(tag);
}

function readObjectInfo(r: BinaryReader): ObjectInfo {
  const loc = r.readU8();
  const id = r.readU8();
  return { x: loc & 0xf, y: loc >> 4, id };
}

function readEntry(r: BinaryReader): TableEntry {
  const start = r.position();
  const tag = r.readU8();
  const rule = RULE_BY_TAG.get(tag);
  if (!rule) {
    throw new FormatError("UNKNOWN_TAG", `Unknown object table tag ${hex(tag)} at byte ${start}`);
  }

  try {
    switch (rule.shape) {
      case "object":
        return { kind: rule.kind, object: readObjectInfo(r) };
      case "value":
        return { kind: rule.kind, value: r.readU8() };
      case "flag":
        return { kind: rule.kind };
      case "data":
        return { kind: rule.kind, data: Array.from(r.readBytes(rule.size)) };
    }
  } catch (e: unknown) {
    if (e instanceof FormatError) throw e.withContext(`${rule.kind} entry at byte ${start}`);
    throw e;
  }
}

/** Parses the single entry at the start of `bytes`. */
export function parseEntry(bytes: Uint8Array): { entry: TableEntry; rest: Uint8Array } {
  const r = new BinaryReader(bytes);
  const entry = readEntry(r);
  return { entry, rest: r.rest() };
}

// Reads entries until the next byte is not a known tag or its payload would
// run off the end; returns what was read and the unread remainder.
function scanEntries(bytes: Uint8Array): { entries: TableEntry[]; rest: Uint8Array } {
  const r = new BinaryReader(bytes);
  const entries: TableEntry[] = [];

  while (r.remaining() > 0) {
    const tag = r.peekU8();
    if (tag === undefined) break;
    const rule = RULE_BY_TAG.get(tag);
    if (!rule || r.remaining() < 1 + payloadSize(rule)) break;
    entries.push(readEntry(r));
  }

  return { entries, rest: r.rest() };
}

function payloadSize(rule: Rule): number {
  switch (rule.shape) {
    case "object":
      return 2;
    case "value":
      return 1;
    case "flag":
      return 0;
    case "data":
      return rule.size;
  }
}

function previewBytes(bytes: Uint8Array, max = 16): string {
  const shown = Array.from(bytes.subarray(0, max), (b) => b.toString(16).padStart(2, "0")).join(" ");
  return bytes.length > max ? `${shown} ...` : shown;
}

/** Parses a whole table; every byte must belong to an entry. */
export function parseObjectTable(bytes: Uint8Array): TableEntry[] {
  const { entries, rest } = scanEntries(bytes);
  if (rest.length > 0) {
    throw new FormatError(
      "TRAILING_BYTES",
      `Object table has ${rest.length} unparsed bytes after ${entries.length} entries: [${previewBytes(rest)}]`,
    );
  }
  return entries;
}

/**
 * Byte length of the table at the start of `bytes`, not counting the
 * terminator. The remainder must be empty or start with 0xFF.
 */
export function objectTableLen(bytes: Uint8Array): number {
  const { rest } = scanEntries(bytes);
  if (rest.length > 0 && rest[0] !== TABLE_TERMINATOR) {
    throw new FormatError(
      "TRAILING_BYTES",
      `Object table ends at byte ${bytes.length - rest.length} without a terminator: [${previewBytes(rest)}]`,
    );
  }
  return bytes.length - rest.length;
}

function assertNibble(v: number, label: string): void {
  if (!Number.isInteger(v) || v < 0 || v > 0xf) throw new Error(`${label} must be 0..15, got ${v}`);
}

function ruleFor(entry: TableEntry): readonly [tag: number, rule: Rule] {
  const found = TAG_BY_KIND.get(entry.kind);
  if (!found) throw new Error(`No encoding rule for entry kind ${entry.kind}`);
  return found;
}

function writeEntryTo(w: BinaryWriter, entry: TableEntry): void {
  const [tag, rule] = ruleFor(entry);
  w.writeU8(tag);

  if ("object" in entry) {
    const o = entry.object;
    assertNibble(o.x, `${entry.kind}.x`);
    assertNibble(o.y, `${entry.kind}.y`);
    w.writeU8(o.x | (o.y << 4));
    w.writeU8(o.id);
  } else if ("value" in entry) {
    w.writeU8(entry.value);
  } else if ("data" in entry) {
    const size = payloadSize(rule);
    if (entry.data.length !== size) {
      throw new Error(`${entry.kind} payload must be ${size} bytes, got ${entry.data.length}`);
    }
    for (const b of entry.data) w.writeU8(b);
  }
}

export function writeEntry(entry: TableEntry): Uint8Array {
  const w = new BinaryWriter();
  writeEntryTo(w, entry);
  return w.toBytes();
}

/** Serializes entries back to back; the caller appends the terminator. */
export function writeObjectTable(entries: ReadonlyArray<TableEntry>): Uint8Array {
  const w = new BinaryWriter();
  for (const e of entries) writeEntryTo(w, e);
  return w.toBytes();
}

// Object ids 0x4c..0x53 place the chest for chest-table slot (id - 0x4c).
export const CHEST_OBJECT_BASE = 0x4c;
const CHEST_SLOTS = 8;

/** Chest-table slot spawned by this entry, if it is a chest object. */
export function chestIdOf(entry: TableEntry): number | undefined {
  if (!("object" in entry) || entry.kind !== "OBJECT") return undefined;
  const id = entry.object.id;
  if (id >= CHEST_OBJECT_BASE && id < CHEST_OBJECT_BASE + CHEST_SLOTS) return id - CHEST_OBJECT_BASE;
  return undefined;
}

/** The record that marks the next two entries as tied to the preceding chest. */
export function isConditional(entry: TableEntry): boolean {
  return entry.kind === "UNKNOWN_0B";
}

export function locationOf(entry: TableEntry): { x: number; y: number } | undefined {
  if (!("object" in entry) || entry.kind !== "OBJECT") return undefined;
  return { x: entry.object.x, y: entry.object.y };
}

function kindLabel(kind: TableEntryKind): string {
  return kind.toLowerCase().replace(/_/g, " ");
}

export function describeEntry(entry: TableEntry): string {
  const label = kindLabel(entry.kind);
  if ("object" in entry) {
    const o = entry.object;
    return `${label} ${hex(o.id)} @ (${o.x},${o.y})`;
  }
  if ("value" in entry) return `${label} ${hex(entry.value)}`;
  if ("data" in entry) return `${label} [${entry.data.map((b) => hex(b)).join(", ")}]`;
  return label;
}
