import { RomWriter } from "./binary.js";
import { type Chest, chestKey, encodeChestTable, itemName } from "./chest.js";
import { ConsistencyError, hex, type WarnFn } from "./errors.js";
import {
  chestIdOf,
  isConditional,
  locationOf,
  TABLE_TERMINATOR,
  type TableEntry,
  writeObjectTable,
} from "./objectTable.js";
import { encodePointer, POINTER_SIZE } from "./pointer.js";
import { NeutopiaRom } from "./rom.js";
import {
  type AreaRange,
  areasInRange,
  chestTableSlot,
  DEFAULT_LAYOUT,
  ROOMS_PER_AREA,
  type RomLayout,
} from "./romLayout.js";

/** A chest-bearing object: `index` counts chest objects within the room, not chest-table slots. */
export type ChestRef = Readonly<{
  info: Chest;
  area: number;
  room: number;
  index: number;
}>;

/**
 * Two object-table records that followed a chest object in the original
 * ROM and belong with that chest's content wherever it ends up.
 */
export type Conditional = Readonly<{
  chest: Chest;
  entries: readonly [TableEntry, TableEntry];
}>;

export type WriteOptions = Readonly<{
  relocation?: AreaRange;
  warn?: WarnFn;
}>;

type RoomState = {
  readonly warpTable: Uint8Array;
  readonly enemyTable: Uint8Array;
  objectTable: TableEntry[];
};

type AreaState = {
  readonly index: number;
  readonly pointer: number;
  readonly rooms: RoomState[];
  readonly chests?: Chest[];
};

const ROOM_DESCRIPTOR_SIZE = 3 * POINTER_SIZE;

// Only the first chest/conditional triple of a room is lifted out; a second
// pair in the same room stays in place.
function extractConditional(objects: TableEntry[], chests: ReadonlyArray<Chest>): Conditional | undefined {
  for (let i = 0; i + 2 < objects.length; i++) {
    const id = chestIdOf(objects[i]!);
    if (id === undefined) continue;
    const chest = chests[id];
    if (!chest) continue;

    const next = objects[i + 1]!;
    const nextNext = objects[i + 2]!;
    if (isConditional(next)) {
      objects.splice(i + 1, 2);
      return { chest, entries: [next, nextNext] };
    }
  }
  return undefined;
}

function moveTo(entry: TableEntry, loc: { x: number; y: number }): TableEntry {
  if ("object" in entry && entry.kind === "OBJECT") {
    return { kind: entry.kind, object: { ...entry.object, x: loc.x, y: loc.y } };
  }
  return entry;
}

/**
 * Editable game view over a parsed ROM. Chest contents change only through
 * `updateChests`; `write` produces the final image and retires the model.
 */
export class Neutopia {
  private consumed = false;

  private constructor(
    public readonly layout: RomLayout,
    private readonly original: Uint8Array,
    private readonly areas: AreaState[],
    private readonly conditionalsByChest: Map<string, Conditional>,
    private readonly conditionalAreas: ReadonlySet<number>,
  ) {}

  public static fromRom(data: Uint8Array, layout: RomLayout = DEFAULT_LAYOUT): Neutopia {
    return Neutopia.fromParsed(data, NeutopiaRom.parse(data, layout));
  }

  /**
   * Conditionals are lifted only out of areas in `layout.relocation`: those
   * are the rooms `write` re-serializes, everything else keeps its bytes.
   */
  public static fromParsed(data: Uint8Array, rom: NeutopiaRom): Neutopia {
    const conditionals = new Map<string, Conditional>();
    const conditionalAreas = new Set<number>();
    const rewritten = new Set(areasInRange(rom.layout.relocation));

    const areas: AreaState[] = rom.areas.map((area) => {
      const chests = area.chests ? [...area.chests] : undefined;
      const rooms = area.rooms.map((room): RoomState => {
        const objectTable = [...room.objectTable];
        if (chests && rewritten.has(area.index)) {
          const cond = extractConditional(objectTable, chests);
          if (cond) {
            conditionals.set(chestKey(cond.chest), cond);
            conditionalAreas.add(area.index);
          }
        }
        return { warpTable: room.warpTable, enemyTable: room.enemyTable, objectTable };
      });

      return chests
        ? { index: area.index, pointer: area.pointer, rooms, chests }
        : { index: area.index, pointer: area.pointer, rooms };
    });

    return new Neutopia(rom.layout, Uint8Array.from(data), areas, conditionals, conditionalAreas);
  }

  public get areaCount(): number {
    return this.areas.length;
  }

  public get conditionals(): ReadonlyMap<string, Conditional> {
    return this.conditionalsByChest;
  }

  public chestTable(area: number): ReadonlyArray<Chest> | undefined {
    return this.areas[area]?.chests;
  }

  /** Object table as it stands now, with any conditional pair lifted out. */
  public objectTable(area: number, room: number): ReadonlyArray<TableEntry> {
    const r = this.areas[area]?.rooms[room];
    if (!r) throw new RangeError(`No room ${hex(area)}:${hex(room)}`);
    return r.objectTable;
  }

  public filterChests(pred: (chest: ChestRef) => boolean): ChestRef[] {
    const out: ChestRef[] = [];
    for (const area of this.areas) {
      const chests = area.chests;
      if (!chests) continue;

      area.rooms.forEach((room, roomIdx) => {
        let index = 0;
        for (const entry of room.objectTable) {
          const id = chestIdOf(entry);
          if (id === undefined) continue;
          const info = chests[id];
          if (!info) continue;

          const ref: ChestRef = { info, area: area.index, room: roomIdx, index };
          index += 1;
          if (pred(ref)) out.push(ref);
        }
      });
    }
    return out;
  }

  /** Overwrites the chest-table slot behind each ref with `ref.info`. */
  public updateChests(refs: ReadonlyArray<ChestRef>): void {
    this.assertLive();
    for (const ref of refs) {
      const { chests, slot } = this.locateSlot(ref);
      chests[slot] = ref.info;
    }
  }

  private locateSlot(ref: ChestRef): { chests: Chest[]; slot: number } {
    const where = `chest ${ref.index} of room ${hex(ref.area)}:${hex(ref.room)}`;
    const area = this.areas[ref.area];
    const room = area?.rooms[ref.room];
    if (!area?.chests || !room) {
      throw new ConsistencyError("INCOHERENT_CHEST", `Can't locate ${where}: no such chest-bearing room`);
    }

    let seen = 0;
    for (const entry of room.objectTable) {
      const id = chestIdOf(entry);
      if (id === undefined || area.chests[id] === undefined) continue;
      if (seen === ref.index) return { chests: area.chests, slot: id };
      seen += 1;
    }
    throw new ConsistencyError("INCOHERENT_CHEST", `Can't locate ${where}: room has ${seen} chests`);
  }

  private assertLive(): void {
    if (this.consumed) {
      throw new ConsistencyError("GAME_CONSUMED", "Game model was already written out");
    }
  }

  // Puts a conditional pair back behind the first chest whose current content
  // owns one, moved to that chest's location.
  private withConditionals(
    area: AreaState,
    objects: ReadonlyArray<TableEntry>,
    placed: Set<string>,
  ): TableEntry[] {
    const out = [...objects];
    const chests = area.chests;
    if (!chests) return out;

    for (let i = 0; i < out.length; i++) {
      const entry = out[i]!;
      const id = chestIdOf(entry);
      const loc = locationOf(entry);
      if (id === undefined || !loc) continue;
      const chest = chests[id];
      if (!chest) continue;

      const key = chestKey(chest);
      const cond = this.conditionalsByChest.get(key);
      if (cond) {
        out.splice(i + 1, 0, ...cond.entries.map((e) => moveTo(e, loc)));
        placed.add(key);
        break;
      }
    }
    return out;
  }

  /**
   * Serializes the model. Every chest table moves to the layout's free space;
   * the rooms of the relocated areas are repacked back to back starting at
   * the first relocated area's original room pointer table. Rooms outside the
   * range keep their bytes, so a conditional whose chest content now only
   * sits outside the range is dropped with a warning.
   */
  public write(options: WriteOptions = {}): Uint8Array {
    this.assertLive();
    const layout = this.layout;
    const relocated = areasInRange(options.relocation ?? layout.relocation);
    const warn = options.warn ?? (() => {});

    const first = this.areas[relocated[0] ?? -1];
    if (!first || relocated.some((a) => this.areas[a] === undefined)) {
      throw new RangeError(`Relocation range is outside the ROM's ${this.areas.length} areas`);
    }

    const unwritten = [...this.conditionalAreas].filter((a) => !relocated.includes(a));
    if (unwritten.length > 0) {
      throw new ConsistencyError(
        "UNWRITTEN_CONDITIONAL",
        `Conditionals were lifted from area ${unwritten.map((a) => hex(a)).join(", ")}, outside the relocation range`,
      );
    }

    const w = new RomWriter(this.original);
    for (const area of this.areas) {
      if (!area.chests) continue;
      const slot = chestTableSlot(layout, area.index);
      w.seek(slot);
      w.writeBytes(encodeChestTable(area.chests));
      w.seek(layout.chestTable + area.index * POINTER_SIZE);
      w.writeBytes(encodePointer(slot));
    }

    const placed = new Set<string>();
    const newPointers = new Map<number, number>();
    const roomDataStart = first.pointer;
    let cursor = roomDataStart;

    for (const areaIdx of relocated) {
      const area = this.areas[areaIdx]!;
      const roomPtrsOffset = cursor;
      const roomPtrs: number[] = [];
      w.seek(roomPtrsOffset + ROOMS_PER_AREA * POINTER_SIZE);

      for (const room of area.rooms) {
        const descriptor = w.position();
        roomPtrs.push(descriptor);
        w.skip(ROOM_DESCRIPTOR_SIZE);

        const warpPtr = w.position();
        w.writeBytes(room.warpTable);

        const enemyPtr = w.position();
        w.writeBytes(room.enemyTable);
        w.writeU8(TABLE_TERMINATOR);

        const objectPtr = w.position();
        w.writeBytes(writeObjectTable(this.withConditionals(area, room.objectTable, placed)));
        w.writeU8(TABLE_TERMINATOR);

        const roomEnd = w.position();
        w.seek(descriptor);
        w.writeBytes(encodePointer(warpPtr));
        w.writeBytes(encodePointer(enemyPtr));
        w.writeBytes(encodePointer(objectPtr));
        w.seek(roomEnd);
      }

      cursor = w.position();

      w.seek(roomPtrsOffset);
      for (const p of roomPtrs) w.writeBytes(encodePointer(p));

      w.seek(layout.areaTable + areaIdx * POINTER_SIZE);
      w.writeBytes(encodePointer(roomPtrsOffset));
      newPointers.set(areaIdx, roomPtrsOffset);
    }

    // Areas outside the range that shared room data with a relocated area
    // follow it to its new home.
    for (const area of this.areas) {
      if (newPointers.has(area.index)) continue;
      const twin = relocated.find((a) => this.areas[a]!.pointer === area.pointer);
      if (twin === undefined) continue;
      w.seek(layout.areaTable + area.index * POINTER_SIZE);
      w.writeBytes(encodePointer(newPointers.get(twin)!));
    }

    for (const [key, cond] of this.conditionalsByChest) {
      if (placed.has(key)) continue;
      warn(`Conditional objects for ${itemName(cond.chest)} [${key}] have no chest in a relocated area; dropped`);
    }

    const freeStart = layout.chestTableFreeSpace;
    const freeEnd = chestTableSlot(layout, this.areas.length);
    if (roomDataStart < freeEnd && freeStart < cursor) {
      warn(
        `Relocated room data [${hex(roomDataStart, 5)}, ${hex(cursor, 5)}) overlaps the chest table area [${hex(freeStart, 5)}, ${hex(freeEnd, 5)})`,
      );
    }

    this.consumed = true;
    return w.toBytes();
  }
}
