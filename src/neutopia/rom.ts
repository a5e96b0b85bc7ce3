import { type Chest, parseChestTable } from "./chest.js";
import { FormatError, hex } from "./errors.js";
import { type Interval, IntervalStore } from "./interval.js";
import { objectTableLen, parseObjectTable, TABLE_TERMINATOR, type TableEntry } from "./objectTable.js";
import { decodePointer, decodePointerTable, POINTER_SIZE } from "./pointer.js";
import { ROOMS_PER_AREA, type RomLayout } from "./romLayout.js";

export type Room = Readonly<{
  /** Offset of the room's 3-pointer descriptor. */
  baseAddr: number;
  warpTablePointer: number;
  enemyTablePointer: number;
  objectTablePointer: number;

  warpTable: Uint8Array;
  enemyTable: Uint8Array; // without the 0xFF terminator
  objectTable: ReadonlyArray<TableEntry>;
}>;

export type Area = Readonly<{
  index: number;
  /** Offset of the area's 64-entry room descriptor pointer table. */
  pointer: number;
  rooms: ReadonlyArray<Room>;
  roomOrderPointer: number;
  roomOrder: Uint8Array;
  chestTablePointer?: number;
  chests?: ReadonlyArray<Chest>;
}>;

const ROOM_ORDER_SIZE = 0x40;

function roomContext(area: number, room: number): string {
  return `room ${hex(area)}:${hex(room)}`;
}

function withContext<T>(context: string, f: () => T): T {
  try {
    return f();
  } catch (e: unknown) {
    if (e instanceof FormatError) throw e.withContext(context);
    throw e;
  }
}

function readUntilTerminator(data: Uint8Array, offset: number): Uint8Array {
  const end = data.indexOf(TABLE_TERMINATOR, offset);
  if (end === -1) {
    throw new FormatError(
      "TRUNCATED_ROM",
      `Enemy table at ${hex(offset, 5)} has no 0xFF terminator before the end of the ROM`,
    );
  }
  return data.slice(offset, end);
}

function checkOffset(data: Uint8Array, offset: number, what: string): void {
  if (offset >= data.length) {
    throw new FormatError(
      "TRUNCATED_ROM",
      `${what} at ${hex(offset, 5)} is past the end of the ROM (${data.length} bytes)`,
    );
  }
}

function parseRoom(data: Uint8Array, descriptor: number, intervals: IntervalStore): Room {
  const warpTablePointer = decodePointer(data, descriptor);
  const enemyTablePointer = decodePointer(data, descriptor + POINTER_SIZE);
  const objectTablePointer = decodePointer(data, descriptor + 2 * POINTER_SIZE);
  intervals.add(descriptor, descriptor + 3 * POINTER_SIZE);

  checkOffset(data, enemyTablePointer, "Enemy table");
  checkOffset(data, objectTablePointer, "Object table");
  if (enemyTablePointer < warpTablePointer) {
    throw new FormatError(
      "TRUNCATED_ROM",
      `Warp table at ${hex(warpTablePointer, 5)} starts after its enemy table at ${hex(enemyTablePointer, 5)}`,
    );
  }

  const warpTable = data.slice(warpTablePointer, enemyTablePointer);
  const enemyTable = readUntilTerminator(data, enemyTablePointer);
  const objectLen = objectTableLen(data.subarray(objectTablePointer));
  const objectTable = parseObjectTable(data.subarray(objectTablePointer, objectTablePointer + objectLen));

  intervals.add(warpTablePointer, enemyTablePointer);
  intervals.add(enemyTablePointer, enemyTablePointer + enemyTable.length + 1);
  intervals.add(objectTablePointer, objectTablePointer + objectLen + 1);

  return {
    baseAddr: descriptor,
    warpTablePointer,
    enemyTablePointer,
    objectTablePointer,
    warpTable,
    enemyTable,
    objectTable,
  };
}

/**
 * Read-only structural view of the cartridge's level data: every area's rooms
 * with their warp, enemy and object tables, plus the per-area chest tables.
 */
export class NeutopiaRom {
  private constructor(
    public readonly layout: RomLayout,
    public readonly areas: ReadonlyArray<Area>,
    private readonly intervals: ReadonlyArray<IntervalStore>,
  ) {}

  public static parse(data: Uint8Array, layout: RomLayout): NeutopiaRom {
    const areaPointers = withContext("area table", () =>
      decodePointerTable(data, layout.areaCount, layout.areaTable),
    );
    const roomOrderPointers = withContext("room order table", () =>
      decodePointerTable(data, layout.areaCount, layout.roomOrderTable),
    );
    const chestTablePointers = withContext("chest table", () =>
      decodePointerTable(data, layout.chestTableCount, layout.chestTable),
    );

    const areas: Area[] = [];
    const intervals: IntervalStore[] = [];

    areaPointers.forEach((areaPtr, areaIdx) => {
      const store = new IntervalStore();
      store.add(areaPtr, areaPtr + ROOMS_PER_AREA * POINTER_SIZE);

      const rooms: Room[] = [];
      for (let roomIdx = 0; roomIdx < ROOMS_PER_AREA; roomIdx++) {
        rooms.push(
          withContext(roomContext(areaIdx, roomIdx), () => {
            const descriptor = decodePointer(data, areaPtr + roomIdx * POINTER_SIZE);
            return parseRoom(data, descriptor, store);
          }),
        );
      }

      const roomOrderPointer = roomOrderPointers[areaIdx]!;
      const roomOrder = withContext(`room order table of area ${hex(areaIdx)}`, () => {
        if (roomOrderPointer + ROOM_ORDER_SIZE > data.length) {
          throw new FormatError("SHORT_TABLE", `Room order table at ${hex(roomOrderPointer, 5)} is truncated`);
        }
        return data.slice(roomOrderPointer, roomOrderPointer + ROOM_ORDER_SIZE);
      });

      const chestTablePointer = chestTablePointers[areaIdx];
      const area: Area =
        chestTablePointer === undefined
          ? { index: areaIdx, pointer: areaPtr, rooms, roomOrderPointer, roomOrder }
          : {
              index: areaIdx,
              pointer: areaPtr,
              rooms,
              roomOrderPointer,
              roomOrder,
              chestTablePointer,
              chests: withContext(`chest table of area ${hex(areaIdx)}`, () =>
                parseChestTable(data, chestTablePointer),
              ),
            };

      areas.push(area);
      intervals.push(store);
    });

    return new NeutopiaRom(layout, areas, intervals);
  }

  public area(index: number): Area {
    const area = this.areas[index];
    if (!area) throw new RangeError(`No area ${hex(index)} (ROM has ${this.areas.length})`);
    return area;
  }

  /** Merged byte ranges claimed by an area's room data; diagnostic only. */
  public roomDataIntervals(area: number): Interval[] {
    const store = this.intervals[area];
    if (!store) throw new RangeError(`No area ${hex(area)} (ROM has ${this.areas.length})`);
    return store.getIntervals();
  }

  public roomDataGaps(area: number): Interval[] {
    const store = this.intervals[area];
    if (!store) throw new RangeError(`No area ${hex(area)} (ROM has ${this.areas.length})`);
    return store.gaps();
  }
}
