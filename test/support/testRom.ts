import { type Chest, encodeChestTable } from "../../src/neutopia/chest.js";
import { CHEST_OBJECT_BASE, type TableEntry, writeObjectTable } from "../../src/neutopia/objectTable.js";
import { encodePointer } from "../../src/neutopia/pointer.js";
import { type AreaRange, ROOMS_PER_AREA, type RomLayout } from "../../src/neutopia/romLayout.js";

export type TestRoom = Readonly<{
  warp?: ReadonlyArray<number>;
  enemies?: ReadonlyArray<number>; // no 0xFF
  objects?: ReadonlyArray<TableEntry>;
}>;

export type TestArea = Readonly<{
  rooms?: Readonly<Record<number, TestRoom>>;
  chests?: ReadonlyArray<Chest>;
  /** Share room data with another area instead of writing its own. */
  aliasOf?: number;
}>;

export type TestRomOptions = Readonly<{
  chestTableCount?: number;
  relocation?: AreaRange;
  endgameArea?: number;
}>;

export type TestRom = Readonly<{
  image: Uint8Array;
  layout: RomLayout;
  areaPointers: ReadonlyArray<number>;
  chestTablePointers: ReadonlyArray<number>;
  roomDataEnd: number;
}>;

export const TEST_IMAGE_SIZE = 0x8000;
export const ROOM_DATA_START = 0x400;
export const CHEST_DATA = 0x280;
const ROOM_ORDER_DATA = 0x80;
const MAX_AREAS = 8;

export function chestObject(slot: number, x: number, y: number): TableEntry {
  return { kind: "OBJECT", object: { x, y, id: CHEST_OBJECT_BASE + slot } };
}

export function chest(itemId: number, arg = 0, text = 0, unknown = 0): Chest {
  return { itemId, arg, text, unknown };
}

// Same byte order the game model writes: pointer table, then per room the
// descriptor, warp, enemies + 0xFF, objects + 0xFF.
function writeArea(image: Uint8Array, start: number, area: TestArea): number {
  let pos = start + ROOMS_PER_AREA * 3;
  for (let r = 0; r < ROOMS_PER_AREA; r++) {
    const room = area.rooms?.[r] ?? {};
    const descriptor = pos;
    image.set(encodePointer(descriptor), start + r * 3);
    pos += 9;

    const warp = pos;
    image.set(room.warp ?? [], pos);
    pos += room.warp?.length ?? 0;

    const enemy = pos;
    image.set(room.enemies ?? [], pos);
    pos += room.enemies?.length ?? 0;
    image[pos++] = 0xff;

    const obj = pos;
    const objBytes = writeObjectTable(room.objects ?? []);
    image.set(objBytes, pos);
    pos += objBytes.length;
    image[pos++] = 0xff;

    image.set(encodePointer(warp), descriptor);
    image.set(encodePointer(enemy), descriptor + 3);
    image.set(encodePointer(obj), descriptor + 6);
  }
  return pos;
}

/**
 * Builds a small image in the cartridge's level-data format. Fixed tables sit
 * below 0x400, room data follows contiguously, and rewritten chest tables
 * go to 0x7000.
 */
export function buildTestRom(areas: ReadonlyArray<TestArea>, options: TestRomOptions = {}): TestRom {
  if (areas.length === 0 || areas.length > MAX_AREAS) throw new Error(`1..${MAX_AREAS} areas supported`);

  const layout: RomLayout = {
    areaTable: 0x000,
    areaCount: areas.length,
    roomOrderTable: 0x020,
    chestTable: 0x040,
    chestTableCount: options.chestTableCount ?? areas.length,
    chestTableFreeSpace: 0x7000,
    chestTableStride: 0x20,
    relocation: options.relocation ?? { firstArea: 0, lastArea: areas.length - 1 },
    endgameArea: options.endgameArea ?? areas.length,
  };

  const image = new Uint8Array(TEST_IMAGE_SIZE);
  const areaPointers: number[] = [];
  const chestTablePointers: number[] = [];
  let cursor = ROOM_DATA_START;

  areas.forEach((area, a) => {
    const order = ROOM_ORDER_DATA + a * 0x40;
    image.set(encodePointer(order), layout.roomOrderTable + a * 3);
    for (let i = 0; i < 0x40; i++) image[order + i] = i;

    if (a < layout.chestTableCount) {
      const slot = CHEST_DATA + a * 0x20;
      image.set(encodePointer(slot), layout.chestTable + a * 3);
      image.set(encodeChestTable(area.chests ?? []), slot);
      chestTablePointers.push(slot);
    }

    if (area.aliasOf === undefined) {
      areaPointers[a] = cursor;
      cursor = writeArea(image, cursor, area);
    }
  });

  areas.forEach((area, a) => {
    if (area.aliasOf === undefined) return;
    const target = areaPointers[area.aliasOf];
    if (target === undefined) throw new Error(`Area ${a} aliases area ${area.aliasOf}, which has no room data`);
    areaPointers[a] = target;
  });

  areaPointers.forEach((p, a) => image.set(encodePointer(p), layout.areaTable + a * 3));

  return { image, layout, areaPointers, chestTablePointers, roomDataEnd: cursor };
}
