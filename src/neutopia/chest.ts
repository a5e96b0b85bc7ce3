import { BinaryReader } from "./binary.js";
import { FormatError, hex } from "./errors.js";

export type Chest = Readonly<{
  itemId: number;
  arg: number;
  text: number;
  unknown: number;
}>;

export const CHEST_SIZE = 4;
export const CHESTS_PER_AREA = 8;

export const ITEM_BOMBS = 0x00;
export const ITEM_MEDICINE = 0x01;
export const ITEM_FIRE_WAND = 0x02;
export const ITEM_SKY_BELL = 0x03;
export const ITEM_MOONBEAM_MOSS = 0x05;
export const ITEM_FALCON_SHOES = 0x0b;
export const ITEM_RAINBOW_DROP = 0x0c;
export const ITEM_BOOK_OF_REVIVAL = 0x0d;
export const ITEM_CRYSTAL_BALL = 0x10;
export const ITEM_CRYPT_KEY = 0x11;
export const ITEM_FIRST_MEDALLION = 0x12;
export const MEDALLION_COUNT = 8;

export function isMedallion(chest: Chest): boolean {
  return chest.itemId >= ITEM_FIRST_MEDALLION && chest.itemId < ITEM_FIRST_MEDALLION + MEDALLION_COUNT;
}

/** Items the randomizer moves: everything below the medallions. Placeholder ids above them stay put. */
export function isShuffleableItem(chest: Chest): boolean {
  return chest.itemId < ITEM_FIRST_MEDALLION;
}

/** Canonical value key; two chests are the same item iff their keys match. */
export function chestKey(chest: Chest): string {
  return [chest.itemId, chest.arg, chest.text, chest.unknown].map((b) => hex(b)).join(":");
}

export function compareChests(a: Chest, b: Chest): number {
  return a.itemId - b.itemId || a.arg - b.arg || a.text - b.text || a.unknown - b.unknown;
}

const TIERS = ["Starter", "Bronze", "Steel", "Strongest"] as const;

function tierName(arg: number, kind: string): string {
  const tier = TIERS[arg - 1];
  return tier === undefined ? `Unknown ${kind}` : `${tier} ${kind}`;
}

export function itemName(chest: Chest): string {
  switch (chest.itemId) {
    case 0x00:
      return `Bombs x${chest.arg}`;
    case 0x01:
      return "Medicine";
    case 0x02:
      return "Fire Wand";
    case 0x03:
      return "Sky Bell";
    case 0x04:
      return "Wings";
    case 0x05:
      return "Moonbeam Moss";
    case 0x06:
      return "Magic Ring";
    case 0x08:
      return tierName(chest.arg, "Sword");
    case 0x09:
      return tierName(chest.arg, "Armor");
    case 0x0a:
      return tierName(chest.arg, "Shield");
    case 0x0b:
      return "Falcon Shoes";
    case 0x0c:
      return "Rainbow Drop";
    case 0x0d:
      return "Book of Revival";
    case 0x10:
      return "Crystal Ball";
    case 0x11:
      return "Crypt Key";
    case 0x07:
    case 0x0e:
    case 0x0f:
    case 0x1a:
      return "Placeholder";
    default:
      if (isMedallion(chest)) return `Crypt ${chest.itemId - ITEM_FIRST_MEDALLION + 1} Medallion`;
      return "Unknown";
  }
}

export function parseChestTable(data: Uint8Array, offset: number): Chest[] {
  const r = new BinaryReader(data, offset);
  if (r.remaining() < CHESTS_PER_AREA * CHEST_SIZE) {
    throw new FormatError(
      "SHORT_TABLE",
      `Chest table at ${hex(offset, 5)} needs ${CHESTS_PER_AREA * CHEST_SIZE} bytes, have ${Math.max(0, r.remaining())}`,
    );
  }

  const out: Chest[] = [];
  for (let i = 0; i < CHESTS_PER_AREA; i++) {
    out.push({ itemId: r.readU8(), arg: r.readU8(), text: r.readU8(), unknown: r.readU8() });
  }
  return out;
}

export function encodeChest(chest: Chest): Uint8Array {
  return Uint8Array.of(chest.itemId, chest.arg, chest.text, chest.unknown);
}

export function encodeChestTable(chests: ReadonlyArray<Chest>): Uint8Array {
  const out = new Uint8Array(chests.length * CHEST_SIZE);
  chests.forEach((c, i) => out.set(encodeChest(c), i * CHEST_SIZE));
  return out;
}
