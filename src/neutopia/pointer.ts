import { FormatError, hex } from "./errors.js";

// Pointers are stored as (bank, low byte, high byte | window bits). Bank 0x20
// is the first byte of the ROM file.
const BANK_BASE = 0x40000;
const WINDOW_BITS = 0x40;

export const POINTER_SIZE = 3;

export function decodePointer(data: Uint8Array, offset = 0): number {
  if (offset < 0 || offset + POINTER_SIZE > data.length) {
    throw new FormatError(
      "SHORT_READ",
      `Pointer at ${hex(offset, 5)} runs past the end of the data (${data.length} bytes)`,
    );
  }
  const b0 = data[offset]!;
  const b1 = data[offset + 1]!;
  const b2 = data[offset + 2]!;

  const raw = (b0 << 13) | ((b2 & 0x1f) << 8) | b1;
  if (raw < BANK_BASE) {
    throw new FormatError(
      "INVALID_POINTER",
      `Pointer [${hex(b0)}, ${hex(b1)}, ${hex(b2)}] at ${hex(offset, 5)} is below the ROM bank window`,
    );
  }
  return raw - BANK_BASE;
}

export function encodePointer(romOffset: number): Uint8Array {
  const raw = romOffset + BANK_BASE;
  return Uint8Array.of((raw >>> 13) & 0xff, raw & 0xff, WINDOW_BITS | ((raw >>> 8) & 0x1f));
}

export function decodePointerTable(data: Uint8Array, count: number, offset = 0): number[] {
  if (offset < 0 || offset + count * POINTER_SIZE > data.length) {
    throw new FormatError(
      "SHORT_READ",
      `Pointer table at ${hex(offset, 5)} needs ${count * POINTER_SIZE} bytes, have ${Math.max(0, data.length - offset)}`,
    );
  }
  const out: number[] = [];
  for (let i = 0; i < count; i++) out.push(decodePointer(data, offset + i * POINTER_SIZE));
  return out;
}
