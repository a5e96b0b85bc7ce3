import { describe, expect, it } from "vitest";

import { FormatError } from "../src/neutopia/errors.js";
import { decodePointer, decodePointerTable, encodePointer } from "../src/neutopia/pointer.js";
import { catchError } from "./support/errors.js";

describe("bank-relative pointers", () => {
  it("decodes the cartridge's pointer samples", () => {
    expect(decodePointer(Uint8Array.of(0x48, 0x4e, 0x45))).toBe(0x5054e);
    expect(decodePointer(Uint8Array.of(0x49, 0x44, 0x51))).toBe(0x53144);
  });

  it("encodes back to the stored bytes", () => {
    expect(Array.from(encodePointer(0x5054e))).toEqual([0x48, 0x4e, 0x45]);
    expect(Array.from(encodePointer(0x53144))).toEqual([0x49, 0x44, 0x51]);
  });

  it("round-trips offsets across the image", () => {
    for (const offset of [0, 1, 0xff, 0x100, 0x1fff, 0x2000, 0x1d69c, 0x4fe00, 0x5ffff]) {
      expect(decodePointer(encodePointer(offset))).toBe(offset);
    }
  });

  it("rejects values below the bank window", () => {
    const err = catchError(FormatError, () => decodePointer(Uint8Array.of(0x00, 0x00, 0x00)));
    expect(err.code).toBe("INVALID_POINTER");
  });

  it("reads at an offset", () => {
    const data = Uint8Array.of(0xaa, 0x48, 0x4e, 0x45);
    expect(decodePointer(data, 1)).toBe(0x5054e);
  });

  it("decodes tables and fails short reads", () => {
    const data = Uint8Array.of(0x48, 0x4e, 0x45, 0x49, 0x44, 0x51);
    expect(decodePointerTable(data, 2)).toEqual([0x5054e, 0x53144]);
    expect(() => decodePointerTable(data, 3)).toThrow(FormatError);
    expect(() => decodePointerTable(data, 3)).toThrow(/needs 9 bytes, have 6/);
  });
});
