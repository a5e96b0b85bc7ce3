import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";

import { PolicyError } from "../src/neutopia/errors.js";
import { ROM_SIZE } from "../src/neutopia/romLayout.js";
import { HEADER_SIZE, stripHeader, verify } from "../src/neutopia/verify.js";
import { verifyRom } from "../src/rando/randomize.js";
import { catchError } from "./support/errors.js";

const md5 = (b: Uint8Array): string => createHash("md5").update(b).digest("hex");

describe("ROM verification", () => {
  it("reports an all-zero image as unrecognized", () => {
    const zeros = new Uint8Array(ROM_SIZE);
    expect(verify(zeros)).toEqual({
      headered: false,
      md5Hash: md5(zeros),
      known: false,
      desc: "Unrecognized ROM",
      region: "Unknown",
    });
  });

  it("detects and strips the copier header", () => {
    const data = new Uint8Array(ROM_SIZE + HEADER_SIZE);
    data[0] = 0x42;
    const info = verify(data);

    expect(info.headered).toBe(true);
    expect(info.md5Hash).toBe(md5(new Uint8Array(ROM_SIZE)));
    expect(stripHeader(data).length).toBe(ROM_SIZE);
  });

  it("rejects other sizes", () => {
    const err = catchError(PolicyError, () => verify(new Uint8Array(100)));
    expect(err.code).toBe("INVALID_ROM_SIZE");
    expect(err.message).toBe(
      "ROM size (100) is neither the headered (393728) nor the unheadered (393216) size",
    );
  });

  it("refuses to randomize an unrecognized dump", () => {
    const zeros = new Uint8Array(ROM_SIZE);
    const err = catchError(PolicyError, () => verifyRom(zeros));
    expect(err.code).toBe("UNRECOGNIZED_ROM");
    expect(err.message).toBe(`ROM with MD5 hash ${md5(zeros)} is unrecognized. Please use the Neutopia (U) ROM.`);
  });
});
