import { describe, expect, it } from "vitest";

import { FormatError } from "../src/neutopia/errors.js";
import {
  chestIdOf,
  describeEntry,
  isConditional,
  KNOWN_TAGS,
  locationOf,
  objectTableLen,
  parseEntry,
  parseObjectTable,
  type TableEntry,
  writeEntry,
  writeObjectTable,
} from "../src/neutopia/objectTable.js";
import { catchError } from "./support/errors.js";

const obj = { x: 3, y: 7, id: 0x61 };

const ONE_OF_EACH: ReadonlyArray<[TableEntry, number[]]> = [
  [{ kind: "OBJECT", object: obj }, [0x00, 0x73, 0x61]],
  [{ kind: "OPEN_DOOR", value: 0x02 }, [0x01, 0x02]],
  [{ kind: "PUSH_BLOCK_GATED_DOOR", value: 0x03 }, [0x02, 0x03]],
  [{ kind: "ENEMY_GATED_DOOR", value: 0x01 }, [0x03, 0x01]],
  [{ kind: "BOMBABLE_DOOR", value: 0x08 }, [0x05, 0x08]],
  [{ kind: "PUSH_BLOCK_GATED_OBJECT", object: obj }, [0x06, 0x73, 0x61]],
  [{ kind: "ENEMY_GATED_OBJECT", object: obj }, [0x07, 0x73, 0x61]],
  [{ kind: "BELL_GATED_OBJECT", object: obj }, [0x08, 0x73, 0x61]],
  [{ kind: "DARK_ROOM" }, [0x09]],
  [{ kind: "BOSS_DOOR", value: 0x04 }, [0x0a, 0x04]],
  [{ kind: "UNKNOWN_0B", data: [0x46, 0x2a, 0x04] }, [0x0b, 0x46, 0x2a, 0x04]],
  [{ kind: "BURNABLE", object: obj }, [0x0c, 0x73, 0x61]],
  [{ kind: "HIDDEN_ROOM", data: [0x01, 0x02, 0x03] }, [0x0d, 0x01, 0x02, 0x03]],
  [{ kind: "FALCON_BOOTS_NEEDED" }, [0x81]],
  [{ kind: "NPC", data: [0x10, 0x20, 0x30, 0x40, 0x50] }, [0x9a, 0x10, 0x20, 0x30, 0x40, 0x50]],
  [{ kind: "OUCH_ROPE", object: obj }, [0xbd, 0x73, 0x61]],
  [{ kind: "ARROW_LAUNCHER", object: obj }, [0xbf, 0x73, 0x61]],
  [{ kind: "SWORDS", object: obj }, [0xc0, 0x73, 0x61]],
  [{ kind: "GHOST_SPAWNER", object: obj }, [0xc1, 0x73, 0x61]],
  [{ kind: "FIREBALL_SPAWNER", object: obj }, [0xc6, 0x73, 0x61]],
  [{ kind: "SHOP_ITEM", data: [1, 2, 3, 4, 5, 6, 7] }, [0xda, 1, 2, 3, 4, 5, 6, 7]],
  [{ kind: "UNKNOWN_E1", data: [9, 8, 7, 6, 5, 4, 3, 2, 1] }, [0xe1, 9, 8, 7, 6, 5, 4, 3, 2, 1]],
  [{ kind: "UNKNOWN_F4", data: [0xa, 0xb, 0xc, 0xd, 0xe] }, [0xf4, 0xa, 0xb, 0xc, 0xd, 0xe]],
];

describe("object table entries", () => {
  it("covers every known tag", () => {
    expect(ONE_OF_EACH.map(([, bytes]) => bytes[0]).sort((a, b) => (a ?? 0) - (b ?? 0))).toEqual(KNOWN_TAGS);
  });

  it("writes each variant to its byte form and parses it back", () => {
    for (const [entry, bytes] of ONE_OF_EACH) {
      expect(Array.from(writeEntry(entry))).toEqual(bytes);

      const parsed = parseEntry(Uint8Array.from(bytes));
      expect(parsed.entry).toEqual(entry);
      expect(parsed.rest.length).toBe(0);
    }
  });

  it("returns the unread remainder", () => {
    const { entry, rest } = parseEntry(Uint8Array.of(0x01, 0x05, 0xff, 0x42));
    expect(entry).toEqual({ kind: "OPEN_DOOR", value: 0x05 });
    expect(Array.from(rest)).toEqual([0xff, 0x42]);
  });

  it("rejects unknown tags", () => {
    expect(() => parseEntry(Uint8Array.of(0x04, 0x00))).toThrow("Unknown object table tag 0x04 at byte 0");
  });

  it("reports truncated payloads with the entry that ran short", () => {
    const err = catchError(FormatError, () => parseEntry(Uint8Array.of(0x00, 0x12)));
    expect(err.code).toBe("SHORT_READ");
    expect(err.message).toBe("OBJECT entry at byte 0: Unexpected end of data at 2: need 1 bytes, have 0");
  });

  it("validates what it writes", () => {
    expect(() => writeEntry({ kind: "OBJECT", object: { x: 16, y: 0, id: 1 } })).toThrow(/OBJECT.x must be 0..15/);
    expect(() => writeEntry({ kind: "NPC", data: [1, 2] })).toThrow("NPC payload must be 5 bytes, got 2");
  });
});

describe("object tables", () => {
  const table = Uint8Array.of(
    0x00, 0x52, 0xa5,
    0x0b, 0x46, 0x2a, 0x04,
    0x09,
    0x01, 0x02,
    0xda, 1, 2, 3, 4, 5, 6, 7,
  );

  it("writes an unmodified table back byte for byte", () => {
    expect(Array.from(writeObjectTable(parseObjectTable(table)))).toEqual(Array.from(table));
  });

  it("parses an empty table", () => {
    expect(parseObjectTable(new Uint8Array(0))).toEqual([]);
    expect(objectTableLen(Uint8Array.of(0xff))).toBe(0);
  });

  it("measures up to the terminator", () => {
    const withTerminator = Uint8Array.of(...table, 0xff, 0x00, 0x00);
    expect(objectTableLen(withTerminator)).toBe(table.length);
  });

  it("rejects leftovers", () => {
    expect(() => parseObjectTable(Uint8Array.of(0x09, 0xff))).toThrow(
      "Object table has 1 unparsed bytes after 1 entries: [ff]",
    );
    expect(() => parseObjectTable(Uint8Array.of(0x01))).toThrow(FormatError);
    expect(() => objectTableLen(Uint8Array.of(0x09, 0x04))).toThrow(/without a terminator/);
  });
});

describe("entry helpers", () => {
  it("maps chest objects to chest-table slots", () => {
    expect(chestIdOf({ kind: "OBJECT", object: { x: 0, y: 0, id: 0x4c } })).toBe(0);
    expect(chestIdOf({ kind: "OBJECT", object: { x: 0, y: 0, id: 0x53 } })).toBe(7);
    expect(chestIdOf({ kind: "OBJECT", object: { x: 0, y: 0, id: 0x54 } })).toBeUndefined();
    expect(chestIdOf({ kind: "BURNABLE", object: { x: 0, y: 0, id: 0x4c } })).toBeUndefined();
  });

  it("recognizes conditionals and locations", () => {
    expect(isConditional({ kind: "UNKNOWN_0B", data: [0, 0, 0] })).toBe(true);
    expect(isConditional({ kind: "HIDDEN_ROOM", data: [0, 0, 0] })).toBe(false);
    expect(locationOf({ kind: "OBJECT", object: { x: 2, y: 5, id: 0x4c } })).toEqual({ x: 2, y: 5 });
    expect(locationOf({ kind: "DARK_ROOM" })).toBeUndefined();
  });

  it("describes entries", () => {
    expect(describeEntry({ kind: "OBJECT", object: { x: 2, y: 5, id: 0xa5 } })).toBe("object 0xa5 @ (2,5)");
    expect(describeEntry({ kind: "OPEN_DOOR", value: 2 })).toBe("open door 0x02");
    expect(describeEntry({ kind: "UNKNOWN_0B", data: [0x46, 0x2a, 0x04] })).toBe("unknown 0b [0x46, 0x2a, 0x04]");
    expect(describeEntry({ kind: "DARK_ROOM" })).toBe("dark room");
  });
});
