import { BinaryReader } from "../neutopia/binary.js";
import { FormatError, hex } from "../neutopia/errors.js";

export type IpsHunk =
  | Readonly<{ kind: "DATA"; offset: number; payload: Uint8Array }>
  | Readonly<{ kind: "RLE"; offset: number; count: number; value: number }>;

export type IpsPatch = Readonly<{ hunks: ReadonlyArray<IpsHunk> }>;

const MAGIC = "PATCH";
const EOF_MARKER = 0x454f46; // "EOF"

function hunkLength(h: IpsHunk): number {
  return h.kind === "DATA" ? h.payload.length : h.count;
}

export function parseIps(bytes: Uint8Array): IpsPatch {
  const r = new BinaryReader(bytes);
  try {
    const magic = String.fromCharCode(...r.readBytes(MAGIC.length));
    if (magic !== MAGIC) {
      throw new FormatError("INVALID_PATCH", `Bad IPS magic "${magic}", expected "${MAGIC}"`);
    }

    const hunks: IpsHunk[] = [];
    for (;;) {
      const at = r.position();
      const offset = r.readU24BE();
      if (offset === EOF_MARKER) break;

      const len = r.readU16BE();
      if (len > 0) {
        hunks.push({ kind: "DATA", offset, payload: r.readBytes(len) });
        continue;
      }

      const count = r.readU16BE();
      const value = r.readU8();
      if (count === 0) throw new FormatError("INVALID_PATCH", `Empty RLE record at byte ${at}`);
      hunks.push({ kind: "RLE", offset, count, value });
    }

    if (r.remaining() > 0) {
      throw new FormatError("INVALID_PATCH", `${r.remaining()} bytes after the EOF marker`);
    }
    return { hunks };
  } catch (e: unknown) {
    if (e instanceof FormatError && e.code === "SHORT_READ") {
      throw new FormatError("INVALID_PATCH", `Truncated IPS patch: ${e.message}`);
    }
    throw e;
  }
}

/** Applies hunks in order, overwriting `target` in place. */
export function applyIps(target: Uint8Array, patch: IpsPatch): void {
  for (const h of patch.hunks) {
    const end = h.offset + hunkLength(h);
    if (end > target.length) {
      throw new FormatError(
        "PATCH_OUT_OF_BOUNDS",
        `IPS record [${hex(h.offset, 6)}, ${hex(end, 6)}) is outside the ${target.length}-byte image`,
      );
    }
    if (h.kind === "DATA") target.set(h.payload, h.offset);
    else target.fill(h.value, h.offset, end);
  }
}
