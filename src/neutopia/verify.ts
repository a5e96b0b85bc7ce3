import { createHash } from "node:crypto";

import { PolicyError } from "./errors.js";
import { ROM_SIZE } from "./romLayout.js";

export const HEADER_SIZE = 0x200;

export type Region = "NA" | "JP" | "Unknown";

export type RomInfo = Readonly<{
  headered: boolean;
  md5Hash: string;
  known: boolean;
  desc: string;
  region: Region;
}>;

type KnownRom = Readonly<{ desc: string; region: Region }>;

const KNOWN_ROMS: ReadonlyMap<string, KnownRom> = new Map([
  ["eb0789088fc70be42b2f994c1b66be21", { desc: "Neutopia (U)", region: "NA" }],
  ["08ae173878d8a3783fa35e80c99a5dc4", { desc: "Neutopia (J)", region: "JP" }],
]);

const UNRECOGNIZED: KnownRom = { desc: "Unrecognized ROM", region: "Unknown" };

/** Image without the copier header, if the size says there is one. */
export function stripHeader(data: Uint8Array): Uint8Array {
  if (data.length === ROM_SIZE) return data;
  if (data.length === ROM_SIZE + HEADER_SIZE) return data.subarray(HEADER_SIZE);
  throw new PolicyError(
    "INVALID_ROM_SIZE",
    `ROM size (${data.length}) is neither the headered (${ROM_SIZE + HEADER_SIZE}) nor the unheadered (${ROM_SIZE}) size`,
  );
}

/** Identifies a dump by MD5. Unknown hashes are reported, not rejected. */
export function verify(data: Uint8Array): RomInfo {
  const image = stripHeader(data);
  const md5Hash = createHash("md5").update(image).digest("hex");
  const entry = KNOWN_ROMS.get(md5Hash);
  const { desc, region } = entry ?? UNRECOGNIZED;

  return {
    headered: image.length !== data.length,
    md5Hash,
    known: entry !== undefined,
    desc,
    region,
  };
}
