import { readFile } from "node:fs/promises";
import path from "node:path";

import { PolicyError } from "../neutopia/errors.js";
import { applyIps, type IpsPatch, parseIps } from "./ips.js";

/** Order the game patches are applied in; later patches may overwrite earlier ones. */
export const PATCH_ORDER = [
  "expand-save-state",
  "intro-skip",
  "no-downgrade",
  "open-stairs",
  "text-speedup",
] as const;

export type PatchName = (typeof PATCH_ORDER)[number];

export type NamedPatch = Readonly<{ name: PatchName; patch: IpsPatch }>;

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Reads `<dir>/<name>.ips` for every patch in order; all of them must exist. */
export async function loadPatches(dir: string): Promise<NamedPatch[]> {
  const out: NamedPatch[] = [];
  for (const name of PATCH_ORDER) {
    const file = path.join(dir, `${name}.ips`);
    let bytes: Uint8Array;
    try {
      bytes = await readFile(file);
    } catch (e: unknown) {
      if (!isMissingFile(e)) throw e;
      throw new PolicyError("MISSING_PATCH", `Patch ${name} not found at ${file} (use --no-patches to skip patching)`);
    }
    out.push({ name, patch: parseIps(bytes) });
  }
  return out;
}

export function applyPatches(image: Uint8Array, patches: ReadonlyArray<NamedPatch>): void {
  const ordered = [...patches].sort((a, b) => PATCH_ORDER.indexOf(a.name) - PATCH_ORDER.indexOf(b.name));
  for (const { patch } of ordered) applyIps(image, patch);
}
