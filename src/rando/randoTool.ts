// src/rando/randoTool.ts
import { readFile, writeFile } from "node:fs/promises";

import { areaName } from "../neutopia/areas.js";
import { itemName } from "../neutopia/chest.js";
import { hex, PolicyError, type WarnFn } from "../neutopia/errors.js";
import { Neutopia } from "../neutopia/game.js";
import { describeEntry } from "../neutopia/objectTable.js";
import { NeutopiaRom } from "../neutopia/rom.js";
import { DEFAULT_LAYOUT, parseRomLayout, type RomLayout } from "../neutopia/romLayout.js";
import { type RomInfo, stripHeader, verify } from "../neutopia/verify.js";
import { type Check, generateCheckCatalog, loadCheckCatalog } from "./checks.js";
import { loadPatches } from "./patches.js";
import { parseRandoType, randomize, type RandoConfig } from "./randomize.js";

export type RandomizeToolOptions = Readonly<{
  rom: string;
  out?: string;
  seed?: string;
  type: string;
  checks: string;
  patchDir: string;
  /** False skips patching altogether. */
  patches: boolean;
  layout?: string;
}>;

export type RomToolOptions = Readonly<{
  rom: string;
  layout?: string;
}>;

export function outputFileName(seed: string): string {
  return `neutopia-randomizer-${seed}.pce`;
}

export async function loadLayout(file: string | undefined): Promise<RomLayout> {
  if (file === undefined) return DEFAULT_LAYOUT;
  const parsed: unknown = JSON.parse(await readFile(file, "utf8"));
  return parseRomLayout(parsed);
}

function collectWarnings(): { warn: WarnFn; flush: () => void } {
  const warnings: string[] = [];
  return {
    warn: (m) => warnings.push(m),
    flush: () => {
      for (const w of warnings) console.warn(w);
      warnings.length = 0;
    },
  };
}

export async function runRandomizeTool(opts: RandomizeToolOptions): Promise<string> {
  const type = parseRandoType(opts.type);
  const { warn, flush } = collectWarnings();

  const data = await readFile(opts.rom);
  const layout = await loadLayout(opts.layout);
  const patches = opts.patches ? await loadPatches(opts.patchDir) : [];
  const checks: Check[] | undefined = type === "global" ? await loadCheckCatalog(opts.checks) : undefined;

  const config: RandoConfig = {
    type,
    layout,
    patches,
    warn,
    ...(checks ? { checks } : {}),
    ...(opts.seed !== undefined ? { seed: opts.seed } : {}),
  };

  try {
    const result = randomize(data, config);
    const outPath = opts.out ?? outputFileName(result.seed);
    await writeFile(outPath, result.data);
    console.log(`Seed ${result.seed} (${type}): wrote ${outPath}`);
    return outPath;
  } finally {
    flush();
  }
}

export function formatRomInfo(name: string, info: RomInfo): string {
  return [
    `Info for ${name}:`,
    `  Headered:    ${info.headered}`,
    `  MD5 hash:    ${info.md5Hash}`,
    `  Description: ${info.desc}`,
    `  Region:      ${info.region}`,
    "",
  ].join("\n");
}

export async function runInfoTool(rom: string): Promise<void> {
  const data = await readFile(rom);
  process.stdout.write(formatRomInfo(rom, verify(data)));
}

async function loadImage(opts: RomToolOptions): Promise<{ image: Uint8Array; layout: RomLayout }> {
  const data = await readFile(opts.rom);
  return { image: stripHeader(data), layout: await loadLayout(opts.layout) };
}

export async function runChecksTool(opts: RomToolOptions & Readonly<{ out?: string }>): Promise<void> {
  const { image, layout } = await loadImage(opts);
  const text = JSON.stringify(generateCheckCatalog(Neutopia.fromRom(image, layout)), null, 2) + "\n";
  if (opts.out) await writeFile(opts.out, text, "utf8");
  else process.stdout.write(text);
}

/** Text dump of one area: its rooms' tables and the byte ranges they occupy. */
export function formatAreaDump(rom: NeutopiaRom, areaIdx: number): string {
  const area = rom.area(areaIdx);
  const lines: string[] = [`Area ${hex(areaIdx)} (${areaName(areaIdx)}) @ ${hex(area.pointer, 5)}`];

  if (area.chests) {
    lines.push("  Chests:");
    area.chests.forEach((c, i) => lines.push(`    ${i}: ${itemName(c)}`));
  }

  area.rooms.forEach((room, i) => {
    lines.push(`  Room ${hex(i)} @ ${hex(room.baseAddr, 5)}`);
    lines.push(`    warp ${room.warpTable.length} bytes, enemy ${room.enemyTable.length} bytes`);
    for (const entry of room.objectTable) lines.push(`    ${describeEntry(entry)}`);
  });

  lines.push("  Room data:");
  for (const iv of rom.roomDataIntervals(areaIdx)) lines.push(`    [${hex(iv.start, 5)}, ${hex(iv.end, 5)})`);

  return lines.join("\n") + "\n";
}

export async function runRoomsTool(area: string, opts: RomToolOptions): Promise<void> {
  const areaIdx = Number(area);
  if (!Number.isInteger(areaIdx) || areaIdx < 0) {
    throw new PolicyError("INVALID_CONFIG", `Invalid area "${area}": expected a number such as 4 or 0x4`);
  }
  const { image, layout } = await loadImage(opts);
  process.stdout.write(formatAreaDump(NeutopiaRom.parse(image, layout), areaIdx));
}
