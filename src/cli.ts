#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";

import { runChecksTool, runInfoTool, runRandomizeTool, runRoomsTool } from "./rando/randoTool.js";

const program = new Command();

program
  .name("neutopia-rando")
  .description("Neutopia item randomizer and ROM inspection tools")
  .version("0.1.0");

program
  .command("randomize")
  .description("Shuffle chest items and write a new ROM")
  .option("--rom <path>", "Input ROM", "Neutopia (USA).pce")
  .option("--out <path>", "Output ROM (default: neutopia-randomizer-<seed>.pce)")
  .option("--seed <base36>", "Seed to reproduce a previous run")
  .option("--type <type>", "global|local|none", "global")
  .option("--checks <path>", "Check catalog JSON", "data/checks.json")
  .option("--patch-dir <path>", "Directory holding the .ips patches", "patches")
  .option("--no-patches", "Randomize without applying the game patches")
  .option("--layout <path>", "ROM layout override JSON")
  .action(
    async (opts: {
      rom: string;
      out?: string;
      seed?: string;
      type: string;
      checks: string;
      patchDir: string;
      patches: boolean;
      layout?: string;
    }) => {
      await runRandomizeTool(opts);
    },
  );

program
  .command("info")
  .description("Identify a ROM by size and MD5")
  .option("--rom <path>", "Input ROM", "Neutopia (USA).pce")
  .action(async (opts: { rom: string }) => {
    await runInfoTool(opts.rom);
  });

program
  .command("checks")
  .description("Generate a check catalog skeleton from a ROM's chests")
  .option("--rom <path>", "Input ROM", "Neutopia (USA).pce")
  .option("-o, --out <path>", "Write JSON to a file (default: stdout)")
  .option("--layout <path>", "ROM layout override JSON")
  .action(async (opts: { rom: string; out?: string; layout?: string }) => {
    await runChecksTool(opts);
  });

program
  .command("rooms")
  .description("Dump an area's rooms, object tables and room data ranges")
  .argument("<area>", "Area index, decimal or 0x-prefixed hex")
  .option("--rom <path>", "Input ROM", "Neutopia (USA).pce")
  .option("--layout <path>", "ROM layout override JSON")
  .action(async (area: string, opts: { rom: string; layout?: string }) => {
    await runRoomsTool(area, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
