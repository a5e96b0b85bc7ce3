import { isCryptArea } from "../neutopia/areas.js";
import { isMedallion, ITEM_BOOK_OF_REVIVAL, ITEM_MOONBEAM_MOSS, itemName } from "../neutopia/chest.js";
import { ConsistencyError, PolicyError, type WarnFn } from "../neutopia/errors.js";
import { Neutopia } from "../neutopia/game.js";
import { DEFAULT_LAYOUT, type RomLayout } from "../neutopia/romLayout.js";
import { stripHeader, verify } from "../neutopia/verify.js";
import type { Check } from "./checks.js";
import { applyPatches, type NamedPatch } from "./patches.js";
import { formatSeed, parseSeed, Pcg32, randomSeed } from "./prng.js";
import { gateForItem, type Item, State } from "./state.js";

export const RANDO_TYPES = ["global", "local", "none"] as const;

export type RandoType = (typeof RANDO_TYPES)[number];

export function parseRandoType(text: string): RandoType {
  const t = RANDO_TYPES.find((r) => r === text);
  if (!t) throw new PolicyError("INVALID_CONFIG", `Unknown randomizer type "${text}" (use ${RANDO_TYPES.join(", ")})`);
  return t;
}

export type ShuffleOptions = Readonly<{
  type: RandoType;
  /** Required for "global". */
  checks?: ReadonlyArray<Check>;
  layout?: RomLayout;
  warn?: WarnFn;
}>;

export type RandoConfig = ShuffleOptions &
  Readonly<{
    /** Base-36; a random seed is drawn when absent. */
    seed?: string;
    patches?: ReadonlyArray<NamedPatch>;
  }>;

export type RandomizedGame = Readonly<{
  seed: string;
  data: Uint8Array;
}>;

/** Accepts only the known NA dump; returns a header-less copy. */
export function verifyRom(data: Uint8Array): Uint8Array {
  const info = verify(data);
  if (!info.known) {
    throw new PolicyError(
      "UNRECOGNIZED_ROM",
      `ROM with MD5 hash ${info.md5Hash} is unrecognized. Please use the Neutopia (U) ROM.`,
    );
  }
  if (info.region !== "NA") {
    throw new PolicyError("UNSUPPORTED_REGION", `Region ${info.region} ROM is not supported. Please use the NA ROM.`);
  }
  return Uint8Array.from(stripHeader(data));
}

export function randomize(data: Uint8Array, config: RandoConfig): RandomizedGame {
  const seed = config.seed === undefined ? randomSeed() : parseSeed(config.seed);
  const image = verifyRom(data);
  applyPatches(image, config.patches ?? []);

  return { seed: formatSeed(seed), data: shuffleImage(image, seed, config) };
}

/** Randomizes an already verified and patched image. Same seed, same bytes. */
export function shuffleImage(image: Uint8Array, seed: bigint, options: ShuffleOptions): Uint8Array {
  if (options.type === "none") return image;

  const rng = new Pcg32(seed);
  const game = Neutopia.fromRom(image, options.layout ?? DEFAULT_LAYOUT);
  const writeOptions = options.warn ? { warn: options.warn } : {};

  if (options.type === "local") {
    shuffleWithinCrypts(rng, game);
    return game.write(writeOptions);
  }

  if (!options.checks) throw new PolicyError("INVALID_CONFIG", "Global randomization needs a check catalog");
  return placeGlobally(rng, game, options.checks).write(writeOptions);
}

/** Shuffles each crypt's chests among themselves; medallions stay put. */
export function shuffleWithinCrypts(rng: Pcg32, game: Neutopia): void {
  for (let area = 0; area < game.areaCount; area++) {
    if (!isCryptArea(area)) continue;

    const refs = game.filterChests((c) => c.area === area && !isMedallion(c.info));
    const infos = rng.shuffle(refs.map((r) => r.info));
    game.updateChests(refs.map((r, i) => ({ ...r, info: infos[i]! })));
  }
}

function placeAtRandom(rng: Pcg32, state: State, item: Item, open: ReadonlyArray<Check>): void {
  if (open.length === 0) {
    throw new ConsistencyError(
      "NO_OPEN_CHECKS",
      `No open check left for ${itemName(item.info)} (${state.filterItems(() => true).length} items pending)`,
    );
  }
  state.placeItemByLoc(item, rng.pick(open));
}

/**
 * Places every item into a catalog check. Key items go first so that the
 * checks they open are available for the rest; this orders the gates but
 * does not search for a completable layout.
 */
export function placeGlobally(rng: Pcg32, game: Neutopia, checks: ReadonlyArray<Check>): Neutopia {
  const state = State.create(game, checks);
  const endgame = game.layout.endgameArea;

  // Book and moss stay where they were.
  for (const id of [ITEM_BOOK_OF_REVIVAL, ITEM_MOONBEAM_MOSS]) {
    const origin = game.filterChests((c) => c.area < endgame && c.info.itemId === id)[0];
    if (origin) state.placeItemByLoc(state.getItemById(id), origin);
  }

  for (const item of state.filterItems((i) => i.areaLock !== undefined)) {
    placeAtRandom(rng, state, item, state.filterChecksGateless((c) => c.area === item.areaLock));
  }

  for (const item of rng.shuffle(state.filterItems((i) => gateForItem(i) !== undefined))) {
    placeAtRandom(rng, state, item, state.filterChecks());
  }

  for (const item of rng.shuffle(state.filterItems(() => true))) {
    placeAtRandom(rng, state, item, state.filterChecks());
  }

  if (!state.isComplete()) {
    throw new ConsistencyError("DESYNCHRONIZED_STATE", "Placement finished with checks left over");
  }
  return state.finalize();
}
