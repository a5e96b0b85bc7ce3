import {
  type Chest,
  chestKey,
  compareChests,
  ITEM_CRYPT_KEY,
  ITEM_CRYSTAL_BALL,
  ITEM_FALCON_SHOES,
  ITEM_FIRE_WAND,
  ITEM_RAINBOW_DROP,
  ITEM_SKY_BELL,
  isShuffleableItem,
  itemName,
} from "../neutopia/chest.js";
import { ConsistencyError, hex } from "../neutopia/errors.js";
import type { ChestRef, Neutopia } from "../neutopia/game.js";
import { type Check, type Gate, indexChecks, type LocationId, locationKey } from "./checks.js";

export type Item = Readonly<{
  info: Chest;
  /** Set for items that must stay in the area they came from. */
  areaLock?: number;
}>;

const GATE_BY_ITEM: ReadonlyMap<number, Gate> = new Map([
  [ITEM_FIRE_WAND, "fire-wand"],
  [ITEM_SKY_BELL, "bell"],
  [ITEM_FALCON_SHOES, "falcon-shoes"],
  [ITEM_RAINBOW_DROP, "rainbow-drop"],
]);

export function gateForItem(item: Item): Gate | undefined {
  return GATE_BY_ITEM.get(item.info.itemId);
}

export function isAreaLockedItem(itemId: number): boolean {
  return itemId === ITEM_CRYSTAL_BALL || itemId === ITEM_CRYPT_KEY;
}

function compareItems(a: Item, b: Item): number {
  return compareChests(a.info, b.info) || (a.areaLock ?? -1) - (b.areaLock ?? -1);
}

function sameItem(a: Item, b: Item): boolean {
  return chestKey(a.info) === chestKey(b.info) && a.areaLock === b.areaLock;
}

function describeItem(item: Item): string {
  const lock = item.areaLock === undefined ? "" : ` locked to area ${hex(item.areaLock)}`;
  return `${itemName(item.info)} [${chestKey(item.info)}]${lock}`;
}

/**
 * Placement bookkeeping: pending items, pending checks and the gates opened so
 * far. Each placement consumes one of each, so both pools always have the
 * same size. Items are a sorted multiset so identical chests each keep a slot.
 */
export class State {
  private readonly items: Item[];
  private readonly gates = new Set<Gate>();
  private readonly assigned: ChestRef[] = [];
  private consumed = false;

  private constructor(
    private readonly game: Neutopia,
    private readonly checks: Map<string, Check>,
    items: Item[],
  ) {
    this.items = items.sort(compareItems);
    this.assertInvariant();
  }

  /** Seeds items from every shuffleable chest before the endgame area. */
  public static create(game: Neutopia, catalog: ReadonlyArray<Check>): State {
    const endgame = game.layout.endgameArea;
    const items = game
      .filterChests((c) => c.area < endgame && isShuffleableItem(c.info))
      .map((c): Item => (isAreaLockedItem(c.info.itemId) ? { info: c.info, areaLock: c.area } : { info: c.info }));

    return new State(game, indexChecks(catalog), items);
  }

  public isComplete(): boolean {
    this.assertInvariant();
    return this.checks.size === 0;
  }

  public clearedGates(): ReadonlySet<Gate> {
    return this.gates;
  }

  public placeItem(item: Item, area: number, room: number, index: number): void {
    this.placeItemByLoc(item, { area, room, index });
  }

  public placeItemByLoc(item: Item, loc: LocationId): void {
    this.assertLive();
    if (item.areaLock !== undefined && item.areaLock !== loc.area) {
      throw new ConsistencyError(
        "AREA_LOCK_VIOLATION",
        `Can't place ${describeItem(item)} in area ${hex(loc.area)}`,
      );
    }

    const key = locationKey(loc);
    const check = this.checks.get(key);
    if (!check) {
      throw new ConsistencyError("UNKNOWN_LOCATION", `No pending check at location ${key}`);
    }
    const itemIdx = this.items.findIndex((i) => sameItem(i, item));
    if (itemIdx === -1) {
      throw new ConsistencyError("UNKNOWN_ITEM", `No pending item ${describeItem(item)}`);
    }

    this.checks.delete(key);
    this.items.splice(itemIdx, 1);

    const gate = gateForItem(item);
    if (gate) this.gates.add(gate);

    this.assigned.push({ info: item.info, area: check.area, room: check.room, index: check.index });
    this.assertInvariant();
  }

  public filterItems(pred: (item: Item) => boolean): Item[] {
    return this.items.filter(pred);
  }

  /** The single pending item with this id. */
  public getItemById(id: number): Item {
    const found = this.filterItems((i) => i.info.itemId === id);
    if (found.length !== 1) {
      throw new ConsistencyError("UNKNOWN_ITEM", `Found ${found.length} pending items with id ${hex(id)}`);
    }
    return found[0]!;
  }

  /** Pending checks whose gates are all cleared. */
  public filterChecks(pred: (check: Check) => boolean = () => true): Check[] {
    return this.filterChecksGateless((c) => c.gates.every((g) => this.gates.has(g)) && pred(c));
  }

  /** Pending checks regardless of gates. */
  public filterChecksGateless(pred: (check: Check) => boolean = () => true): Check[] {
    return [...this.checks.values()].filter(pred);
  }

  /** Writes every placement into the game model and retires the state. */
  public finalize(): Neutopia {
    this.assertLive();
    this.game.updateChests(this.assigned);
    this.consumed = true;
    return this.game;
  }

  private assertLive(): void {
    if (this.consumed) throw new ConsistencyError("GAME_CONSUMED", "Placement state was already finalized");
  }

  private assertInvariant(): void {
    if (this.checks.size !== this.items.length) {
      throw new ConsistencyError(
        "DESYNCHRONIZED_STATE",
        `${this.checks.size} pending checks but ${this.items.length} pending items`,
      );
    }
  }
}
