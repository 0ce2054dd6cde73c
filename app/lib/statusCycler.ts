import {
  BULLET_STATUS,
  type ItemId,
  type StateCatalog,
  type StatusNumber,
} from "@/app/lib/data/types";
import { byNumber, checkboxStates, cycleableStates } from "@/app/lib/states";

export type StatusStepKind = "smart" | "cycle" | "long-press";

export type StatusStep = {
  kind: StatusStepKind;
  next: StatusNumber;
};

/**
 * Target of an unhurried click: Done goes back to To Do, anything else goes
 * to Done. A catalog missing that state falls back to its first checkbox
 * state.
 */
export function smartTarget(
  current: StatusNumber,
  catalog: StateCatalog,
): StatusNumber | null {
  const target = current === 1 ? 0 : 1;
  if (byNumber(catalog, target)) {
    return target;
  }

  return checkboxStates(catalog)[0]?.number ?? null;
}

/** The cycle entry after `current`, wrapping around. Unknown numbers start over. */
export function nextInCycle(
  current: StatusNumber,
  catalog: StateCatalog,
): StatusNumber | null {
  const cycle = cycleableStates(catalog);
  if (cycle.length === 0) {
    return null;
  }

  const index = cycle.findIndex((state) => state.number === current);
  return cycle[(index + 1) % cycle.length].number;
}

export function toggleBullet(current: StatusNumber): StatusNumber {
  return current === BULLET_STATUS ? 0 : BULLET_STATUS;
}

export type StatusCyclerOptions = {
  rapidClickMs: number;
  longPressMs: number;
  now?: () => number;
};

/**
 * Decides indicator changes from click timing. Clicks are tracked per item,
 * so a quick click on one item does not make the next click on another item
 * count as rapid.
 */
export class StatusCycler {
  private readonly rapidClickMs: number;
  private readonly longPressMs: number;
  private readonly now: () => number;
  private readonly lastClickAt = new Map<ItemId, number>();
  private readonly pressedAt = new Map<ItemId, number>();
  private readonly longPressFired = new Set<ItemId>();

  constructor({ rapidClickMs, longPressMs, now }: StatusCyclerOptions) {
    this.rapidClickMs = rapidClickMs;
    this.longPressMs = longPressMs;
    this.now = now ?? (() => Date.now());
  }

  click(
    itemId: ItemId,
    current: StatusNumber,
    catalog: StateCatalog,
  ): StatusStep | null {
    if (current === BULLET_STATUS) {
      return null;
    }

    const now = this.now();
    const previous = this.lastClickAt.get(itemId);
    this.lastClickAt.set(itemId, now);

    const isRapid =
      previous !== undefined && now - previous <= this.rapidClickMs;
    const next = isRapid
      ? nextInCycle(current, catalog)
      : smartTarget(current, catalog);

    return next === null ? null : { kind: isRapid ? "cycle" : "smart", next };
  }

  press(itemId: ItemId) {
    this.pressedAt.set(itemId, this.now());
    this.longPressFired.delete(itemId);
  }

  /** Fired by the hold timer while the pointer is still down. */
  completeLongPress(itemId: ItemId, current: StatusNumber): StatusStep | null {
    if (!this.pressedAt.has(itemId) || this.longPressFired.has(itemId)) {
      return null;
    }

    this.longPressFired.add(itemId);
    return { kind: "long-press", next: toggleBullet(current) };
  }

  release(
    itemId: ItemId,
    current: StatusNumber,
    catalog: StateCatalog,
  ): StatusStep | null {
    const pressedAt = this.pressedAt.get(itemId);
    this.pressedAt.delete(itemId);

    if (this.longPressFired.delete(itemId)) {
      return null;
    }

    if (pressedAt !== undefined && this.now() - pressedAt >= this.longPressMs) {
      return { kind: "long-press", next: toggleBullet(current) };
    }

    return this.click(itemId, current, catalog);
  }

  cancelPress(itemId: ItemId) {
    this.pressedAt.delete(itemId);
    this.longPressFired.delete(itemId);
  }

  forget(itemId: ItemId) {
    this.cancelPress(itemId);
    this.lastClickAt.delete(itemId);
  }
}
