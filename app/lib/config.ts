import { clamp } from "@/app/lib/utils";

export type ChecklistConfig = {
  /** Quiet period before a burst of edits is written out. */
  saveDelayMs: number;
  /** Clicks closer together than this step through the cycle. */
  rapidClickMs: number;
  longPressMs: number;
  /** Manhattan distance a held pointer must travel before a drag starts. */
  dragThresholdPx: number;
  maxItemWidth: number;
};

export const MIN_MAX_ITEM_WIDTH = 400;
export const MAX_MAX_ITEM_WIDTH = 1400;

export const DEFAULT_CONFIG: ChecklistConfig = {
  saveDelayMs: 400,
  rapidClickMs: 1000,
  longPressMs: 500,
  dragThresholdPx: 4,
  maxItemWidth: 800,
};

const nonNegative = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0
    ? value
    : fallback;

/** Key older installs used for the item width in `config.json`. */
export const LEGACY_MAX_ITEM_WIDTH_KEY = "max_item_width";

export const normalizeConfig = (raw: unknown): ChecklistConfig => {
  const typedRaw: Partial<
    Record<keyof ChecklistConfig | typeof LEGACY_MAX_ITEM_WIDTH_KEY, unknown>
  > = raw && typeof raw === "object" && !Array.isArray(raw) ? raw : {};

  const maxItemWidth = nonNegative(
    typedRaw.maxItemWidth ?? typedRaw[LEGACY_MAX_ITEM_WIDTH_KEY],
    DEFAULT_CONFIG.maxItemWidth,
  );

  return {
    saveDelayMs: nonNegative(typedRaw.saveDelayMs, DEFAULT_CONFIG.saveDelayMs),
    rapidClickMs: nonNegative(
      typedRaw.rapidClickMs,
      DEFAULT_CONFIG.rapidClickMs,
    ),
    longPressMs: nonNegative(typedRaw.longPressMs, DEFAULT_CONFIG.longPressMs),
    dragThresholdPx: nonNegative(
      typedRaw.dragThresholdPx,
      DEFAULT_CONFIG.dragThresholdPx,
    ),
    maxItemWidth: Math.round(
      clamp(maxItemWidth, MIN_MAX_ITEM_WIDTH, MAX_MAX_ITEM_WIDTH),
    ),
  };
};
