import {
  BULLET_STATUS,
  type StateCatalog,
  type StateDefinition,
  type StateSymbol,
  type StatusNumber,
} from "@/app/lib/data/types";

export const STATE_SYMBOL_OPTIONS: ReadonlyArray<{
  key: StateSymbol;
  label: string;
}> = [
  { key: "bullet", label: "Bullet" },
  { key: "empty", label: "Empty box" },
  { key: "check", label: "Check" },
  { key: "clock", label: "Clock" },
  { key: "minus", label: "Minus" },
  { key: "square", label: "Filled square" },
  { key: "x", label: "Cross" },
  { key: "star", label: "Star" },
  { key: "exclaim", label: "Exclamation" },
  { key: "question", label: "Question" },
];

const STATE_SYMBOLS = new Set<string>(
  STATE_SYMBOL_OPTIONS.map((option) => option.key),
);

export function isStateSymbol(value: unknown): value is StateSymbol {
  return typeof value === "string" && STATE_SYMBOLS.has(value);
}

export const FALLBACK_STATE_COLOR = "#888888";

const PLACEHOLDER_STATE: StateDefinition = {
  number: 0,
  label: "",
  color: FALLBACK_STATE_COLOR,
  symbol: "square",
  inCycle: true,
};

export const DEFAULT_STATES: readonly StateDefinition[] = [
  {
    number: BULLET_STATUS,
    label: "Bullet",
    color: "#9E9E9E",
    symbol: "bullet",
    inCycle: false,
  },
  {
    number: 0,
    label: "To Do",
    color: "#F44336",
    symbol: "empty",
    inCycle: true,
  },
  {
    number: 1,
    label: "Done",
    color: "#4CAF50",
    symbol: "check",
    inCycle: true,
  },
  {
    number: 2,
    label: "Waiting",
    color: "#9C27B0",
    symbol: "clock",
    inCycle: true,
  },
  {
    number: 3,
    label: "On Hold",
    color: "#FF9800",
    symbol: "minus",
    inCycle: true,
  },
  {
    number: 4,
    label: "Cancelled",
    color: "#9E9E9E",
    symbol: "x",
    inCycle: true,
  },
];

export const createDefaultCatalog = (): StateCatalog => ({
  states: DEFAULT_STATES.map((state) => ({ ...state })),
  defaultStatusNumber: 0,
});

export function byNumber(
  catalog: StateCatalog,
  number: StatusNumber,
): StateDefinition | null {
  return catalog.states.find((state) => state.number === number) ?? null;
}

const ascending = (a: StateDefinition, b: StateDefinition) =>
  a.number - b.number;

/** All non-sentinel states, ascending by number. */
export function checkboxStates(catalog: StateCatalog): StateDefinition[] {
  return catalog.states.filter((state) => state.number >= 0).sort(ascending);
}

/**
 * Cycle-eligible, non-sentinel states ascending by number. Falls back to
 * every non-sentinel state when nothing is flagged for the cycle.
 */
export function cycleableStates(catalog: StateCatalog): StateDefinition[] {
  const flagged = catalog.states
    .filter((state) => state.inCycle && state.number >= 0)
    .sort(ascending);

  return flagged.length > 0 ? flagged : checkboxStates(catalog);
}

/** The state to paint for `number`: unresolvable numbers render as status 0. */
export function resolveState(
  catalog: StateCatalog,
  number: StatusNumber,
): StateDefinition {
  return (
    byNumber(catalog, number) ?? byNumber(catalog, 0) ?? PLACEHOLDER_STATE
  );
}

export function createState(catalog: StateCatalog): StateDefinition {
  const numbers = catalog.states.map((state) => state.number);

  return {
    number: numbers.length > 0 ? Math.max(...numbers) + 1 : 0,
    label: "New State",
    color: "#FFB300",
    symbol: "square",
    inCycle: true,
  };
}

/**
 * Swaps in an edited state list. Item status numbers are not touched;
 * anything left dangling renders through `resolveState`.
 */
export function replaceCatalog(
  states: StateDefinition[],
  defaultStatusNumber: StatusNumber,
): StateCatalog {
  const seenNumbers = new Set<StatusNumber>();
  const normalizedStates: StateDefinition[] = [];

  for (const state of states) {
    if (!Number.isInteger(state.number) || seenNumbers.has(state.number)) {
      continue;
    }

    seenNumbers.add(state.number);
    normalizedStates.push({ ...state });
  }

  if (normalizedStates.length === 0) {
    return createDefaultCatalog();
  }

  let normalizedDefault = defaultStatusNumber;
  if (!seenNumbers.has(normalizedDefault)) {
    const firstCheckbox = normalizedStates
      .filter((state) => state.number >= 0)
      .sort(ascending)[0];
    normalizedDefault = seenNumbers.has(0)
      ? 0
      : (firstCheckbox?.number ?? normalizedStates[0].number);
  }

  return { states: normalizedStates, defaultStatusNumber: normalizedDefault };
}
