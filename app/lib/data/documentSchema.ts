import type { StateSymbol, StatusNumber } from "./types";

/**
 * Element and attribute names of the persisted checklist document.
 *
 * ```xml
 * <checklist name="Groceries" default-state="0">
 *   <states>
 *     <state number="0" label="To Do" color="#F44336" symbol="empty" in-cycle="true"/>
 *   </states>
 *   <items>
 *     <item id="1a2b3c4d" text="Milk" state-number="0" collapsed="true">
 *       <item id="5e6f7a8b" text="Oat" state-number="1"/>
 *     </item>
 *   </items>
 * </checklist>
 * ```
 *
 * Numbers are decimal text. Booleans are the literals `"true"` and `"false"`.
 */
export const DOCUMENT_SCHEMA = {
  /**
   * Root element.
   *
   * - `name`: checklist title, `"Untitled"` when omitted.
   * - `default-state`: status number given to new items, `0` when omitted.
   */
  root: "checklist",

  /**
   * Ordered state definitions. When the section is missing or empty the
   * built-in default catalog is used.
   */
  states: "states",

  /**
   * One state definition.
   *
   * - `number`: key of the state, `-1` is the plain bullet.
   * - `label`, `color`: display values.
   * - `symbol`: one of the indicator symbols, `square` when unknown.
   * - `in-cycle`: click-cycle membership. Only `"false"` opts out.
   *
   * LEGACY: older documents carry `id` (one of the legacy status tags)
   * instead of `number`, and no `symbol` or `in-cycle`.
   */
  state: "state",

  /**
   * Root item list. Items nest their children directly.
   */
  items: "items",

  /**
   * One checklist item.
   *
   * - `id`: unique across the whole document.
   * - `text`: item text.
   * - `state-number`: status number.
   * - `collapsed`: only written as `"true"`, and only for items with
   *   children.
   *
   * LEGACY: older documents carry `state` (a legacy status tag) instead of
   * `state-number`.
   */
  item: "item",
} as const;

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

type LegacyStateMapping = { number: StatusNumber; symbol: StateSymbol };

/**
 * Fixed upgrade table for the string status tags of legacy documents.
 */
export const LEGACY_STATE_TAGS: ReadonlyMap<string, LegacyStateMapping> =
  new Map<string, LegacyStateMapping>([
    ["todo", { number: 0, symbol: "empty" }],
    ["done", { number: 1, symbol: "check" }],
    ["waiting", { number: 2, symbol: "clock" }],
    ["cancelled", { number: 4, symbol: "x" }],
  ]);

/** First number handed to a legacy tag outside the fixed table. */
export const FIRST_CUSTOM_LEGACY_NUMBER = 5;
