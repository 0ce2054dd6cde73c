export type ItemId = string;
export type ChecklistId = string;
export type StatusNumber = number;

/** Reserved status number for a plain bullet. Never part of the click cycle. */
export const BULLET_STATUS: StatusNumber = -1;

export type StateSymbol =
  | "bullet"
  | "empty"
  | "check"
  | "clock"
  | "minus"
  | "square"
  | "x"
  | "star"
  | "exclaim"
  | "question";

export type ChecklistItem = {
  id: ItemId;
  text: string;
  statusNumber: StatusNumber;
  /** Only meaningful while `children` is non-empty. */
  collapsed: boolean;
  children: ChecklistItem[];
};

export type Forest = ChecklistItem[];

export type StateDefinition = {
  number: StatusNumber;
  label: string;
  color: string;
  symbol: StateSymbol;
  inCycle: boolean;
};

export type StateCatalog = {
  states: StateDefinition[];
  defaultStatusNumber: StatusNumber;
};

export type Checklist = {
  name: string;
  catalog: StateCatalog;
  items: Forest;
};

/** `end` is a drop on empty canvas: the item goes to the end of the root list. */
export type DropZone = "before" | "after" | "inside" | "end";

export type DropRequest = {
  sourceId: ItemId;
  targetId: ItemId | null;
  zone: DropZone;
};

export type ChecklistSummary = {
  id: ChecklistId;
  name: string;
};
