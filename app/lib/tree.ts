// Pure structural edits over the item forest. Every edit returns a new forest
// value and leaves its input untouched; parents are found by searching from
// the roots, never through stored back-references.

import type {
  ChecklistItem,
  DropZone,
  Forest,
  ItemId,
  StatusNumber,
} from "@/app/lib/data/types";
import { DuplicateItemIdError } from "@/app/lib/utils";

export type TreeEditFailure =
  | "not-found"
  | "no-preceding-sibling"
  | "at-root"
  | "cycle-rejected";

export type TreeEdit<Extra extends object = object> =
  | ({ ok: true; forest: Forest } & Extra)
  | { ok: false; reason: TreeEditFailure };

type ItemLocation = {
  item: ChecklistItem;
  /** Sibling index at every level, root list first. */
  path: number[];
};

export function createItem(
  id: ItemId,
  statusNumber: StatusNumber,
  text = "",
): ChecklistItem {
  return { id, text, statusNumber, collapsed: false, children: [] };
}

function locate(
  items: ChecklistItem[],
  id: ItemId,
  path: number[] = [],
): ItemLocation | null {
  for (let index = 0; index < items.length; index += 1) {
    const item = items[index];
    const itemPath = [...path, index];
    if (item.id === id) {
      return { item, path: itemPath };
    }

    const found = locate(item.children, id, itemPath);
    if (found) {
      return found;
    }
  }

  return null;
}

function withChildren(
  item: ChecklistItem,
  children: ChecklistItem[],
): ChecklistItem {
  return {
    ...item,
    children,
    collapsed: item.collapsed && children.length > 0,
  };
}

/** Rebuilds the spine down to the sibling list at `parentPath`. */
function updateSiblings(
  items: ChecklistItem[],
  parentPath: number[],
  update: (siblings: ChecklistItem[]) => ChecklistItem[],
): ChecklistItem[] {
  if (parentPath.length === 0) {
    return update(items);
  }

  const [index, ...rest] = parentPath;
  return items.map((item, itemIndex) =>
    itemIndex === index
      ? withChildren(item, updateSiblings(item.children, rest, update))
      : item,
  );
}

function insertAt(
  forest: Forest,
  parentPath: number[],
  index: number,
  item: ChecklistItem,
): Forest {
  return updateSiblings(forest, parentPath, (siblings) => [
    ...siblings.slice(0, index),
    item,
    ...siblings.slice(index),
  ]);
}

function containsId(items: ChecklistItem[], id: ItemId): boolean {
  return items.some(
    (item) => item.id === id || containsId(item.children, id),
  );
}

export function collectIds(
  items: ChecklistItem[],
  into = new Set<ItemId>(),
): Set<ItemId> {
  for (const item of items) {
    into.add(item.id);
    collectIds(item.children, into);
  }
  return into;
}

function assertInsertable(forest: Forest, item: ChecklistItem) {
  const existing = collectIds(forest);
  const pending: ChecklistItem[] = [item];

  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    if (existing.has(next.id)) {
      throw new DuplicateItemIdError(next.id);
    }
    existing.add(next.id);
    pending.push(...next.children);
  }
}

/** Pre-order depth-first search; the first match wins. */
export function find(forest: Forest, id: ItemId): ChecklistItem | null {
  return locate(forest, id)?.item ?? null;
}

/** The item whose children hold `id`, or `null` for a root (or missing) item. */
export function parentOf(forest: Forest, id: ItemId): ChecklistItem | null {
  const location = locate(forest, id);
  if (!location || location.path.length < 2) {
    return null;
  }

  let parent: ChecklistItem = forest[location.path[0]];
  for (const index of location.path.slice(1, -1)) {
    parent = parent.children[index];
  }
  return parent;
}

/** True iff `id` lies strictly inside the subtree headed by `ancestorId`. */
export function isDescendant(
  forest: Forest,
  ancestorId: ItemId,
  id: ItemId,
): boolean {
  const ancestor = find(forest, ancestorId);
  return ancestor ? containsId(ancestor.children, id) : false;
}

export function countItems(items: ChecklistItem[]): number {
  return items.reduce((total, item) => total + 1 + countItems(item.children), 0);
}

export type VisibleItem = {
  item: ChecklistItem;
  depth: number;
};

/** Rows in paint order, skipping the children of collapsed items. */
export function visibleItems(forest: Forest, depth = 0): VisibleItem[] {
  return forest.flatMap((item) => [
    { item, depth },
    ...(item.collapsed ? [] : visibleItems(item.children, depth + 1)),
  ]);
}

export function appendRoot(forest: Forest, item: ChecklistItem): TreeEdit {
  assertInsertable(forest, item);
  return { ok: true, forest: [...forest, item] };
}

export function insertAfter(
  forest: Forest,
  refId: ItemId,
  item: ChecklistItem,
): TreeEdit {
  const location = locate(forest, refId);
  if (!location) {
    return { ok: false, reason: "not-found" };
  }

  assertInsertable(forest, item);
  const index = location.path[location.path.length - 1];
  return {
    ok: true,
    forest: insertAt(forest, location.path.slice(0, -1), index + 1, item),
  };
}

export function appendChild(
  forest: Forest,
  parentId: ItemId,
  item: ChecklistItem,
): TreeEdit {
  const location = locate(forest, parentId);
  if (!location) {
    return { ok: false, reason: "not-found" };
  }

  assertInsertable(forest, item);
  return {
    ok: true,
    forest: updateSiblings(forest, location.path, (children) => [
      ...children,
      item,
    ]),
  };
}

/** Detaches the item together with its whole subtree. */
export function remove(
  forest: Forest,
  id: ItemId,
): TreeEdit<{ removed: ChecklistItem }> {
  const location = locate(forest, id);
  if (!location) {
    return { ok: false, reason: "not-found" };
  }

  const index = location.path[location.path.length - 1];
  return {
    ok: true,
    removed: location.item,
    forest: updateSiblings(forest, location.path.slice(0, -1), (siblings) =>
      siblings.filter((_, siblingIndex) => siblingIndex !== index),
    ),
  };
}

/** Moves the item to the end of its preceding sibling's children. */
export function indent(forest: Forest, id: ItemId): TreeEdit {
  const location = locate(forest, id);
  if (!location) {
    return { ok: false, reason: "not-found" };
  }

  const index = location.path[location.path.length - 1];
  if (index === 0) {
    return { ok: false, reason: "no-preceding-sibling" };
  }

  return {
    ok: true,
    forest: updateSiblings(forest, location.path.slice(0, -1), (siblings) => {
      const previous = siblings[index - 1];
      const next = [...siblings];
      next.splice(
        index - 1,
        2,
        withChildren(previous, [...previous.children, location.item]),
      );
      return next;
    }),
  };
}

/** Moves the item out of its parent, to sit right after that parent. */
export function outdent(forest: Forest, id: ItemId): TreeEdit {
  const location = locate(forest, id);
  if (!location) {
    return { ok: false, reason: "not-found" };
  }

  const depth = location.path.length;
  if (depth < 2) {
    return { ok: false, reason: "at-root" };
  }

  const index = location.path[depth - 1];
  const parentIndex = location.path[depth - 2];

  return {
    ok: true,
    forest: updateSiblings(forest, location.path.slice(0, -2), (siblings) => {
      const parent = siblings[parentIndex];
      const next = [...siblings];
      next.splice(
        parentIndex,
        1,
        withChildren(
          parent,
          parent.children.filter((_, childIndex) => childIndex !== index),
        ),
        location.item,
      );
      return next;
    }),
  };
}

/**
 * Moves the source subtree next to (`before`/`after`) or into (`inside`) the
 * target. A `null` target or the `end` zone appends it to the root list.
 * Dropping an item onto itself or into its own subtree changes nothing.
 */
export function relocate(
  forest: Forest,
  sourceId: ItemId,
  targetId: ItemId | null,
  zone: DropZone,
): TreeEdit {
  const source = locate(forest, sourceId);
  if (!source) {
    return { ok: false, reason: "not-found" };
  }

  if (targetId === null || zone === "end") {
    const detached = remove(forest, sourceId);
    if (!detached.ok) {
      return detached;
    }
    return { ok: true, forest: [...detached.forest, detached.removed] };
  }

  // Checked on the untouched forest, before anything is detached.
  if (targetId === sourceId || containsId(source.item.children, targetId)) {
    return { ok: false, reason: "cycle-rejected" };
  }

  if (!locate(forest, targetId)) {
    return { ok: false, reason: "not-found" };
  }

  const detached = remove(forest, sourceId);
  if (!detached.ok) {
    return detached;
  }

  const target = locate(detached.forest, targetId);
  if (!target) {
    return { ok: false, reason: "not-found" };
  }

  const targetPath = target.path;
  const targetIndex = targetPath[targetPath.length - 1];

  if (zone === "inside") {
    return {
      ok: true,
      forest: updateSiblings(detached.forest, targetPath, (children) => [
        ...children,
        detached.removed,
      ]),
    };
  }

  return {
    ok: true,
    forest: insertAt(
      detached.forest,
      targetPath.slice(0, -1),
      zone === "before" ? targetIndex : targetIndex + 1,
      detached.removed,
    ),
  };
}

export type ItemPatch = Partial<
  Pick<ChecklistItem, "text" | "statusNumber" | "collapsed">
>;

/** Field edits on a single item. `collapsed` is dropped for childless items. */
export function updateItem(
  forest: Forest,
  id: ItemId,
  patch: ItemPatch,
): TreeEdit {
  const location = locate(forest, id);
  if (!location) {
    return { ok: false, reason: "not-found" };
  }

  const index = location.path[location.path.length - 1];
  const patched = withChildren(
    { ...location.item, ...patch },
    location.item.children,
  );

  return {
    ok: true,
    forest: updateSiblings(forest, location.path.slice(0, -1), (siblings) =>
      siblings.map((item, siblingIndex) =>
        siblingIndex === index ? patched : item,
      ),
    ),
  };
}
