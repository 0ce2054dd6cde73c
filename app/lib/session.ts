// Presentation-facing controller for one open checklist.

import type {
  Checklist,
  ChecklistItem,
  DropZone,
  ItemId,
  StateDefinition,
  StatusNumber,
} from "@/app/lib/data/types";
import { DEFAULT_CONFIG, type ChecklistConfig } from "@/app/lib/config";
import { SaveScheduler } from "@/app/lib/saveScheduler";
import { replaceCatalog } from "@/app/lib/states";
import { StatusCycler, type StatusStep } from "@/app/lib/statusCycler";
import {
  appendChild,
  appendRoot,
  collectIds,
  createItem,
  find,
  indent,
  insertAfter,
  outdent,
  relocate,
  remove,
  updateItem,
  type ItemPatch,
  type TreeEdit,
} from "@/app/lib/tree";
import { createShortId } from "@/app/lib/utils";

export type ChecklistSessionOptions = {
  save: (checklist: Checklist) => Promise<void>;
  config?: Partial<ChecklistConfig>;
  onSaveError?: (error: unknown) => void;
  createId?: () => ItemId;
  now?: () => number;
};

const logSaveError = (error: unknown) => {
  console.error("Failed to save checklist", error);
};

/**
 * Holds the current checklist value and applies gestures to it. Accepted
 * edits notify subscribers and restart the save timer; rejected ones do
 * neither.
 */
export class ChecklistSession {
  private checklist: Checklist;
  private readonly listeners = new Set<() => void>();
  private readonly cycler: StatusCycler;
  private readonly scheduler: SaveScheduler;
  private readonly longPressTimers = new Map<
    ItemId,
    ReturnType<typeof setTimeout>
  >();
  private readonly config: ChecklistConfig;
  private readonly createId: () => ItemId;

  constructor(checklist: Checklist, options: ChecklistSessionOptions) {
    this.checklist = checklist;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.createId = options.createId ?? createShortId;
    this.cycler = new StatusCycler({
      rapidClickMs: this.config.rapidClickMs,
      longPressMs: this.config.longPressMs,
      now: options.now,
    });
    this.scheduler = new SaveScheduler(
      this.config.saveDelayMs,
      () => options.save(this.checklist),
      options.onSaveError ?? logSaveError,
    );
  }

  getSnapshot = (): Checklist => this.checklist;

  subscribe = (listener: () => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  get savePending(): boolean {
    return this.scheduler.pending;
  }

  private commit(next: Checklist) {
    this.checklist = next;
    for (const listener of this.listeners) {
      listener();
    }
    this.scheduler.schedule();
  }

  private applyEdit(edit: TreeEdit): boolean {
    if (!edit.ok) {
      return false;
    }

    this.commit({ ...this.checklist, items: edit.forest });
    return true;
  }

  private patchItem(id: ItemId, patch: ItemPatch): boolean {
    return this.applyEdit(updateItem(this.checklist.items, id, patch));
  }

  private newItem(): ChecklistItem {
    const usedIds = collectIds(this.checklist.items);
    let id = this.createId();
    while (usedIds.has(id)) {
      id = this.createId();
    }
    return createItem(id, this.checklist.catalog.defaultStatusNumber);
  }

  /** Each `add*` returns the id of the new item, to be focused. */
  addRootItem(): ItemId {
    const item = this.newItem();
    this.applyEdit(appendRoot(this.checklist.items, item));
    return item.id;
  }

  addSiblingAfter(refId: ItemId): ItemId | null {
    const item = this.newItem();
    return this.applyEdit(insertAfter(this.checklist.items, refId, item))
      ? item.id
      : null;
  }

  /** Expands the parent so the new child is visible. */
  addChild(parentId: ItemId): ItemId | null {
    const item = this.newItem();
    const added = appendChild(this.checklist.items, parentId, item);
    if (!added.ok) {
      return null;
    }

    const expanded = updateItem(added.forest, parentId, { collapsed: false });
    this.applyEdit(expanded.ok ? expanded : added);
    return item.id;
  }

  deleteItem(id: ItemId): boolean {
    const removed = remove(this.checklist.items, id);
    if (!removed.ok) {
      return false;
    }

    for (const removedId of collectIds([removed.removed])) {
      this.clearLongPressTimer(removedId);
      this.cycler.forget(removedId);
    }

    return this.applyEdit(removed);
  }

  indent(id: ItemId): boolean {
    return this.applyEdit(indent(this.checklist.items, id));
  }

  outdent(id: ItemId): boolean {
    return this.applyEdit(outdent(this.checklist.items, id));
  }

  drop(sourceId: ItemId, targetId: ItemId | null, zone: DropZone): boolean {
    return this.applyEdit(
      relocate(this.checklist.items, sourceId, targetId, zone),
    );
  }

  setText(id: ItemId, text: string): boolean {
    if (find(this.checklist.items, id)?.text === text) {
      return false;
    }
    return this.patchItem(id, { text });
  }

  setCollapsed(id: ItemId, collapsed: boolean): boolean {
    const item = find(this.checklist.items, id);
    if (!item || item.children.length === 0 || item.collapsed === collapsed) {
      return false;
    }
    return this.patchItem(id, { collapsed });
  }

  setStatus(id: ItemId, statusNumber: StatusNumber): boolean {
    if (find(this.checklist.items, id)?.statusNumber === statusNumber) {
      return false;
    }
    return this.patchItem(id, { statusNumber });
  }

  private applyStep(id: ItemId, step: StatusStep | null): StatusStep | null {
    if (step) {
      this.setStatus(id, step.next);
    }
    return step;
  }

  clickIndicator(id: ItemId): StatusStep | null {
    const item = find(this.checklist.items, id);
    if (!item) {
      return null;
    }

    return this.applyStep(
      id,
      this.cycler.click(id, item.statusNumber, this.checklist.catalog),
    );
  }

  /** Arms the long-press timer; holding past it toggles the bullet. */
  pressIndicator(id: ItemId) {
    if (!find(this.checklist.items, id)) {
      return;
    }

    this.clearLongPressTimer(id);
    this.cycler.press(id);
    this.longPressTimers.set(
      id,
      setTimeout(() => {
        this.longPressTimers.delete(id);
        const item = find(this.checklist.items, id);
        if (item) {
          this.applyStep(
            id,
            this.cycler.completeLongPress(id, item.statusNumber),
          );
        }
      }, this.config.longPressMs),
    );
  }

  /** Ends a press. A press that already fired its long-press changes nothing. */
  releaseIndicator(id: ItemId): StatusStep | null {
    this.clearLongPressTimer(id);
    const item = find(this.checklist.items, id);
    if (!item) {
      this.cycler.cancelPress(id);
      return null;
    }

    return this.applyStep(
      id,
      this.cycler.release(id, item.statusNumber, this.checklist.catalog),
    );
  }

  private clearLongPressTimer(id: ItemId) {
    const timer = this.longPressTimers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.longPressTimers.delete(id);
    }
  }

  rename(name: string): boolean {
    if (name === this.checklist.name) {
      return false;
    }

    this.commit({ ...this.checklist, name });
    return true;
  }

  /**
   * Swaps the whole state catalog. Items keep their status numbers, even
   * ones the new catalog no longer defines.
   */
  replaceStates(states: StateDefinition[], defaultStatusNumber: StatusNumber) {
    this.commit({
      ...this.checklist,
      catalog: replaceCatalog(states, defaultStatusNumber),
    });
  }

  /** Saves any pending edits now. */
  flush(): Promise<void> {
    return this.scheduler.flush();
  }

  /** Drops timers without saving. */
  dispose() {
    this.scheduler.cancel();
    for (const id of Array.from(this.longPressTimers.keys())) {
      this.clearLongPressTimer(id);
    }
  }
}
