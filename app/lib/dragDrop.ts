// Framework-free drag gesture tracking for checklist items.

import type { DropRequest, DropZone, ItemId } from "@/app/lib/data/types";

export type DragDropStateType = {
  /** A pointer is down on a drag handle but has not moved far enough yet. */
  isPending: boolean;
  /** The source is being dragged. */
  isDragging: boolean;
  sourceId: ItemId | null;
};

const IDLE_STATE: DragDropStateType = {
  isPending: false,
  isDragging: false,
  sourceId: null,
};

/**
 * Drop zone for a pointer `offsetY` pixels below the top of a row `height`
 * pixels tall: top quarter before, bottom quarter after, the rest inside.
 */
export function dropZoneAt(offsetY: number, height: number): DropZone | null {
  if (height <= 0) {
    return null;
  }

  const ratio = offsetY / height;
  if (ratio < 0.25) {
    return "before";
  }
  if (ratio > 0.75) {
    return "after";
  }
  return "inside";
}

export class DragTracker {
  private readonly threshold: number;
  private state: DragDropStateType = IDLE_STATE;
  private origin: { x: number; y: number } | null = null;

  constructor(dragThresholdPx: number) {
    this.threshold = dragThresholdPx;
  }

  getState(): DragDropStateType {
    return this.state;
  }

  pointerDown(sourceId: ItemId, x: number, y: number) {
    this.state = { isPending: true, isDragging: false, sourceId };
    this.origin = { x, y };
  }

  /** Returns true on the move that turns the pending drag into a real one. */
  pointerMove(x: number, y: number): boolean {
    if (!this.state.isPending || !this.origin) {
      return false;
    }

    const distance = Math.abs(x - this.origin.x) + Math.abs(y - this.origin.y);
    if (distance < this.threshold) {
      return false;
    }

    this.state = { ...this.state, isPending: false, isDragging: true };
    this.origin = null;
    return true;
  }

  /**
   * Ends the gesture. Only an active drag over something other than its own
   * source produces a request.
   */
  drop(targetId: ItemId | null, zone: DropZone | null): DropRequest | null {
    const { isDragging, sourceId } = this.state;
    this.cancel();

    if (!isDragging || sourceId === null || sourceId === targetId) {
      return null;
    }

    if (targetId === null) {
      return { sourceId, targetId: null, zone: "end" };
    }

    return zone ? { sourceId, targetId, zone } : null;
  }

  cancel() {
    this.state = IDLE_STATE;
    this.origin = null;
  }
}
