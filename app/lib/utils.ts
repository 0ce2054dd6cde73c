import { useCallback, useLayoutEffect, useRef } from "react";
import type { ItemId } from "@/app/lib/data/types";

/** An item id occurs twice in one forest. This is a defect, never a user error. */
export class DuplicateItemIdError extends Error {
  readonly itemId: ItemId;

  constructor(itemId: ItemId) {
    super(`Duplicate checklist item id: ${itemId}`);
    this.name = "DuplicateItemIdError";
    this.itemId = itemId;
  }
}

export class MalformedDocumentError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Malformed checklist document: ${reason}`);
    this.name = "MalformedDocumentError";
    this.reason = reason;
  }
}

export type StorageOperation = "load" | "save" | "list" | "create" | "delete";

/** Storage could not be reached or written. Recoverable by the caller. */
export class StorageError extends Error {
  readonly operation: StorageOperation;

  constructor(operation: StorageOperation, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StorageError";
    this.operation = operation;
  }
}

/** Eight lowercase hex digits. */
export function createShortId(): string {
  return crypto.randomUUID().replace(/-/g, "").slice(0, 8);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Returns a function with a stable identity that always calls the latest
 * `callback`.
 */
export function useStableCallback<Args extends unknown[], ReturnValue>(
  callback: (...args: Args) => ReturnValue,
): (...args: Args) => ReturnValue {
  const callbackRef = useRef(callback);

  useLayoutEffect(() => {
    callbackRef.current = callback;
  }, [callback]);

  return useCallback((...args: Args) => callbackRef.current(...args), []);
}
