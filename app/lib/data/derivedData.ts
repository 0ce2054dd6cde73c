// Hooks that derive memoized data or long-lived objects from React Queries.

import { useEffect, useMemo, useState, useSyncExternalStore } from "react";
import type { ChecklistConfig } from "@/app/lib/config";
import { useSaveChecklistMutation } from "@/app/lib/data/mutations";
import type { Checklist, ChecklistId } from "@/app/lib/data/types";
import { ChecklistSession } from "@/app/lib/session";
import { resolveState } from "@/app/lib/states";
import { visibleItems } from "@/app/lib/tree";
import { useStableCallback } from "@/app/lib/utils";

/**
 * Opens an editing session on a loaded checklist. Edits are saved through
 * {@link useSaveChecklistMutation} after the configured delay, and any
 * pending save is flushed when the component unmounts.
 *
 * The session is created once and later saves go to the current `id`;
 * remount (e.g. with a `key`) to load a different checklist.
 */
export function useChecklistSession(
  id: ChecklistId,
  initial: Checklist,
  config?: Partial<ChecklistConfig>,
) {
  const saveMutation = useSaveChecklistMutation();
  const save = useStableCallback((checklist: Checklist) =>
    saveMutation.mutateAsync({ id, checklist }),
  );

  const [session] = useState(
    () => new ChecklistSession(initial, { save, config }),
  );

  useEffect(() => {
    return () => {
      session.flush().catch((error: unknown) => {
        console.error("Failed to save checklist on close", error);
      });
      session.dispose();
    };
  }, [session]);

  const checklist = useSyncExternalStore(
    session.subscribe,
    session.getSnapshot,
    session.getSnapshot,
  );

  return { session, checklist };
}

/** Rows to render, in display order, with each item's resolved state. */
export function useVisibleRows(checklist: Checklist) {
  return useMemo(
    () =>
      visibleItems(checklist.items).map(({ item, depth }) => ({
        item,
        depth,
        state: resolveState(checklist.catalog, item.statusNumber),
      })),
    [checklist.items, checklist.catalog],
  );
}
