// Data store and schema.

import { openDB, type DBSchema } from "idb";
import type { ChecklistId } from "./types";
import { QueryClient } from "@tanstack/react-query";

const DB_NAME = "checktree-db";
const DB_VERSION = 1;

export const CHECKLISTS_STORE = "checklists";
export const CHECKLIST_ORDER_STORE = "checklistOrder";

export type StoredChecklist = {
  id: ChecklistId;
  name: string;
  /** Serialized checklist document. */
  document: string;
};

export interface ChecktreeDB extends DBSchema {
  [CHECKLISTS_STORE]: {
    key: ChecklistId;
    value: StoredChecklist;
  };
  [CHECKLIST_ORDER_STORE]: {
    key: "order";
    value: ChecklistId[];
  };
}

let dbPromise: ReturnType<typeof openDB<ChecktreeDB>> | null = null;

export const getDb = async () => {
  if (typeof indexedDB === "undefined") {
    throw new Error("IndexedDB is not available");
  }

  if (!dbPromise) {
    dbPromise = openDB<ChecktreeDB>(DB_NAME, DB_VERSION, {
      upgrade(db) {
        for (const storeName of Array.from(db.objectStoreNames)) {
          db.deleteObjectStore(storeName);
        }

        db.createObjectStore(CHECKLISTS_STORE);
        db.createObjectStore(CHECKLIST_ORDER_STORE);
      },
    });
  }

  return dbPromise;
};

export const clearDb = async () => {
  const db = await getDb();
  const tx = db.transaction(
    [CHECKLISTS_STORE, CHECKLIST_ORDER_STORE],
    "readwrite",
  );

  await Promise.all([
    tx.objectStore(CHECKLISTS_STORE).clear(),
    tx.objectStore(CHECKLIST_ORDER_STORE).clear(),
  ]);

  await tx.done;
};

export const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      staleTime: Infinity,
    },
  },
});
