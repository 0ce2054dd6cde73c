import {
  CHECKLIST_ORDER_STORE,
  CHECKLISTS_STORE,
  getDb,
  type StoredChecklist,
} from "./store";
import {
  createEmptyChecklist,
  loadChecklistDocument,
  serializeChecklist,
} from "./document";
import type { Checklist, ChecklistId, ChecklistSummary } from "./types";
import {
  createShortId,
  StorageError,
  type StorageOperation,
} from "@/app/lib/utils";

/**
 * Loads and saves whole checklists. The identifier is whatever the backend
 * addresses a checklist by.
 */
export interface PersistenceGateway<Id> {
  /**
   * Malformed documents come back as an empty checklist.
   *
   * @throws StorageError when storage cannot be read.
   */
  load(id: Id): Promise<Checklist>;

  /**
   * Always writes the current document format.
   *
   * @throws StorageError when storage cannot be written.
   */
  save(checklist: Checklist, id: Id): Promise<void>;
}

async function withStorage<T>(
  operation: StorageOperation,
  message: string,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    throw new StorageError(operation, message, error);
  }
}

const toStoredChecklist = (
  id: ChecklistId,
  checklist: Checklist,
): StoredChecklist => ({
  id,
  name: checklist.name,
  document: serializeChecklist(checklist),
});

/** Checklists kept in IndexedDB, plus the order they are listed in. */
export class IdbChecklistGateway implements PersistenceGateway<ChecklistId> {
  async list(): Promise<ChecklistSummary[]> {
    return withStorage("list", "Could not list checklists", async () => {
      const db = await getDb();
      const order = (await db.get(CHECKLIST_ORDER_STORE, "order")) ?? [];
      const records = await db.getAll(CHECKLISTS_STORE);
      const recordsById = new Map(records.map((record) => [record.id, record]));

      const ordered = order.flatMap((id) => {
        const record = recordsById.get(id);
        return record ? [{ id: record.id, name: record.name }] : [];
      });

      // Records that never made it into the order list go last, by name.
      const orderedIds = new Set(order);
      const unordered = records
        .filter((record) => !orderedIds.has(record.id))
        .sort((a, b) => a.name.localeCompare(b.name))
        .map((record) => ({ id: record.id, name: record.name }));

      return [...ordered, ...unordered];
    });
  }

  async load(id: ChecklistId): Promise<Checklist> {
    return withStorage("load", `Could not load checklist ${id}`, async () => {
      const db = await getDb();
      const record = await db.get(CHECKLISTS_STORE, id);
      if (!record) {
        throw new StorageError("load", `Checklist ${id} does not exist`);
      }

      return loadChecklistDocument(record.document, record.name);
    });
  }

  async save(checklist: Checklist, id: ChecklistId): Promise<void> {
    return withStorage("save", `Could not save checklist ${id}`, async () => {
      const db = await getDb();
      // In a transaction:
      // - Replace the stored document
      // - Append the id to the order list if it is new
      const tx = db.transaction(
        [CHECKLISTS_STORE, CHECKLIST_ORDER_STORE],
        "readwrite",
      );
      const checklistsStore = tx.objectStore(CHECKLISTS_STORE);
      const orderStore = tx.objectStore(CHECKLIST_ORDER_STORE);

      await checklistsStore.put(toStoredChecklist(id, checklist), id);

      const order = (await orderStore.get("order")) ?? [];
      if (!order.includes(id)) {
        await orderStore.put([...order, id], "order");
      }

      await tx.done;
    });
  }

  async create(name: string, id: ChecklistId = createShortId()) {
    await withStorage("create", `Could not create "${name}"`, async () => {
      const db = await getDb();
      if (await db.get(CHECKLISTS_STORE, id)) {
        throw new StorageError("create", `Checklist ${id} already exists`);
      }
    });

    await this.save(createEmptyChecklist(name), id);
    return id;
  }

  async rename(id: ChecklistId, name: string): Promise<void> {
    const checklist = await this.load(id);
    await this.save({ ...checklist, name }, id);
  }

  async remove(id: ChecklistId): Promise<void> {
    return withStorage("delete", `Could not delete checklist ${id}`, async () => {
      const db = await getDb();
      const tx = db.transaction(
        [CHECKLISTS_STORE, CHECKLIST_ORDER_STORE],
        "readwrite",
      );
      const orderStore = tx.objectStore(CHECKLIST_ORDER_STORE);

      await tx.objectStore(CHECKLISTS_STORE).delete(id);
      const order = (await orderStore.get("order")) ?? [];
      await orderStore.put(
        order.filter((orderedId) => orderedId !== id),
        "order",
      );

      await tx.done;
    });
  }

  async move(fromIndex: number, toIndex: number): Promise<void> {
    return withStorage("save", "Could not reorder checklists", async () => {
      const db = await getDb();
      const order = (await db.get(CHECKLIST_ORDER_STORE, "order")) ?? [];
      if (fromIndex < 0 || toIndex < 0 || fromIndex >= order.length) {
        return;
      }
      const [moved] = order.splice(fromIndex, 1);
      order.splice(toIndex, 0, moved);
      await db.put(CHECKLIST_ORDER_STORE, order, "order");
    });
  }
}

export const checklistGateway = new IdbChecklistGateway();
