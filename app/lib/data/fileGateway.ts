// File-backed storage: one document per checklist in the data directory.

import {
  mkdir,
  readdir,
  readFile,
  rename,
  unlink,
  writeFile,
} from "node:fs/promises";
import path from "node:path";
import type { PersistenceGateway } from "./gateway";
import {
  createEmptyChecklist,
  loadChecklistDocument,
  serializeChecklist,
} from "./document";
import type { Checklist } from "./types";
import { createShortId, StorageError } from "@/app/lib/utils";

export const CHECKLIST_FILE_EXTENSION = ".xml";

export function errorCode(error: unknown): string | undefined {
  return error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
    ? error.code
    : undefined;
}

/** Letters, digits, space, `_` and `-` survive; everything else becomes `_`. */
export function safeFileName(name: string): string {
  return name.replace(/[^\p{L}\p{N} _-]/gu, "_");
}

export class FileChecklistGateway implements PersistenceGateway<string> {
  async load(filePath: string): Promise<Checklist> {
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error) {
      throw new StorageError("load", `Could not read ${filePath}`, error);
    }

    return loadChecklistDocument(
      text,
      path.basename(filePath, CHECKLIST_FILE_EXTENSION),
    );
  }

  async save(checklist: Checklist, filePath: string): Promise<void> {
    // Written to a sibling temp file, then renamed over the target. Each
    // write gets its own temp name so overlapping saves never share one.
    const tempPath = `${filePath}.${createShortId()}.tmp`;
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tempPath, serializeChecklist(checklist), "utf8");
      await rename(tempPath, filePath);
    } catch (error) {
      throw new StorageError("save", `Could not write ${filePath}`, error);
    }
  }
}

export const fileChecklistGateway = new FileChecklistGateway();

export async function listChecklistFiles(dataDir: string): Promise<string[]> {
  try {
    await mkdir(dataDir, { recursive: true });
    const entries = await readdir(dataDir);
    return entries
      .filter((entry) => entry.endsWith(CHECKLIST_FILE_EXTENSION))
      .sort()
      .map((entry) => path.join(dataDir, entry));
  } catch (error) {
    throw new StorageError("list", `Could not list ${dataDir}`, error);
  }
}

/**
 * Creates an empty checklist file named after the checklist.
 *
 * @throws StorageError when a checklist with the same file name exists.
 */
export async function createChecklistFile(
  dataDir: string,
  name: string,
): Promise<string> {
  const filePath = path.join(
    dataDir,
    `${safeFileName(name)}${CHECKLIST_FILE_EXTENSION}`,
  );

  try {
    await mkdir(dataDir, { recursive: true });
    await writeFile(filePath, serializeChecklist(createEmptyChecklist(name)), {
      encoding: "utf8",
      flag: "wx",
    });
  } catch (error) {
    throw new StorageError(
      "create",
      errorCode(error) === "EEXIST"
        ? `A checklist named "${name}" already exists`
        : `Could not create ${filePath}`,
      error,
    );
  }

  return filePath;
}

/** Deleting a file that is already gone is not an error. */
export async function deleteChecklistFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return;
    }
    throw new StorageError("delete", `Could not delete ${filePath}`, error);
  }
}
