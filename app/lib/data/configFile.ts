import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { errorCode } from "./fileGateway";
import {
  DEFAULT_CONFIG,
  LEGACY_MAX_ITEM_WIDTH_KEY,
  normalizeConfig,
  type ChecklistConfig,
} from "@/app/lib/config";
import { StorageError } from "@/app/lib/utils";

export const APP_DIR_NAME = "Checklist";
export const CONFIG_FILE_NAME = "config.json";
export const DATA_DIR_ENV = "CHECKLIST_DATA_DIR";

export type DataDirEnvironment = {
  platform: NodeJS.Platform;
  env: Record<string, string | undefined>;
  home: string;
};

/** Per-user directory holding checklist documents and `config.json`. */
export function resolveDataDir(
  { platform, env, home }: DataDirEnvironment = {
    platform: process.platform,
    env: process.env,
    home: os.homedir(),
  },
): string {
  const override = env[DATA_DIR_ENV];
  if (override) {
    return override;
  }

  if (platform === "win32") {
    const base = env.APPDATA || path.win32.join(home, "AppData", "Roaming");
    return path.win32.join(base, APP_DIR_NAME);
  }

  if (platform === "darwin") {
    return path.posix.join(
      home,
      "Library",
      "Application Support",
      APP_DIR_NAME,
    );
  }

  const base = env.XDG_DATA_HOME || path.posix.join(home, ".local", "share");
  return path.posix.join(base, APP_DIR_NAME);
}

async function readConfigObject(
  dataDir: string,
): Promise<Record<string, unknown>> {
  const text = await readFile(path.join(dataDir, CONFIG_FILE_NAME), "utf8");
  const parsed: unknown = JSON.parse(text);
  return parsed && typeof parsed === "object" && !Array.isArray(parsed)
    ? { ...parsed }
    : {};
}

/** Missing or unreadable configuration falls back to the defaults. */
export async function loadConfigFile(
  dataDir: string,
): Promise<ChecklistConfig> {
  try {
    return normalizeConfig(await readConfigObject(dataDir));
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      console.warn(`Ignoring unreadable ${CONFIG_FILE_NAME}:`, error);
    }
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Merges `patch` into the stored configuration, keeping unknown keys. A
 * width saved under `max_item_width` is read when `maxItemWidth` is absent.
 */
export async function saveConfigFile(
  dataDir: string,
  patch: Partial<ChecklistConfig>,
): Promise<ChecklistConfig> {
  const configPath = path.join(dataDir, CONFIG_FILE_NAME);
  let existing: Record<string, unknown> = {};
  try {
    existing = await readConfigObject(dataDir);
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      console.warn(`Replacing unreadable ${CONFIG_FILE_NAME}:`, error);
    }
  }

  const merged: Record<string, unknown> = { ...existing, ...patch };
  // Older installs read only the legacy key; keep it in step when present.
  if (
    patch.maxItemWidth !== undefined &&
    LEGACY_MAX_ITEM_WIDTH_KEY in existing
  ) {
    merged[LEGACY_MAX_ITEM_WIDTH_KEY] = patch.maxItemWidth;
  }
  try {
    await mkdir(dataDir, { recursive: true });
    await writeFile(configPath, `${JSON.stringify(merged, null, 2)}\n`, "utf8");
  } catch (error) {
    throw new StorageError("save", `Could not write ${configPath}`, error);
  }

  return normalizeConfig(merged);
}
