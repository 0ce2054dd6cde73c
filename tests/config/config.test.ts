import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG, normalizeConfig } from "../../app/lib/config";
import {
  loadConfigFile,
  resolveDataDir,
  saveConfigFile,
} from "../../app/lib/data/configFile";

describe("normalizeConfig", () => {
  it("returns the defaults for anything that is not an object", () => {
    expect(normalizeConfig(null)).toEqual(DEFAULT_CONFIG);
    expect(normalizeConfig([1, 2])).toEqual(DEFAULT_CONFIG);
    expect(normalizeConfig("fast")).toEqual(DEFAULT_CONFIG);
  });

  it("keeps valid fields and replaces invalid ones", () => {
    expect(
      normalizeConfig({
        saveDelayMs: -1,
        rapidClickMs: "fast",
        longPressMs: 650,
        dragThresholdPx: 8,
        maxItemWidth: 612.6,
      }),
    ).toEqual({
      saveDelayMs: 400,
      rapidClickMs: 1000,
      longPressMs: 650,
      dragThresholdPx: 8,
      maxItemWidth: 613,
    });
  });

  it("reads the item width older installs saved", () => {
    expect(normalizeConfig({ max_item_width: 1000 }).maxItemWidth).toBe(1000);
    expect(normalizeConfig({ max_item_width: 2000 }).maxItemWidth).toBe(1400);
    expect(
      normalizeConfig({ maxItemWidth: 900, max_item_width: 1000 }).maxItemWidth,
    ).toBe(900);
  });

  it("clamps the item width", () => {
    expect(normalizeConfig({ maxItemWidth: 5000 }).maxItemWidth).toBe(1400);
    expect(normalizeConfig({ maxItemWidth: 10 }).maxItemWidth).toBe(400);
  });
});

describe("resolveDataDir", () => {
  it("uses Application Support on macOS", () => {
    expect(
      resolveDataDir({ platform: "darwin", env: {}, home: "/Users/sam" }),
    ).toBe("/Users/sam/Library/Application Support/Checklist");
  });

  it("uses APPDATA on Windows, with a fallback under the profile", () => {
    expect(
      resolveDataDir({
        platform: "win32",
        env: { APPDATA: "D:\\Roaming" },
        home: "C:\\Users\\sam",
      }),
    ).toBe("D:\\Roaming\\Checklist");
    expect(
      resolveDataDir({ platform: "win32", env: {}, home: "C:\\Users\\sam" }),
    ).toBe("C:\\Users\\sam\\AppData\\Roaming\\Checklist");
  });

  it("follows XDG_DATA_HOME elsewhere", () => {
    expect(
      resolveDataDir({
        platform: "linux",
        env: { XDG_DATA_HOME: "/data" },
        home: "/home/sam",
      }),
    ).toBe("/data/Checklist");
    expect(
      resolveDataDir({ platform: "linux", env: {}, home: "/home/sam" }),
    ).toBe("/home/sam/.local/share/Checklist");
  });

  it("lets CHECKLIST_DATA_DIR override every platform", () => {
    expect(
      resolveDataDir({
        platform: "darwin",
        env: { CHECKLIST_DATA_DIR: "/tmp/lists" },
        home: "/Users/sam",
      }),
    ).toBe("/tmp/lists");
  });
});

describe("config file", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), "checktree-config-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  it("falls back to the defaults when there is no file", async () => {
    expect(await loadConfigFile(dataDir)).toEqual(DEFAULT_CONFIG);
  });

  it("falls back to the defaults for an unreadable file", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    await writeFile(path.join(dataDir, "config.json"), "{ nope", "utf8");

    expect(await loadConfigFile(dataDir)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("merges saved settings into the existing file", async () => {
    await writeFile(
      path.join(dataDir, "config.json"),
      JSON.stringify({ theme: "dark", longPressMs: 700 }),
      "utf8",
    );

    const saved = await saveConfigFile(dataDir, { rapidClickMs: 600 });

    expect(saved).toEqual({
      ...DEFAULT_CONFIG,
      rapidClickMs: 600,
      longPressMs: 700,
    });
    expect(
      JSON.parse(await readFile(path.join(dataDir, "config.json"), "utf8")),
    ).toEqual({ theme: "dark", longPressMs: 700, rapidClickMs: 600 });
    expect(await loadConfigFile(dataDir)).toEqual(saved);
  });

  it("keeps an older install's width and updates it in place", async () => {
    const configPath = path.join(dataDir, "config.json");
    await writeFile(configPath, JSON.stringify({ max_item_width: 950 }), "utf8");

    expect((await loadConfigFile(dataDir)).maxItemWidth).toBe(950);

    const saved = await saveConfigFile(dataDir, { maxItemWidth: 1100 });

    expect(saved.maxItemWidth).toBe(1100);
    expect(JSON.parse(await readFile(configPath, "utf8"))).toEqual({
      max_item_width: 1100,
      maxItemWidth: 1100,
    });
  });
});
