import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import {
  DEFAULT_SETTINGS,
  getSettingsPath,
  isFixtureMode,
  loadSettings,
  parseSettings,
} from "../src/settings.js";

describe("settings", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "bar-widgets-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("defaults match the stock waybar setup", () => {
    expect(DEFAULT_SETTINGS.commands.asusctl).toBe("asusctl");
    expect(DEFAULT_SETTINGS.bar).toEqual({ processName: "waybar", refreshSignal: 8 });
    expect(DEFAULT_SETTINGS.power).toEqual({ syncKey: "power-profile", urgency: "low" });
    expect(DEFAULT_SETTINGS.picker).toEqual({ prompt: "Notifications", width: 600, height: 400 });
  });

  test("partial settings keep defaults for the rest", () => {
    const s = parseSettings({ bar: { refreshSignal: 9 }, commands: { picker: "rofi" } });
    expect(s.bar).toEqual({ processName: "waybar", refreshSignal: 9 });
    expect(s.commands.picker).toBe("rofi");
    expect(s.commands.makoctl).toBe("makoctl");
  });

  test("resolves the path from the override, then XDG_CONFIG_HOME", () => {
    expect(getSettingsPath({ BAR_WIDGETS_SETTINGS_PATH: "/tmp/custom.json" })).toBe(
      "/tmp/custom.json"
    );
    expect(getSettingsPath({ XDG_CONFIG_HOME: "/xdg" })).toBe(
      path.join("/xdg", "bar-widgets", "settings.v1.json")
    );
  });

  test("loads a settings file", async () => {
    const p = path.join(dir, "settings.json");
    await fs.writeFile(p, JSON.stringify({ power: { syncKey: "asus" } }), "utf8");

    const s = await loadSettings({ BAR_WIDGETS_SETTINGS_PATH: p });

    expect(s.power).toEqual({ syncKey: "asus", urgency: "low" });
  });

  test("falls back to defaults on a missing or invalid file", async () => {
    const bad = path.join(dir, "bad.json");
    await fs.writeFile(bad, JSON.stringify({ bar: { refreshSignal: 99 } }), "utf8");

    expect(await loadSettings({ BAR_WIDGETS_SETTINGS_PATH: bad })).toEqual(DEFAULT_SETTINGS);
    expect(
      await loadSettings({ BAR_WIDGETS_SETTINGS_PATH: path.join(dir, "missing.json") })
    ).toEqual(DEFAULT_SETTINGS);
  });

  test("fixture mode is opt-in", () => {
    expect(isFixtureMode({ BAR_WIDGETS_FIXTURE: " Demo " })).toBe(true);
    expect(isFixtureMode({})).toBe(false);
  });
});
