import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

const SettingsSchema = z.object({
  commands: z
    .object({
      asusctl: z.string().min(1).default("asusctl"),
      makoctl: z.string().min(1).default("makoctl"),
      notifySend: z.string().min(1).default("notify-send"),
      picker: z.string().min(1).default("wofi"),
      pkill: z.string().min(1).default("pkill"),
    })
    .default({}),
  bar: z
    .object({
      processName: z.string().min(1).default("waybar"),
      // Offset from SIGRTMIN; waybar modules listen on `signal: <n>`.
      refreshSignal: z.number().int().min(1).max(30).default(8),
    })
    .default({}),
  power: z
    .object({
      syncKey: z.string().min(1).default("power-profile"),
      urgency: z.enum(["low", "normal", "critical"]).default("low"),
    })
    .default({}),
  picker: z
    .object({
      prompt: z.string().default("Notifications"),
      width: z.number().int().positive().default(600),
      height: z.number().int().positive().default(400),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

export function parseSettings(input: unknown): Settings {
  return SettingsSchema.parse(input);
}

function defaultConfigDir(env: NodeJS.ProcessEnv): string {
  const xdg = env.XDG_CONFIG_HOME;
  if (xdg && xdg.trim()) return xdg;
  return path.join(os.homedir(), ".config");
}

export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.BAR_WIDGETS_SETTINGS_PATH;
  if (override && override.trim()) return override;
  return path.join(defaultConfigDir(env), "bar-widgets", "settings.v1.json");
}

export async function loadSettings(env: NodeJS.ProcessEnv = process.env): Promise<Settings> {
  const p = getSettingsPath(env);
  try {
    const raw = await fs.readFile(p, "utf8");
    return parseSettings(JSON.parse(raw));
  } catch {
    return DEFAULT_SETTINGS;
  }
}

export function isFixtureMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return (env.BAR_WIDGETS_FIXTURE?.trim().toLowerCase() ?? "") === "demo";
}
