import type { ProfileName, ProfileReading } from "../types.js";

const ACTIVE_PREFIX = "Active profile is ";

const PROFILE_NAMES: readonly ProfileName[] = ["Balanced", "Performance", "Quiet"];

// `asusctl profile -p` prints a few lines; only the "Active profile is <Name>" one matters.
export function parseActiveProfile(text: string): string {
  const line = text
    .replaceAll("\r\n", "\n")
    .split("\n")
    .find((l) => l.includes(ACTIVE_PREFIX));
  if (!line) return "";
  return line.replace(ACTIVE_PREFIX, "").trim();
}

export function isProfileName(raw: string): raw is ProfileName {
  return PROFILE_NAMES.some((name) => name === raw);
}

export function classifyProfile(raw: string): ProfileReading {
  if (isProfileName(raw)) return { kind: "known", name: raw };
  return { kind: "unknown", raw };
}
