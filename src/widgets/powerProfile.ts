import type { BarHost, Notifier, ProfileStore } from "../clients/client.js";
import type { Logger, Writer } from "../log.js";
import { renderPayload } from "../output.js";
import { classifyProfile } from "../parsers/asusctl.js";
import type { ProfileName, ProfileReading, StatusPayload, Urgency, WidgetError } from "../types.js";

export type PowerProfileAction = "status" | "next";

// Nerd Font glyphs: scale, bolt, leaf.
export const PROFILE_DISPLAY: Record<ProfileName, { glyph: string; label: string }> = {
  Balanced: { glyph: "\u{f24e}", label: "Balanced" },
  Performance: { glyph: "\u{f0e7}", label: "Performance" },
  Quiet: { glyph: "\u{f06c}", label: "Quiet" },
};

export type PowerProfileDeps = {
  store: ProfileStore;
  bar: BarHost;
  notifier: Notifier;
  out: Writer;
  log: Logger;
  syncKey: string;
  urgency: Urgency;
};

export function profilePayload(reading: ProfileReading): StatusPayload {
  switch (reading.kind) {
    case "known": {
      const display = PROFILE_DISPLAY[reading.name];
      return { text: display.glyph, tooltip: display.label };
    }
    case "unknown":
      return { text: "", tooltip: "" };
  }
}

function warn(log: Logger, err: WidgetError): void {
  log("warn", err.command, `${err.type}: ${err.message}`);
}

async function readProfile(deps: PowerProfileDeps): Promise<string> {
  const res = await deps.store.current();
  if (res.ok) return res.value;
  warn(deps.log, res.error);
  return "";
}

export async function runPowerProfile(
  action: PowerProfileAction,
  deps: PowerProfileDeps
): Promise<void> {
  // Printed before any advance, so a click shows the profile being left.
  const before = await readProfile(deps);
  deps.out(`${renderPayload(profilePayload(classifyProfile(before)))}\n`);

  if (action !== "next") return;

  const advanced = await deps.store.advance();
  if (!advanced.ok) warn(deps.log, advanced.error);

  const refreshed = await deps.bar.refresh();
  if (!refreshed.ok) warn(deps.log, refreshed.error);

  const after = await readProfile(deps);
  const notified = await deps.notifier.notify({
    title: `${after} Power Profile`,
    urgency: deps.urgency,
    syncKey: deps.syncKey,
  });
  if (!notified.ok) warn(deps.log, notified.error);
}
