import { describe, expect, test } from "vitest";

import type { ProfileStore } from "../src/clients/client.js";
import { MemoryBarHost, MemoryNotifier, MemoryProfileStore } from "../src/clients/memory.js";
import type { LogLevel } from "../src/log.js";
import { fail, ok, type Result } from "../src/types.js";
import {
  PROFILE_DISPLAY,
  profilePayload,
  runPowerProfile,
  type PowerProfileDeps,
} from "../src/widgets/powerProfile.js";

function makeDeps(store: ProfileStore) {
  const out: string[] = [];
  const logs: Array<{ level: LogLevel; label: string; detail: string }> = [];
  const bar = new MemoryBarHost();
  const notifier = new MemoryNotifier();
  const deps: PowerProfileDeps = {
    store,
    bar,
    notifier,
    out: (chunk) => out.push(chunk),
    log: (level, label, detail) => logs.push({ level, label, detail }),
    syncKey: "power-profile",
    urgency: "low",
  };
  return { deps, out, logs, bar, notifier };
}

describe("power profile widget", () => {
  test("maps each known profile to its glyph and label", () => {
    expect(profilePayload({ kind: "known", name: "Balanced" })).toEqual({
      text: PROFILE_DISPLAY.Balanced.glyph,
      tooltip: "Balanced",
    });
    expect(profilePayload({ kind: "known", name: "Performance" }).tooltip).toBe("Performance");
    expect(profilePayload({ kind: "known", name: "Quiet" }).tooltip).toBe("Quiet");
    expect(profilePayload({ kind: "unknown", raw: "Turbo" })).toEqual({ text: "", tooltip: "" });
  });

  test("status prints one payload line and has no side effects", async () => {
    const store = new MemoryProfileStore(["Quiet"]);
    const { deps, out, bar, notifier } = makeDeps(store);

    await runPowerProfile("status", deps);

    expect(out).toEqual([
      `{"text": "${PROFILE_DISPLAY.Quiet.glyph}", "tooltip": "Quiet"}\n`,
    ]);
    expect(store.advanceCount).toBe(0);
    expect(bar.refreshCount).toBe(0);
    expect(notifier.sent).toHaveLength(0);
  });

  test("unknown profile names print empty fields", async () => {
    const { deps, out } = makeDeps(new MemoryProfileStore(["LowPower"]));
    await runPowerProfile("status", deps);
    expect(out).toEqual(['{"text": "", "tooltip": ""}\n']);
  });

  test("next prints the stale profile, then advances, refreshes and notifies", async () => {
    const store = new MemoryProfileStore(["Balanced", "Performance", "Quiet"]);
    const { deps, out, bar, notifier } = makeDeps(store);

    await runPowerProfile("next", deps);

    expect(out).toEqual([
      `{"text": "${PROFILE_DISPLAY.Balanced.glyph}", "tooltip": "Balanced"}\n`,
    ]);
    expect(store.advanceCount).toBe(1);
    expect(bar.refreshCount).toBe(1);
    expect(notifier.sent).toEqual([
      { title: "Performance Power Profile", urgency: "low", syncKey: "power-profile" },
    ]);
  });

  test("a dead daemon still yields an empty payload and warnings only", async () => {
    const store = new MemoryProfileStore(["Balanced"], false);
    const { deps, out, logs, notifier } = makeDeps(store);

    await runPowerProfile("next", deps);

    expect(out).toEqual(['{"text": "", "tooltip": ""}\n']);
    expect(notifier.sent[0]?.title).toBe(" Power Profile");
    // current, advance and the re-query each fail.
    expect(logs.filter((l) => l.level === "warn")).toHaveLength(3);
  });

  test("keeps going when the advance command fails", async () => {
    const store: ProfileStore = {
      async current(): Promise<Result<string>> {
        return ok("Quiet");
      },
      async advance(): Promise<Result<void>> {
        return fail({ type: "command-failed", command: "asusctl profile -n", message: "denied" });
      },
    };
    const { deps, logs, bar, notifier } = makeDeps(store);

    await runPowerProfile("next", deps);

    expect(logs).toEqual([
      { level: "warn", label: "asusctl profile -n", detail: "command-failed: denied" },
    ]);
    expect(bar.refreshCount).toBe(1);
    expect(notifier.sent[0]?.title).toBe("Quiet Power Profile");
  });
});
