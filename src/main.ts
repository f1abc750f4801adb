import { getBackendFactory, type BackendFactory } from "./core/backends.js";
import { createStderrLogger, stdoutWriter, type Logger, type Writer } from "./log.js";
import { isFixtureMode, loadSettings, type Settings } from "./settings.js";
import {
  runNotificationHistory,
  type HistoryCommand,
} from "./widgets/notificationHistory.js";
import { runPowerProfile, type PowerProfileAction } from "./widgets/powerProfile.js";

export type MainContext = {
  settings: Settings;
  backends: BackendFactory;
  out: Writer;
  log: Logger;
};

export async function createContext(env: NodeJS.ProcessEnv = process.env): Promise<MainContext> {
  return {
    settings: await loadSettings(env),
    backends: getBackendFactory(isFixtureMode(env)),
    out: stdoutWriter,
    log: createStderrLogger(),
  };
}

// Any argument other than "next" is a plain status poll.
export function parsePowerProfileArgs(argv: string[]): PowerProfileAction {
  return argv[0] === "next" ? "next" : "status";
}

export function parseHistoryArgs(argv: string[]): HistoryCommand | null {
  const a = argv[0];
  if (a === "count" || a === "tooltip" || a === "show") return a;
  return null;
}

export async function runPowerProfileMain(argv: string[], ctx: MainContext): Promise<void> {
  const backends = ctx.backends(ctx.settings, ctx.log);
  await runPowerProfile(parsePowerProfileArgs(argv), {
    store: backends.profiles,
    bar: backends.bar,
    notifier: backends.notifier,
    out: ctx.out,
    log: ctx.log,
    syncKey: ctx.settings.power.syncKey,
    urgency: ctx.settings.power.urgency,
  });
}

export async function runNotificationHistoryMain(argv: string[], ctx: MainContext): Promise<void> {
  const command = parseHistoryArgs(argv);
  if (!command) return;
  const backends = ctx.backends(ctx.settings, ctx.log);
  await runNotificationHistory(command, {
    store: backends.history,
    picker: backends.picker,
    notifier: backends.notifier,
    out: ctx.out,
    log: ctx.log,
  });
}
