import { AsusctlProfileStore } from "../clients/asusctl.js";
import type { BarHost, HistoryStore, Notifier, Picker, ProfileStore } from "../clients/client.js";
import { MakoHistoryStore } from "../clients/mako.js";
import {
  MemoryBarHost,
  MemoryHistoryStore,
  MemoryNotifier,
  MemoryPicker,
  MemoryProfileStore,
} from "../clients/memory.js";
import { NotifySendNotifier } from "../clients/notifySend.js";
import { SignalBarHost } from "../clients/waybar.js";
import { WofiPicker } from "../clients/wofi.js";
import type { Logger } from "../log.js";
import type { Settings } from "../settings.js";

export type Backends = {
  profiles: ProfileStore;
  history: HistoryStore;
  bar: BarHost;
  picker: Picker;
  notifier: Notifier;
};

export type BackendFactory = (settings: Settings, log: Logger) => Backends;

export function defaultBackends(settings: Settings): Backends {
  return {
    profiles: new AsusctlProfileStore(settings.commands.asusctl),
    history: new MakoHistoryStore(settings.commands.makoctl),
    bar: new SignalBarHost(settings.bar, settings.commands.pkill),
    picker: new WofiPicker(settings.picker, settings.commands.picker),
    notifier: new NotifySendNotifier(settings.commands.notifySend),
  };
}

export function fixtureBackends(_settings: Settings, log: Logger): Backends {
  return {
    profiles: new MemoryProfileStore(),
    history: MemoryHistoryStore.fromSummaries([
      { summary: "Build finished", body: "bar-widgets built in 2.1s", appIcon: "utilities-terminal" },
      { summary: "Battery low", body: "15% remaining", appIcon: "battery-caution" },
      { summary: "Screenshot saved", body: "" },
    ]),
    bar: new MemoryBarHost(() => log("fixture", "bar", "refresh requested")),
    picker: new MemoryPicker(),
    notifier: new MemoryNotifier((req) =>
      log("fixture", "notify", [req.title, req.body].filter((s) => s !== undefined).join(" / "))
    ),
  };
}

export function getBackendFactory(fixtureMode: boolean): BackendFactory {
  return fixtureMode ? fixtureBackends : defaultBackends;
}
