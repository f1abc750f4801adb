import { projectRecord } from "../parsers/makoHistory.js";
import { fail, ok, type HistorySnapshot, type Result, type WidgetError } from "../types.js";
import type {
  BarHost,
  HistoryStore,
  NotificationRequest,
  Notifier,
  Picker,
  ProfileStore,
} from "./client.js";

const OFFLINE: WidgetError = {
  type: "not-installed",
  command: "memory",
  message: "daemon offline",
};

/** Cycles through a fixed profile list the way `asusctl profile -n` does. */
export class MemoryProfileStore implements ProfileStore {
  public advanceCount = 0;
  private index = 0;

  constructor(
    private readonly profiles: string[] = ["Balanced", "Performance", "Quiet"],
    private readonly online = true
  ) {}

  async current(): Promise<Result<string>> {
    if (!this.online) return fail(OFFLINE);
    return ok(this.profiles[this.index] ?? "");
  }

  async advance(): Promise<Result<void>> {
    if (!this.online) return fail(OFFLINE);
    this.advanceCount++;
    this.index = this.profiles.length === 0 ? 0 : (this.index + 1) % this.profiles.length;
    return ok(undefined);
  }
}

export type MemoryHistoryOptions = {
  online?: boolean;
  // Serialized exactly as makoctl would; records is the first history group.
  groups?: unknown[][];
};

export class MemoryHistoryStore implements HistoryStore {
  public fetchCount = 0;

  constructor(private readonly opts: MemoryHistoryOptions = {}) {}

  static fromSummaries(
    items: Array<{ summary: string; body?: string; appIcon?: string }>
  ): MemoryHistoryStore {
    return new MemoryHistoryStore({
      groups: [
        items.map((item) => ({
          summary: { type: "s", data: item.summary },
          body: { type: "s", data: item.body ?? "" },
          ...(item.appIcon !== undefined
            ? { "app-icon": { type: "s", data: item.appIcon } }
            : {}),
        })),
      ],
    });
  }

  async probe(): Promise<boolean> {
    return this.opts.online ?? true;
  }

  async fetch(): Promise<Result<HistorySnapshot>> {
    this.fetchCount++;
    if (!(this.opts.online ?? true)) return fail(OFFLINE);
    const groups = this.opts.groups ?? [[]];
    const raw = JSON.stringify({ type: "aa{sv}", data: groups });
    const first = groups[0];
    return ok({ raw, records: first ? first.map(projectRecord) : null });
  }
}

/** Chooses a line through a callback; null means the picker was dismissed. */
export class MemoryPicker implements Picker {
  public readonly calls: string[][] = [];

  constructor(private readonly choose: (lines: string[]) => string | null = (l) => l[0] ?? null) {}

  async pick(lines: string[]): Promise<Result<string | null>> {
    this.calls.push(lines);
    return ok(this.choose(lines));
  }
}

export class MemoryNotifier implements Notifier {
  public readonly sent: NotificationRequest[] = [];

  constructor(private readonly onNotify?: (req: NotificationRequest) => void) {}

  async notify(req: NotificationRequest): Promise<Result<void>> {
    this.sent.push(req);
    this.onNotify?.(req);
    return ok(undefined);
  }
}

export class MemoryBarHost implements BarHost {
  public refreshCount = 0;

  constructor(private readonly onRefresh?: () => void) {}

  async refresh(): Promise<Result<void>> {
    this.refreshCount++;
    this.onRefresh?.();
    return ok(undefined);
  }
}
