import type { HistorySnapshot, Result, Urgency } from "../types.js";

export interface ProfileStore {
  /** Raw active profile name as reported by the daemon. */
  current(): Promise<Result<string>>;
  advance(): Promise<Result<void>>;
}

export interface HistoryStore {
  /** Liveness check; true when the history can be queried at all. */
  probe(): Promise<boolean>;
  fetch(): Promise<Result<HistorySnapshot>>;
}

export interface BarHost {
  refresh(): Promise<Result<void>>;
}

export interface Picker {
  /** Resolves to the chosen line, or null when the picker was dismissed. */
  pick(lines: string[]): Promise<Result<string | null>>;
}

export type NotificationRequest = {
  title: string;
  body?: string;
  urgency?: Urgency;
  // Notifications sharing a key replace each other instead of stacking.
  syncKey?: string;
};

export interface Notifier {
  notify(req: NotificationRequest): Promise<Result<void>>;
}
