export type ProfileName = "Balanced" | "Performance" | "Quiet";

export type ProfileReading =
  | { kind: "known"; name: ProfileName }
  | { kind: "unknown"; raw: string };

export type StatusPayload = {
  text: string;
  tooltip: string;
  alt?: string;
};

export type NotificationRecord = {
  summary: string;
  body: string;
  appIcon: string;
};

export type HistorySnapshot = {
  raw: string;
  // null when the daemon reports no history group at all.
  records: NotificationRecord[] | null;
};

export type Urgency = "low" | "normal" | "critical";

export type WidgetErrorType =
  | "not-installed"
  | "command-failed"
  | "invalid-response"
  | "unexpected";

export type WidgetError = {
  type: WidgetErrorType;
  command: string;
  message: string;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: WidgetError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: WidgetError): Result<T> {
  return { ok: false, error };
}
