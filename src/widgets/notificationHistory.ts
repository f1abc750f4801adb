import type { HistoryStore, Notifier, Picker } from "../clients/client.js";
import type { Logger, Writer } from "../log.js";
import { joinTooltip, pickerLine, renderPayload, stripPickerPrefix } from "../output.js";
import type { NotificationRecord, StatusPayload, WidgetError } from "../types.js";

export type HistoryCommand = "count" | "tooltip" | "show";

export const EMPTY_COUNT_PAYLOAD: StatusPayload = {
  text: "",
  tooltip: "No notification history",
  alt: "none",
};

export const NO_HISTORY_TITLE = "No History";
export const NO_HISTORY_BODY = "Your notification history is empty";
export const DETAIL_TITLE = "History Notification";
export const NO_DETAIL_BODY = "No additional details available";

export type NotificationHistoryDeps = {
  store: HistoryStore;
  picker: Picker;
  notifier: Notifier;
  out: Writer;
  log: Logger;
};

export function countPayload(length: number | null): StatusPayload {
  if (length == null || length <= 0) return EMPTY_COUNT_PAYLOAD;
  return {
    text: String(length),
    tooltip: `${length} notifications in history`,
    alt: "notification",
  };
}

/** First record whose summary matches exactly; collisions resolve to the earliest record. */
export function findBody(records: NotificationRecord[], summary: string): string | null {
  const match = records.find((r) => r.summary === summary);
  if (!match || match.body === "") return null;
  return match.body;
}

function warn(log: Logger, err: WidgetError): void {
  log("warn", err.command, `${err.type}: ${err.message}`);
}

async function notifyOrWarn(
  deps: NotificationHistoryDeps,
  title: string,
  body: string
): Promise<void> {
  const res = await deps.notifier.notify({ title, body });
  if (!res.ok) warn(deps.log, res.error);
}

async function runCount(deps: NotificationHistoryDeps): Promise<void> {
  if (!(await deps.store.probe())) {
    deps.out(`${renderPayload(EMPTY_COUNT_PAYLOAD)}\n`);
    return;
  }
  const res = await deps.store.fetch();
  if (!res.ok) warn(deps.log, res.error);
  const length = res.ok ? (res.value.records?.length ?? null) : null;
  deps.out(`${renderPayload(countPayload(length))}\n`);
}

async function runTooltip(deps: NotificationHistoryDeps): Promise<void> {
  const res = await deps.store.fetch();
  if (!res.ok) {
    warn(deps.log, res.error);
    return;
  }
  const summaries = (res.value.records ?? []).map((r) => r.summary);
  if (summaries.length === 0) return;
  deps.out(`${joinTooltip(summaries)}\n`);
}

async function runShow(deps: NotificationHistoryDeps): Promise<void> {
  if (!(await deps.store.probe())) {
    await notifyOrWarn(deps, NO_HISTORY_TITLE, NO_HISTORY_BODY);
    return;
  }

  const res = await deps.store.fetch();
  if (!res.ok) warn(deps.log, res.error);
  const records = res.ok ? (res.value.records ?? []) : [];
  deps.log("debug", "history", res.ok ? res.value.raw : "");

  if (records.length === 0) {
    await notifyOrWarn(deps, NO_HISTORY_TITLE, NO_HISTORY_BODY);
    return;
  }

  const lines = records.map((r) => pickerLine(r.appIcon, r.summary));
  deps.log("debug", "picker input", JSON.stringify(lines.join("\n")));

  const picked = await deps.picker.pick(lines);
  if (!picked.ok) {
    warn(deps.log, picked.error);
    return;
  }
  if (picked.value === null) return;

  const body = findBody(records, stripPickerPrefix(picked.value));
  await notifyOrWarn(deps, DETAIL_TITLE, body ?? NO_DETAIL_BODY);
}

export async function runNotificationHistory(
  command: HistoryCommand,
  deps: NotificationHistoryDeps
): Promise<void> {
  switch (command) {
    case "count":
      return runCount(deps);
    case "tooltip":
      return runTooltip(deps);
    case "show":
      return runShow(deps);
  }
}
