import type { StatusPayload } from "./types.js";

export const TOOLTIP_LIMIT = 5;

// Waybar reads one JSON object per line; keep the `"key": "value", ...` spacing stable.
export function renderPayload(payload: StatusPayload): string {
  const entries: Array<[string, string]> = [
    ["text", payload.text],
    ["tooltip", payload.tooltip],
  ];
  if (payload.alt !== undefined) entries.push(["alt", payload.alt]);
  const body = entries.map(([k, v]) => `${JSON.stringify(k)}: ${JSON.stringify(v)}`).join(", ");
  return `{${body}}`;
}

// The separator is a literal backslash + "n" so the line can be embedded in a tooltip field.
export function joinTooltip(summaries: string[], limit = TOOLTIP_LIMIT): string {
  return summaries.slice(0, limit).join("\\n");
}

export function pickerLine(appIcon: string, summary: string): string {
  return `${appIcon}\t${summary}`;
}

export function stripPickerPrefix(selection: string): string {
  const tab = selection.indexOf("\t");
  if (tab < 0) return selection;
  return selection.slice(tab + 1);
}
