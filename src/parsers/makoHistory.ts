import { z } from "zod";

import type { HistorySnapshot, NotificationRecord, Result } from "../types.js";

// makoctl serializes D-Bus variants as { type, data }.
const MakoStringSchema = z.object({
  type: z.string().optional(),
  data: z.string(),
});

// Fields are validated one by one: a malformed body must not blank the summary.
const MakoFieldSchema = MakoStringSchema.optional().catch(undefined);

const MakoRecordSchema = z.object({
  summary: MakoFieldSchema,
  body: MakoFieldSchema,
  "app-icon": MakoFieldSchema,
});

const MakoHistorySchema = z.object({
  type: z.string().optional(),
  data: z.array(z.array(z.unknown())),
});

export function projectRecord(raw: unknown): NotificationRecord {
  const parsed = MakoRecordSchema.safeParse(raw);
  if (!parsed.success) return { summary: "", body: "", appIcon: "" };
  return {
    summary: parsed.data.summary?.data ?? "",
    body: parsed.data.body?.data ?? "",
    appIcon: parsed.data["app-icon"]?.data ?? "",
  };
}

export function parseMakoHistory(raw: string, command = "makoctl history"): Result<HistorySnapshot> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: { type: "invalid-response", command, message: `history is not JSON: ${msg}` },
    };
  }

  const parsed = MakoHistorySchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        type: "invalid-response",
        command,
        message: parsed.error.issues[0]?.message ?? "unexpected history shape",
      },
    };
  }

  const group = parsed.data.data[0];
  return {
    ok: true,
    value: {
      raw,
      records: group ? group.map(projectRecord) : null,
    },
  };
}
