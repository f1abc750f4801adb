import { describe, expect, test } from "vitest";

import { joinTooltip, pickerLine, renderPayload, stripPickerPrefix } from "../src/output.js";

describe("output helpers", () => {
  test("renders payloads with spaced separators in key order", () => {
    expect(renderPayload({ text: "3", tooltip: "3 notifications in history", alt: "notification" })).toBe(
      '{"text": "3", "tooltip": "3 notifications in history", "alt": "notification"}'
    );
    expect(renderPayload({ text: "", tooltip: "" })).toBe('{"text": "", "tooltip": ""}');
  });

  test("escapes quotes inside values", () => {
    expect(renderPayload({ text: 'a"b', tooltip: "" })).toBe('{"text": "a\\"b", "tooltip": ""}');
  });

  test("joins at most five summaries with a literal backslash-n", () => {
    expect(joinTooltip(["A", "B", "C", "D", "E", "F"])).toBe("A\\nB\\nC\\nD\\nE");
    expect(joinTooltip(["only"])).toBe("only");
  });

  test("recovers the summary from a picker line whatever the icon", () => {
    expect(stripPickerPrefix(pickerLine("mail-unread", "New mail"))).toBe("New mail");
    expect(stripPickerPrefix(pickerLine("", "New mail"))).toBe("New mail");
    expect(stripPickerPrefix(pickerLine("icon", "tab\tinside"))).toBe("tab\tinside");
  });

  test("keeps a selection without a tab as is", () => {
    expect(stripPickerPrefix("typed text")).toBe("typed text");
  });
});
