import { runCommand, type CommandRunner } from "../exec.js";
import { ok, type Result } from "../types.js";
import type { Picker } from "./client.js";

export type WofiOptions = {
  prompt: string;
  width: number;
  height: number;
};

export function wofiArgs(opts: WofiOptions): string[] {
  return [
    "--dmenu",
    "--prompt",
    opts.prompt,
    "--width",
    String(opts.width),
    "--height",
    String(opts.height),
    "--allow-images",
    "--cache-file",
    "/dev/null",
  ];
}

export class WofiPicker implements Picker {
  constructor(
    private readonly opts: WofiOptions,
    private readonly command = "wofi",
    private readonly run: CommandRunner = runCommand
  ) {}

  async pick(lines: string[]): Promise<Result<string | null>> {
    // wofi exits non-zero when dismissed; that is "no selection", not an error.
    const res = await this.run(this.command, wofiArgs(this.opts), {
      input: `${lines.join("\n")}\n`,
      allowNonZero: true,
    });
    if (!res.ok) return res;
    const selection = res.value.stdout.replace(/\r?\n$/, "");
    return ok(selection === "" ? null : selection);
  }
}
