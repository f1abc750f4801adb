import { runCommand, type CommandRunner } from "../exec.js";
import { ok, type Result } from "../types.js";
import type { BarHost } from "./client.js";

export type SignalBarOptions = {
  processName: string;
  refreshSignal: number;
};

/** Asks the bar to re-run its custom modules by sending SIGRTMIN+n. */
export class SignalBarHost implements BarHost {
  constructor(
    private readonly opts: SignalBarOptions,
    private readonly command = "pkill",
    private readonly run: CommandRunner = runCommand
  ) {}

  async refresh(): Promise<Result<void>> {
    const res = await this.run(this.command, [
      `-RTMIN+${this.opts.refreshSignal}`,
      this.opts.processName,
    ]);
    if (!res.ok) return res;
    return ok(undefined);
  }
}
