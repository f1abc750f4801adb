import { runCommand, type CommandRunner } from "../exec.js";
import { parseMakoHistory } from "../parsers/makoHistory.js";
import type { HistorySnapshot, Result } from "../types.js";
import type { HistoryStore } from "./client.js";

export class MakoHistoryStore implements HistoryStore {
  constructor(
    private readonly command = "makoctl",
    private readonly run: CommandRunner = runCommand
  ) {}

  async probe(): Promise<boolean> {
    const res = await this.run(this.command, ["history"]);
    return res.ok;
  }

  async fetch(): Promise<Result<HistorySnapshot>> {
    const res = await this.run(this.command, ["history"]);
    if (!res.ok) return res;
    return parseMakoHistory(res.value.stdout, `${this.command} history`);
  }
}
