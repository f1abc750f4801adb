import { runCommand, type CommandRunner } from "../exec.js";
import { parseActiveProfile } from "../parsers/asusctl.js";
import { ok, type Result } from "../types.js";
import type { ProfileStore } from "./client.js";

export class AsusctlProfileStore implements ProfileStore {
  constructor(
    private readonly command = "asusctl",
    private readonly run: CommandRunner = runCommand
  ) {}

  async current(): Promise<Result<string>> {
    const res = await this.run(this.command, ["profile", "-p"]);
    if (!res.ok) return res;
    return ok(parseActiveProfile(res.value.stdout));
  }

  async advance(): Promise<Result<void>> {
    const res = await this.run(this.command, ["profile", "-n"]);
    if (!res.ok) return res;
    return ok(undefined);
  }
}
