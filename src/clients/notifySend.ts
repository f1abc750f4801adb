import { runCommand, type CommandRunner } from "../exec.js";
import { ok, type Result } from "../types.js";
import type { NotificationRequest, Notifier } from "./client.js";

const SYNC_HINT = "x-canonical-private-synchronous";

export function notifySendArgs(req: NotificationRequest): string[] {
  const args: string[] = [];
  if (req.urgency) args.push("-u", req.urgency);
  if (req.syncKey) args.push("-h", `string:${SYNC_HINT}:${req.syncKey}`);
  args.push(req.title);
  if (req.body !== undefined) args.push(req.body);
  return args;
}

export class NotifySendNotifier implements Notifier {
  constructor(
    private readonly command = "notify-send",
    private readonly run: CommandRunner = runCommand
  ) {}

  async notify(req: NotificationRequest): Promise<Result<void>> {
    const res = await this.run(this.command, notifySendArgs(req));
    if (!res.ok) return res;
    return ok(undefined);
  }
}
