import { spawn } from "node:child_process";

import { fail, ok, type Result, type WidgetError } from "./types.js";

export type CommandOutput = {
  stdout: string;
  stderr: string;
  exitCode: number | null;
};

export type RunOptions = {
  input?: string;
  // Non-zero exits are failures unless the caller wants to inspect them.
  allowNonZero?: boolean;
};

export type CommandRunner = (
  command: string,
  args: string[],
  opts?: RunOptions
) => Promise<Result<CommandOutput>>;

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

function toSpawnError(display: string, err: unknown): WidgetError {
  const msg = err instanceof Error ? err.message : String(err);
  const lowered = msg.toLowerCase();
  return {
    type: lowered.includes("enoent") || lowered.includes("not found") ? "not-installed" : "unexpected",
    command: display,
    message: msg,
  };
}

export const runCommand: CommandRunner = (command, args, opts = {}) => {
  const display = describeCommand(command, args);

  return new Promise<Result<CommandOutput>>((resolve) => {
    let settled = false;
    const settle = (res: Result<CommandOutput>) => {
      if (settled) return;
      settled = true;
      resolve(res);
    };

    let proc: ReturnType<typeof spawn>;
    try {
      proc = spawn(command, args, {
        stdio: [opts.input != null ? "pipe" : "ignore", "pipe", "pipe"],
        env: process.env,
      });
    } catch (err) {
      settle(fail(toSpawnError(display, err)));
      return;
    }

    let stdout = "";
    let stderr = "";
    let stdinError: string | null = null;
    proc.stdout?.setEncoding("utf8");
    proc.stderr?.setEncoding("utf8");
    proc.stdout?.on("data", (d: string) => {
      stdout += d;
    });
    proc.stderr?.on("data", (d: string) => {
      stderr += d;
    });

    proc.once("error", (err) => {
      settle(fail(toSpawnError(display, err)));
    });

    proc.once("close", (code) => {
      if (code !== 0 && !opts.allowNonZero) {
        const detail =
          stderr.trim() || stdinError || `exited with code ${String(code)}`;
        settle(fail({ type: "command-failed", command: display, message: detail }));
        return;
      }
      settle(ok({ stdout, stderr, exitCode: code }));
    });

    if (opts.input != null && proc.stdin) {
      // The picker may exit before reading everything (EPIPE); "close" still settles.
      proc.stdin.on("error", (err) => {
        stdinError = err.message;
      });
      proc.stdin.end(opts.input);
    }
  });
};
