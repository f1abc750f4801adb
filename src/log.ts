export type LogLevel = "debug" | "warn" | "error" | "fixture";

export type Logger = (level: LogLevel, label: string, detail: string) => void;

export type Writer = (chunk: string) => void;

export const stdoutWriter: Writer = (chunk) => {
  process.stdout.write(chunk);
};

export function createStderrLogger(): Logger {
  return (level, label, detail) => {
    process.stderr.write(`[${level}] ${label}: ${detail}\n`);
  };
}
