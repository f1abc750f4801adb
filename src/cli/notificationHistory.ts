import { createContext, runNotificationHistoryMain } from "../main.js";

async function main(): Promise<void> {
  try {
    const ctx = await createContext();
    await runNotificationHistoryMain(process.argv.slice(2), ctx);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[error] notification-history-widget: ${msg}\n`);
  }
  process.exit(0);
}

void main();
