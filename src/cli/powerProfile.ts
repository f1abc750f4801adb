import { createContext, runPowerProfileMain } from "../main.js";

// Exit 0 on every path: a widget that fails must not break the bar.
async function main(): Promise<void> {
  try {
    const ctx = await createContext();
    await runPowerProfileMain(process.argv.slice(2), ctx);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[error] power-profile-widget: ${msg}\n`);
  }
  process.exit(0);
}

void main();
