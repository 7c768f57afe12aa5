/**
 * Consult intake bot
 *
 * Registers tutoring consults from Telegram into a Google spreadsheet.
 */

import { bootstrapApplication } from "./app/bootstrap";
import { ConfigError } from "./config";

async function main(): Promise<void> {
  const app = await bootstrapApplication();

  const onSignal = (signal: NodeJS.Signals): void => {
    const ts = new Date().toISOString();
    console.log(`\n[${ts}] ========== ${signal} RECEIVED ==========`);
    app
      .shutdown()
      .then(() => {
        console.log(`[${signal}] All cleanup complete, exiting with code 0`);
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error(`[${signal}] Shutdown failed:`, error);
        process.exit(1);
      });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`[Config] ${error.message}`);
  } else {
    console.error("[STARTUP] Fatal error:", error);
  }
  process.exit(1);
});
