import "dotenv/config";

import { createServices } from "../app";
import { loadConfig } from "../config";
import { createLogger, describeError } from "../utils/log";

const log = createLogger("run_cycle");

async function main(): Promise<void> {
  const { scheduler } = createServices(loadConfig());
  const summary = await scheduler.runNow();
  log.info("single_cycle_finished", summary);
}

main().catch((error) => {
  log.critical("single_cycle_failed", { error: describeError(error) });
  process.exitCode = 1;
});
