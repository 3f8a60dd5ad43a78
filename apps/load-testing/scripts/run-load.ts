/**
 * ─────────────────────────────────────────────────────────
 * Drives the API with the phased load script so a profiler
 * has steady, mixed traffic to sample.
 *
 * Usage:
 *   npm run load
 *   BASE_URL=http://api:8000 LOAD_DURATION_S=120 npm run load
 * ─────────────────────────────────────────────────────────
 */

import "dotenv/config";
import { ApiClient } from "../src/client";
import { loadHarnessConfig } from "../src/config";
import { logger } from "../src/logger";
import { runLoadScript } from "../src/orchestrator";

async function main() {
  const config = loadHarnessConfig();
  logger.info({ target: config.baseUrl, ...config.script }, "Starting load script");

  const report = await runLoadScript(new ApiClient(config.baseUrl), config.script);

  console.table(
    report.completed.map(({ phase, issued, succeeded, failed, durationMs }) => ({
      phase,
      issued,
      succeeded,
      failed,
      seconds: (durationMs / 1000).toFixed(2),
    })),
  );

  if (report.aborted) {
    logger.error({ reason: report.abortReason }, "Load script aborted");
    process.exitCode = 1;
    return;
  }
  logger.info({ iterations: report.iterations }, "Load script complete");
}

main().catch((err) => {
  logger.error({ err }, "Load script crashed");
  process.exitCode = 1;
});
