/**
 * Deletes merged outputs older than OUTPUT_MAX_AGE_HOURS (default 24).
 * Built to `dist/cleanup.js` so cron or a container scheduler can run it
 * with plain node.
 */

import type { FastifyBaseLogger } from "fastify";
import { loadConfig, type AppConfig } from "./config";
import { createLogger } from "./lib/logger";
import { OutputStore } from "./lib/outputStore";

export async function cleanupOutputs(
  config: Pick<AppConfig, "outputDir" | "outputMaxAgeMs">,
  log: FastifyBaseLogger,
  now = Date.now(),
): Promise<string[]> {
  const store = new OutputStore(config.outputDir, { log });

  log.info({ dir: config.outputDir, maxAgeMs: config.outputMaxAgeMs }, "Scanning for expired outputs...");
  const removed = await store.sweep(config.outputMaxAgeMs, now);
  log.info({ removed }, `Removed ${removed.length} expired file(s)`);
  return removed;
}

if (require.main === module) {
  const config = loadConfig();
  const log = createLogger(config.logLevel);
  cleanupOutputs(config, log).catch((err: unknown) => {
    log.error(err, "Cleanup failed");
    process.exit(1);
  });
}
