#!/usr/bin/env npx tsx
/**
 * Programmatic API example
 *
 * Runs a fan-out from code instead of the CLI and prints a per-worker table.
 *
 * Usage:
 *   LOG_LEVEL=debug npx tsx examples/programmatic-api.ts
 */

import { loadConfig } from '../src/config/index.js';
import { RANDOM_LINE_LENGTH } from '../src/generators/random-line.js';
import { configureLogging } from '../src/utils/logger.js';
import { WorkerPool } from '../src/workers/worker-pool.js';

async function main() {
  const config = loadConfig();
  configureLogging({ level: config.logLevel });

  const pool = new WorkerPool({ lineLength: RANDOM_LINE_LENGTH, logLevel: config.logLevel });
  const summary = await pool.fanOut(3, 5);

  console.table(
    summary.outcomes.map((outcome) => ({
      worker: outcome.workerId,
      pid: outcome.pid,
      lines: outcome.linesEmitted,
      exit: outcome.exitCode,
      ok: outcome.success
    }))
  );
  console.log(`${summary.totalLines} lines in ${summary.durationMs}ms`);

  process.exit(summary.failed > 0 ? 1 : 0);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
