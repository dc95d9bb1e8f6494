#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig, parseRunInput } from './config/index.js';
import { RANDOM_LINE_LENGTH } from './generators/random-line.js';
import { WorkerPool } from './workers/worker-pool.js';
import { configureLogging } from './utils/logger.js';
import { LinespamError } from './utils/errors.js';

const program = new Command();

program
  .name('linespam')
  .description('Spawn worker processes that each log lines of random alphanumeric data')
  .version('0.1.0')
  .argument('<workers>', 'Number of worker processes to spawn')
  .argument('<lines>', 'Number of lines each worker writes')
  .action(async (workersArg: string, linesArg: string) => {
    try {
      const config = loadConfig();
      configureLogging({ level: config.logLevel });

      const input = parseRunInput(workersArg, linesArg);

      const pool = new WorkerPool({
        lineLength: RANDOM_LINE_LENGTH,
        logLevel: config.logLevel
      });

      const summary = await pool.fanOut(input.workers, input.linesPerWorker);

      if (summary.failed > 0) {
        console.error(`❌ ${summary.failed} of ${summary.outcomes.length} workers failed`);
        process.exit(1);
      }
    } catch (error) {
      if (error instanceof LinespamError) {
        console.error(`❌ ${error.message}`);
      } else {
        console.error('❌ Error:', error instanceof Error ? error.message : error);
      }
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
