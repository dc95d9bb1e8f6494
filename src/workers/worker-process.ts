#!/usr/bin/env node
/**
 * Worker process entry point.
 * Forked by the worker pool; writes its quota of random lines to stderr and
 * reports the count back to the parent over IPC.
 */
import { loadWorkerEnv, WorkerMessage } from '../config/index.js';
import { configureLogging, createLogger } from '../utils/logger.js';
import { emitLines } from './worker.js';

const env = loadWorkerEnv();

configureLogging({ level: env.LOG_LEVEL });
const logger = createLogger('emit-lines');

const linesEmitted = emitLines({
  lineCount: env.LINE_COUNT,
  lineLength: env.LINE_LENGTH,
  logger
});

const message: WorkerMessage = {
  type: 'result',
  workerId: env.WORKER_ID,
  pid: process.pid,
  linesEmitted
};

if (process.send) {
  process.send(message, (error: Error | null) => {
    if (error) {
      logger.error({ workerId: env.WORKER_ID, error: error.message }, 'Failed to report result');
      process.exitCode = 1;
    }
    process.disconnect();
  });
}
