/**
 * linespam - fan out worker processes that write random log lines
 *
 * Programmatic entry point. For CLI usage, see cli.ts
 */
export {
  WorkerPool,
  forkWorker,
  type WorkerPoolConfig,
  type WorkerHandle,
  type WorkerLaunch,
  type WorkerSpawner,
  type WorkerOutcome,
  type FanOutSummary
} from './workers/worker-pool.js';
export { emitLines, type EmitLinesOptions } from './workers/worker.js';
export {
  makeRandomLine,
  RANDOM_LINE_ALPHABET,
  RANDOM_LINE_LENGTH,
  type RandomLine
} from './generators/random-line.js';
export {
  loadConfig,
  parseRunInput,
  loadWorkerEnv,
  type Config,
  type LogLevel,
  type RunInput,
  type WorkerEnv,
  type WorkerMessage
} from './config/index.js';
export { configureLogging, createLogger, type Logger, type LoggingOptions } from './utils/logger.js';
export { LinespamError, InvalidInputError, WorkerError } from './utils/errors.js';
