import { InvalidInputError } from '../utils/errors.js';
import {
  Config,
  ConfigSchema,
  RunInput,
  RunInputSchema,
  WorkerEnv,
  WorkerEnvSchema
} from './schema.js';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    logLevel: env['LOG_LEVEL'] || undefined
  };

  return ConfigSchema.parse(raw);
}

/**
 * Validate the two positional CLI arguments.
 * Throws InvalidInputError naming the first offending argument.
 */
export function parseRunInput(workers: string, lines: string): RunInput {
  const result = RunInputSchema.safeParse({ workers, linesPerWorker: lines });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0] === 'linesPerWorker' ? 'lines' : 'workers';
    const value = field === 'lines' ? lines : workers;
    throw new InvalidInputError(
      `Invalid ${field} argument "${value}": ${issue?.message ?? 'expected a non-negative integer'}`,
      field
    );
  }

  return result.data;
}

export function loadWorkerEnv(env: NodeJS.ProcessEnv = process.env): WorkerEnv {
  return WorkerEnvSchema.parse({
    WORKER_ID: env['WORKER_ID'],
    LINE_COUNT: env['LINE_COUNT'],
    LINE_LENGTH: env['LINE_LENGTH'],
    LOG_LEVEL: env['LOG_LEVEL'] || undefined
  });
}

export * from './schema.js';
