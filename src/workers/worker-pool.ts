import { fork } from 'child_process';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { nanoid } from 'nanoid';
import { LogLevel, WorkerMessageSchema } from '../config/schema.js';
import { createLogger, Logger } from '../utils/logger.js';
import { InvalidInputError, WorkerError } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Running from sources (tsx, vitest) the entry point is a .ts file
const runningFromSource = __filename.endsWith('.ts');

/**
 * The slice of a spawned process the pool relies on. ChildProcess satisfies it.
 */
export interface WorkerHandle {
  readonly pid?: number | undefined;
  on(event: 'message', listener: (message: unknown) => void): unknown;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface WorkerLaunch {
  workerId: string;
  lineCount: number;
  lineLength: number;
  logLevel: LogLevel;
}

export type WorkerSpawner = (launch: WorkerLaunch) => WorkerHandle;

export interface WorkerOutcome {
  workerId: string;
  pid: number | undefined;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  linesEmitted: number;
  success: boolean;
  error?: WorkerError;
}

export interface FanOutSummary {
  outcomes: WorkerOutcome[];
  totalLines: number;
  failed: number;
  durationMs: number;
}

export interface WorkerPoolConfig {
  lineLength: number;
  logLevel: LogLevel;
  spawner?: WorkerSpawner;
  logger?: Logger;
}

interface PooledWorker {
  id: string;
  exited: Promise<WorkerOutcome>;
}

/**
 * Fork the worker entry point with its task in the environment. Log lines
 * go straight to the inherited stderr; only the result comes back over IPC.
 */
export const forkWorker: WorkerSpawner = (launch) => {
  const workerPath = join(__dirname, runningFromSource ? 'worker-process.ts' : 'worker-process.js');

  return fork(workerPath, [], {
    env: {
      ...process.env,
      WORKER_ID: launch.workerId,
      LINE_COUNT: String(launch.lineCount),
      LINE_LENGTH: String(launch.lineLength),
      LOG_LEVEL: launch.logLevel
    },
    execArgv: runningFromSource ? ['--import', 'tsx'] : [],
    stdio: ['ignore', 'inherit', 'inherit', 'ipc']
  });
};

export class WorkerPool {
  private config: WorkerPoolConfig;
  private spawner: WorkerSpawner;
  private logger: Logger;

  constructor(config: WorkerPoolConfig) {
    this.config = config;
    this.spawner = config.spawner ?? forkWorker;
    this.logger = config.logger ?? createLogger('worker-pool');
  }

  /**
   * Start `workerCount` workers that each emit `linesPerWorker` lines, then
   * wait for all of them. Workers are joined in spawn order; a failed worker
   * is recorded, never retried.
   */
  async fanOut(workerCount: number, linesPerWorker: number): Promise<FanOutSummary> {
    assertCount(workerCount, 'workers');
    assertCount(linesPerWorker, 'lines');

    const startedAt = Date.now();
    const workers: PooledWorker[] = [];

    for (let i = 0; i < workerCount; i++) {
      workers.push(this.spawnWorker(linesPerWorker));
    }

    const outcomes: WorkerOutcome[] = [];
    for (const worker of workers) {
      outcomes.push(await worker.exited);
    }

    const summary: FanOutSummary = {
      outcomes,
      totalLines: outcomes.reduce((sum, outcome) => sum + outcome.linesEmitted, 0),
      failed: outcomes.filter((outcome) => !outcome.success).length,
      durationMs: Date.now() - startedAt
    };

    this.logger.debug(
      { workers: workerCount, totalLines: summary.totalLines, failed: summary.failed, durationMs: summary.durationMs },
      'Fan-out complete'
    );

    return summary;
  }

  private spawnWorker(lineCount: number): PooledWorker {
    const workerId = nanoid();

    let handle: WorkerHandle;
    try {
      handle = this.spawner({
        workerId,
        lineCount,
        lineLength: this.config.lineLength,
        logLevel: this.config.logLevel
      });
    } catch (error) {
      // Siblings already spawned must still be joined
      const cause = error instanceof Error ? error : new Error(String(error));
      const outcome = this.recordOutcome({
        workerId,
        pid: undefined,
        exitCode: null,
        signal: null,
        linesEmitted: 0,
        success: false,
        error: new WorkerError(`Worker ${workerId} failed to spawn: ${cause.message}`, workerId, error)
      });
      return { id: workerId, exited: Promise.resolve(outcome) };
    }

    // Listeners go on before anything can yield, so no exit is missed
    const exited = this.setupWorkerHandlers(workerId, handle);

    this.logger.debug({ workerId, workerPid: handle.pid, lineCount }, 'Worker spawned');

    return { id: workerId, exited };
  }

  private recordOutcome(outcome: WorkerOutcome): WorkerOutcome {
    if (!outcome.success) {
      this.logger.warn(
        {
          workerId: outcome.workerId,
          workerPid: outcome.pid,
          code: outcome.exitCode,
          signal: outcome.signal,
          error: outcome.error?.message
        },
        'Worker exited abnormally'
      );
    }
    return outcome;
  }

  private setupWorkerHandlers(workerId: string, handle: WorkerHandle): Promise<WorkerOutcome> {
    let linesEmitted: number | null = null;

    handle.on('message', (msg) => {
      const parsed = WorkerMessageSchema.safeParse(msg);
      if (!parsed.success || parsed.data.workerId !== workerId) {
        this.logger.debug({ workerId }, 'Ignoring unexpected worker message');
        return;
      }
      linesEmitted = parsed.data.linesEmitted;
    });

    return new Promise((resolve) => {
      let settled = false;

      const settle = (outcome: WorkerOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        resolve(this.recordOutcome(outcome));
      };

      // 'close' rather than 'exit': it also waits for the IPC channel to drain
      handle.on('close', (code, signal) => {
        const reported = linesEmitted !== null;
        const success = code === 0 && reported;

        this.logger.debug({ workerId, workerPid: handle.pid, code, signal }, 'Worker exited');

        settle({
          workerId,
          pid: handle.pid,
          exitCode: code,
          signal,
          linesEmitted: linesEmitted ?? 0,
          success,
          ...(success
            ? {}
            : {
                error: new WorkerError(
                  reported
                    ? `Worker ${workerId} exited with code ${String(code)}`
                    : `Worker ${workerId} exited (code ${String(code)}, signal ${String(signal)}) without reporting a result`,
                  workerId
                )
              })
        });
      });

      handle.on('error', (error) => {
        settle({
          workerId,
          pid: handle.pid,
          exitCode: null,
          signal: null,
          linesEmitted: linesEmitted ?? 0,
          success: false,
          error: new WorkerError(`Worker ${workerId} failed: ${error.message}`, workerId, error)
        });
      });
    });
  }
}

function assertCount(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(`${field} must be a non-negative integer, got ${String(value)}`, field);
  }
}
