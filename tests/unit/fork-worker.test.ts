import { describe, it, expect, vi } from 'vitest';

vi.mock('child_process', () => {
  return {
    fork: vi.fn()
  };
});

import { fork } from 'child_process';
import { forkWorker } from '../../src/workers/worker-pool.js';

describe('forkWorker', () => {
  it('should fork the worker entry point with its task in the environment', () => {
    forkWorker({ workerId: 'w1', lineCount: 3, lineLength: 100, logLevel: 'warn' });

    expect(fork).toHaveBeenCalledTimes(1);
    expect(fork).toHaveBeenCalledWith(
      expect.stringMatching(/[\\/]workers[\\/]worker-process\.ts$/),
      [],
      expect.objectContaining({
        env: expect.objectContaining({
          WORKER_ID: 'w1',
          LINE_COUNT: '3',
          LINE_LENGTH: '100',
          LOG_LEVEL: 'warn'
        }),
        execArgv: ['--import', 'tsx'],
        stdio: ['ignore', 'inherit', 'inherit', 'ipc']
      })
    );
  });
});
