/**
 * WorkerPool against real forked worker processes
 */

import { describe, it, expect } from 'vitest';
import { WorkerPool } from '../../src/workers/worker-pool.js';
import { createCapturingLogger } from '../helpers/log-capture.js';

describe('WorkerPool with forked workers', () => {
  it('should collect a result from each worker process', async () => {
    const { logger, records } = createCapturingLogger('debug');
    // Silent workers keep their lines out of the test output; they still count them
    const pool = new WorkerPool({ lineLength: 100, logLevel: 'silent', logger });

    const summary = await pool.fanOut(2, 4);

    expect(summary.failed).toBe(0);
    expect(summary.totalLines).toBe(8);
    for (const outcome of summary.outcomes) {
      expect(outcome).toMatchObject({ success: true, exitCode: 0, signal: null, linesEmitted: 4 });
      expect(Number.isInteger(outcome.pid)).toBe(true);
    }

    const pids = summary.outcomes.map((outcome) => outcome.pid);
    expect(new Set(pids).size).toBe(2);
    expect(pids).not.toContain(process.pid);

    const spawned = records.filter((record) => record.msg === 'Worker spawned').map((record) => record.workerPid);
    expect(spawned).toEqual(pids);
  }, 30000);
});
