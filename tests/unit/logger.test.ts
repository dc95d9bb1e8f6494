import { describe, it, expect } from 'vitest';
import { configureLogging, createLogger } from '../../src/utils/logger.js';
import { LinespamError } from '../../src/utils/errors.js';
import { createLogCapture } from '../helpers/log-capture.js';

// Logging state is process-wide, so these run in order against one root
describe('logging', () => {
  const capture = createLogCapture();

  it('should route named child loggers through the configured root', () => {
    configureLogging({ level: 'debug', destination: capture.destination });

    const logger = createLogger('emit-lines');
    logger.info('123: ABC');
    logger.debug('spawned');
    logger.trace('hidden');

    expect(capture.records).toHaveLength(2);
    expect(capture.records[0]).toMatchObject({ level: 30, name: 'emit-lines', msg: '123: ABC', pid: process.pid });
    expect(capture.records[1]).toMatchObject({ level: 20, name: 'emit-lines', msg: 'spawned' });
  });

  it('should refuse to be configured twice', () => {
    try {
      configureLogging({ level: 'info', destination: capture.destination });
      expect.unreachable('expected configureLogging to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(LinespamError);
      if (error instanceof LinespamError) {
        expect(error.code).toBe('LOGGING_CONFIGURED');
        expect(error.message).toBe('Logging is already configured');
      }
    }
  });

  it('should leave the first configuration in place', () => {
    createLogger('worker-pool').debug('still debug');
    expect(capture.records.at(-1)).toMatchObject({ level: 20, name: 'worker-pool', msg: 'still debug' });
  });
});
