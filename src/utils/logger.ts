import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';
import { PinoPretty } from 'pino-pretty';
import { LogLevel } from '../config/schema.js';
import { LinespamError } from './errors.js';

export type Logger = PinoLogger;

export interface LoggingOptions {
  level?: LogLevel;
  /** Raw JSON records go here instead of the pretty stderr stream. */
  destination?: DestinationStream;
}

// Process-wide root logger, set once by configureLogging()
let rootLogger: Logger | null = null;

function createPrettyStream(): DestinationStream {
  return PinoPretty({
    colorize: Boolean(process.stderr.isTTY),
    translateTime: 'SYS:yyyy-mm-dd,HH:MM:ss',
    ignore: 'pid,hostname',
    destination: 2,
    sync: true
  });
}

export function configureLogging(options: LoggingOptions = {}): Logger {
  if (rootLogger) {
    throw new LinespamError('Logging is already configured', 'LOGGING_CONFIGURED');
  }

  rootLogger = pino(
    {
      level: options.level ?? 'info',
      base: { pid: process.pid }
    },
    options.destination ?? createPrettyStream()
  );

  return rootLogger;
}

export function createLogger(name: string): Logger {
  const root = rootLogger ?? configureLogging();
  return root.child({ name });
}
