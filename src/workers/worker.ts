import { makeRandomLine } from '../generators/random-line.js';
import { Logger } from '../utils/logger.js';

export interface EmitLinesOptions {
  lineCount: number;
  lineLength: number;
  logger: Logger;
  pid?: number;
}

/**
 * Write `lineCount` info records of the form "<pid>: <random line>", in
 * generation order. Returns how many were written.
 */
export function emitLines({ lineCount, lineLength, logger, pid = process.pid }: EmitLinesOptions): number {
  let emitted = 0;

  for (let i = 0; i < lineCount; i++) {
    logger.info(`${pid}: ${makeRandomLine(lineLength)}`);
    emitted++;
  }

  return emitted;
}
