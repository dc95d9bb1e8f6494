import { customAlphabet } from 'nanoid';

export const RANDOM_LINE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const RANDOM_LINE_LENGTH = 100;

export type RandomLine = string;

const generate = customAlphabet(RANDOM_LINE_ALPHABET, RANDOM_LINE_LENGTH);

/**
 * Build a string of `length` characters drawn uniformly, with replacement,
 * from A-Z and 0-9. Non-positive and non-finite lengths give an empty string.
 */
export function makeRandomLine(length: number = RANDOM_LINE_LENGTH): RandomLine {
  const size = Math.floor(length);
  // nanoid always emits at least one character, even for size 0,
  // and never returns for an infinite size
  if (!Number.isFinite(size) || size <= 0) {
    return '';
  }
  return generate(size);
}
