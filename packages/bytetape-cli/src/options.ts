/**
 * Command line option parsers
 */

import { InvalidArgumentError } from 'commander';

export function parseTapeSize(value: string): number {
  const cells = Number(value);
  if (!Number.isInteger(cells) || cells <= 0) {
    throw new InvalidArgumentError('Tape size must be a positive integer.');
  }
  return cells;
}
