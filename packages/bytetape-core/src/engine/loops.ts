/**
 * Static loop matching
 *
 * Pairs every '[' with its ']' in one forward scan, ahead of execution.
 * The machine does not need this; it lets a caller reject unbalanced
 * programs before running them.
 */

import type { Program } from './program.js';
import { InstructionKind } from './insn.js';
import { UnmatchedLoopBeginError, UnmatchedLoopEndError } from './errors.js';

export class LoopTable {
  constructor(private readonly partners: ReadonlyMap<number, number>) {}

  /**
   * Position of the bracket matching the one at `position`, or null if
   * there is no bracket there
   */
  partner(position: number): number | null {
    return this.partners.get(position) ?? null;
  }

  /** Number of matched loops */
  get size(): number {
    return this.partners.size / 2;
  }
}

/**
 * Match every loop in the program.
 *
 * Throws UnmatchedLoopEndError for the first ']' with nothing open, or
 * UnmatchedLoopBeginError listing every '[' still open at the end.
 */
export function matchLoops(program: Program): LoopTable {
  const partners = new Map<number, number>();
  const open: number[] = [];

  let position = 0;
  for (const insn of program) {
    if (insn.kind === InstructionKind.LoopBegin) {
      open.push(position);
    } else if (insn.kind === InstructionKind.LoopEnd) {
      const begin = open.pop();
      if (begin === undefined) {
        throw new UnmatchedLoopEndError(position);
      }
      partners.set(begin, position);
      partners.set(position, begin);
    }
    position++;
  }

  if (open.length > 0) {
    throw new UnmatchedLoopBeginError(open);
  }

  return new LoopTable(partners);
}
