/**
 * Instruction set
 *
 * Each source byte decodes to one of nine instructions. Every kind has a
 * single shared instance, so decoded sequences can be compared by identity.
 * An instruction mutates the machine through its public operations and
 * throws an InterpreterError if it cannot complete; the machine advances the
 * instruction pointer afterwards.
 */

import type { Machine } from './machine.js';

export enum InstructionKind {
  PointerIncrement = 'PointerIncrement',
  PointerDecrement = 'PointerDecrement',
  ValueIncrement = 'ValueIncrement',
  ValueDecrement = 'ValueDecrement',
  LoopBegin = 'LoopBegin',
  LoopEnd = 'LoopEnd',
  ReadByte = 'ReadByte',
  WriteByte = 'WriteByte',
  Comment = 'Comment',
}

/**
 * Base class for all instructions
 */
export abstract class Insn {
  abstract readonly kind: InstructionKind;

  /** Canonical source byte for this instruction */
  abstract readonly byte: number;

  /**
   * Execute this instruction against the machine
   *
   * Throws without touching machine state if the instruction faults.
   */
  abstract execute(machine: Machine): void;
}

/** '>' */
export class PointerIncrementInsn extends Insn {
  readonly kind = InstructionKind.PointerIncrement;
  readonly byte = 0x3e;

  execute(machine: Machine): void {
    machine.movePointer(1);
  }
}

/** '<' */
export class PointerDecrementInsn extends Insn {
  readonly kind = InstructionKind.PointerDecrement;
  readonly byte = 0x3c;

  execute(machine: Machine): void {
    machine.movePointer(-1);
  }
}

/** '+' */
export class ValueIncrementInsn extends Insn {
  readonly kind = InstructionKind.ValueIncrement;
  readonly byte = 0x2b;

  execute(machine: Machine): void {
    machine.adjustCell(1);
  }
}

/** '-' */
export class ValueDecrementInsn extends Insn {
  readonly kind = InstructionKind.ValueDecrement;
  readonly byte = 0x2d;

  execute(machine: Machine): void {
    machine.adjustCell(-1);
  }
}

/**
 * '[' - records its own position as an open loop.
 *
 * The body is always entered; the test happens at the matching ']'.
 */
export class LoopBeginInsn extends Insn {
  readonly kind = InstructionKind.LoopBegin;
  readonly byte = 0x5b;

  execute(machine: Machine): void {
    machine.openLoop();
  }
}

/**
 * ']' - closes the innermost open loop, jumping back while the
 * current cell is non-zero
 */
export class LoopEndInsn extends Insn {
  readonly kind = InstructionKind.LoopEnd;
  readonly byte = 0x5d;

  execute(machine: Machine): void {
    machine.closeLoop();
  }
}

/** ',' */
export class ReadByteInsn extends Insn {
  readonly kind = InstructionKind.ReadByte;
  readonly byte = 0x2c;

  execute(machine: Machine): void {
    machine.readInput();
  }
}

/** '.' */
export class WriteByteInsn extends Insn {
  readonly kind = InstructionKind.WriteByte;
  readonly byte = 0x2e;

  execute(machine: Machine): void {
    machine.writeOutput();
  }
}

/**
 * Any other byte. Encodes back as a space.
 */
export class CommentInsn extends Insn {
  readonly kind = InstructionKind.Comment;
  readonly byte = 0x20;

  execute(_machine: Machine): void {
    // no-op
  }
}

export const thePointerIncrementInsn = new PointerIncrementInsn();
export const thePointerDecrementInsn = new PointerDecrementInsn();
export const theValueIncrementInsn = new ValueIncrementInsn();
export const theValueDecrementInsn = new ValueDecrementInsn();
export const theLoopBeginInsn = new LoopBeginInsn();
export const theLoopEndInsn = new LoopEndInsn();
export const theReadByteInsn = new ReadByteInsn();
export const theWriteByteInsn = new WriteByteInsn();
export const theCommentInsn = new CommentInsn();
