/**
 * Program - the immutable decoded instruction sequence
 */

import type { Insn, InstructionKind } from './insn.js';
import { decodeAll, encode } from './decoder.js';

export class Program {
  private readonly instructions: readonly Insn[];

  constructor(instructions: readonly Insn[]) {
    this.instructions = Object.freeze([...instructions]);
  }

  /**
   * Decode raw source bytes
   */
  static fromBytes(bytes: Uint8Array): Program {
    return new Program(decodeAll(bytes));
  }

  /**
   * Decode source text, one byte per character (latin1)
   */
  static fromSource(source: string): Program {
    return Program.fromBytes(Buffer.from(source, 'latin1'));
  }

  get length(): number {
    return this.instructions.length;
  }

  /**
   * Instruction at index, or undefined past either end
   */
  at(index: number): Insn | undefined {
    if (index < 0 || index >= this.instructions.length) {
      return undefined;
    }
    return this.instructions[index];
  }

  kinds(): InstructionKind[] {
    return this.instructions.map((insn) => insn.kind);
  }

  [Symbol.iterator](): Iterator<Insn> {
    return this.instructions[Symbol.iterator]();
  }

  /**
   * Canonical source bytes; comments come back as spaces
   */
  encode(): Uint8Array {
    return Uint8Array.from(this.instructions, encode);
  }

  toSource(): string {
    return Buffer.from(this.encode()).toString('latin1');
  }
}
