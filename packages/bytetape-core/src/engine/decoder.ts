/**
 * Decoder - maps raw source bytes to instructions
 */

import {
  type Insn,
  InstructionKind,
  thePointerIncrementInsn,
  thePointerDecrementInsn,
  theValueIncrementInsn,
  theValueDecrementInsn,
  theLoopBeginInsn,
  theLoopEndInsn,
  theReadByteInsn,
  theWriteByteInsn,
  theCommentInsn,
} from './insn.js';

const instructions: readonly Insn[] = [
  thePointerIncrementInsn,
  thePointerDecrementInsn,
  theValueIncrementInsn,
  theValueDecrementInsn,
  theLoopBeginInsn,
  theLoopEndInsn,
  theReadByteInsn,
  theWriteByteInsn,
];

/** One entry per byte value; everything unrecognised is a comment */
const decodeTable: readonly Insn[] = (() => {
  const table: Insn[] = new Array<Insn>(256).fill(theCommentInsn);
  for (const insn of instructions) {
    table[insn.byte] = insn;
  }
  return table;
})();

const byKind: ReadonlyMap<InstructionKind, Insn> = new Map(
  [...instructions, theCommentInsn].map((insn): [InstructionKind, Insn] => [insn.kind, insn])
);

/**
 * Decode one byte. Total over 0-255; anything that is not a byte value
 * throws a RangeError.
 */
export function decode(byte: number): Insn {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
    throw new RangeError(`Not a byte value: ${byte}`);
  }
  return decodeTable[byte];
}

/**
 * Decode every byte in order
 */
export function decodeAll(bytes: Uint8Array): Insn[] {
  return Array.from(bytes, decode);
}

/**
 * Canonical source byte for an instruction
 */
export function encode(insn: Insn): number {
  return insn.byte;
}

/**
 * Look up the shared instruction for a kind
 */
export function instructionFor(kind: InstructionKind): Insn {
  const insn = byKind.get(kind);
  if (!insn) {
    throw new Error(`Unknown instruction kind: ${kind}`);
  }
  return insn;
}
