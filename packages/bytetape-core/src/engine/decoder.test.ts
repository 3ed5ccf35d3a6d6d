/**
 * Decoder tests
 */

import { describe, it, expect } from 'vitest';
import { decode, decodeAll, encode, instructionFor } from './decoder';
import { InstructionKind, theCommentInsn, theLoopBeginInsn } from './insn';

const recognised: Array<[string, InstructionKind]> = [
  ['>', InstructionKind.PointerIncrement],
  ['<', InstructionKind.PointerDecrement],
  ['+', InstructionKind.ValueIncrement],
  ['-', InstructionKind.ValueDecrement],
  ['[', InstructionKind.LoopBegin],
  [']', InstructionKind.LoopEnd],
  [',', InstructionKind.ReadByte],
  ['.', InstructionKind.WriteByte],
];

describe('Decoder', () => {
  it.each(recognised)('should decode %s as %s', (char, kind) => {
    expect(decode(char.charCodeAt(0)).kind).toBe(kind);
  });

  it('should decode every other byte as a comment', () => {
    const commands = new Set(recognised.map(([char]) => char.charCodeAt(0)));
    for (let byte = 0; byte < 256; byte++) {
      if (!commands.has(byte)) {
        expect(decode(byte)).toBe(theCommentInsn);
      }
    }
  });

  it.each([256, 318, -1, 62.5, Number.NaN])('should reject %s as not a byte', (value) => {
    expect(() => decode(value)).toThrow(RangeError);
  });

  it('should return the shared instance for a kind', () => {
    expect(decode(0x5b)).toBe(theLoopBeginInsn);
    expect(decode(0x5b)).toBe(decode(0x5b));
  });

  it('should decode a byte sequence in order', () => {
    const bytes = Uint8Array.from([0x2b, 0x61, 0x5b, 0x2e]);
    expect(decodeAll(bytes).map((insn) => insn.kind)).toEqual([
      InstructionKind.ValueIncrement,
      InstructionKind.Comment,
      InstructionKind.LoopBegin,
      InstructionKind.WriteByte,
    ]);
  });

  it('should decode an empty sequence to no instructions', () => {
    expect(decodeAll(new Uint8Array(0))).toEqual([]);
  });

  it('should encode recognised instructions back to their source byte', () => {
    for (const [char, kind] of recognised) {
      const insn = instructionFor(kind);
      expect(encode(insn)).toBe(char.charCodeAt(0));
      expect(decode(encode(insn))).toBe(insn);
    }
  });

  it('should encode a comment as a space', () => {
    expect(encode(decode(0x7a))).toBe(0x20);
    expect(decode(encode(theCommentInsn))).toBe(theCommentInsn);
  });
});
