/**
 * bytetape core - interpreter for the eight-instruction tape language
 *
 * This is the core library containing:
 * - Decoder (source bytes to instructions)
 * - Machine (tape, pointers, jump stack)
 * - Error taxonomy
 * - Static loop matching
 * - Byte I/O interfaces and in-memory implementations
 */

export * from './constants.js';
export type { ByteInput, ByteOutput } from './io.js';
export { BufferInput, BufferOutput, EMPTY_INPUT, NULL_OUTPUT } from './io/buffer.js';

export { InstructionKind, Insn } from './engine/insn.js';
export { decode, decodeAll, encode, instructionFor } from './engine/decoder.js';
export { Program } from './engine/program.js';
export { Machine, type MachineOptions, type MachineState } from './engine/machine.js';
export { LoopTable, matchLoops } from './engine/loops.js';
export {
  InterpreterError,
  UnmatchedLoopBeginError,
  UnmatchedLoopEndError,
  PointerOutOfBoundsError,
  NoInputError,
  MachineHaltedError,
  isInterpreterError,
  type InterpreterErrorKind,
  type PointerDirection,
} from './engine/errors.js';
