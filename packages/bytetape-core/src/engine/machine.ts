/**
 * Machine - the execution engine
 *
 * The machine owns everything a run mutates:
 * - The tape, a fixed array of byte cells
 * - The data pointer into the tape
 * - The instruction pointer into the program
 * - The jump stack of currently open '[' positions
 *
 * Instructions call back into the public operations below. The core loop is
 * just:
 * ```ts
 * while (machine.state.status === 'running') machine.step();
 * ```
 * Each machine is independent, so any number can run in one process.
 */

import type { ByteInput, ByteOutput } from '../io.js';
import type { Program } from './program.js';
import { CELL_MODULUS, DEFAULT_TAPE_LENGTH } from '../constants.js';
import { EMPTY_INPUT, NULL_OUTPUT } from '../io/buffer.js';
import {
  MachineHaltedError,
  NoInputError,
  PointerOutOfBoundsError,
  UnmatchedLoopBeginError,
  UnmatchedLoopEndError,
} from './errors.js';

export interface MachineOptions {
  /** Number of tape cells (default 30000) */
  tapeLength?: number;
  /** Source for ',' (default: always exhausted) */
  input?: ByteInput;
  /** Sink for '.' (default: discards) */
  output?: ByteOutput;
}

export type MachineState =
  | { status: 'running'; instructionPointer: number }
  | { status: 'halted'; outcome: 'success' }
  | { status: 'halted'; outcome: 'error'; error: Error };

type HaltedState = Extract<MachineState, { status: 'halted' }>;

export class Machine {
  readonly program: Program;
  readonly tapeLength: number;

  /** Tape cells, zero-initialised */
  private readonly tape: Uint8Array;

  private readonly input: ByteInput;
  private readonly output: ByteOutput;

  private dp: number = 0;
  private ip: number = 0;

  /**
   * Where the instruction pointer goes once the current instruction
   * completes. ']' overwrites it to jump back.
   */
  private nextIp: number = 0;

  private readonly jumpStack: number[] = [];
  private stepCount: number = 0;
  private halted: HaltedState | null = null;
  private flushFault: unknown = null;

  constructor(program: Program, options: MachineOptions = {}) {
    const tapeLength = options.tapeLength ?? DEFAULT_TAPE_LENGTH;
    if (!Number.isInteger(tapeLength) || tapeLength <= 0) {
      throw new RangeError(`Tape length must be a positive integer, got ${tapeLength}`);
    }

    this.program = program;
    this.tapeLength = tapeLength;
    this.tape = new Uint8Array(tapeLength);
    this.input = options.input ?? EMPTY_INPUT;
    this.output = options.output ?? NULL_OUTPUT;
  }

  get dataPointer(): number {
    return this.dp;
  }

  get instructionPointer(): number {
    return this.ip;
  }

  /** Instructions executed successfully so far */
  get steps(): number {
    return this.stepCount;
  }

  /**
   * Error thrown by the output's flush after a failed run, if any.
   * run() throws the halting fault instead.
   */
  get outputFault(): unknown {
    return this.flushFault;
  }

  get state(): MachineState {
    return this.halted ?? { status: 'running', instructionPointer: this.ip };
  }

  /**
   * Read a cell; defaults to the one under the data pointer
   */
  cell(index: number = this.dp): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.tapeLength) {
      throw new RangeError(`Cell index ${index} out of bounds`);
    }
    return this.tape[index];
  }

  /**
   * Positions of the '[' currently open, outermost first
   */
  openLoops(): number[] {
    return [...this.jumpStack];
  }

  /**
   * Execute the instruction at the instruction pointer.
   *
   * At the end of the program this performs the final check instead:
   * the machine halts successfully if no loop is left open, and throws
   * UnmatchedLoopBeginError otherwise.
   */
  step(): void {
    if (this.halted) {
      throw new MachineHaltedError();
    }

    const insn = this.program.at(this.ip);
    if (!insn) {
      this.finish();
      return;
    }

    this.nextIp = this.ip + 1;
    try {
      insn.execute(this);
    } catch (error) {
      this.fail(error);
    }
    this.ip = this.nextIp;
    this.stepCount++;
  }

  /**
   * Step until the machine halts. Throws the first fault.
   *
   * Output is flushed either way. A flush failure only surfaces when the
   * run itself succeeded; otherwise the halting fault is what is thrown.
   */
  run(): void {
    try {
      while (!this.halted) {
        this.step();
      }
    } catch (error) {
      try {
        this.output.flush();
      } catch (flushError) {
        // the halting fault takes precedence; keep this one for the caller
        this.flushFault = flushError;
      }
      throw error;
    }
    this.output.flush();
  }

  /**
   * '>' and '<'
   */
  movePointer(delta: 1 | -1): void {
    const target = this.dp + delta;
    if (target >= this.tapeLength) {
      throw new PointerOutOfBoundsError('above', this.ip, this.tapeLength);
    }
    if (target < 0) {
      throw new PointerOutOfBoundsError('below', this.ip, this.tapeLength);
    }
    this.dp = target;
  }

  /**
   * '+' and '-'; cell values wrap
   */
  adjustCell(delta: number): void {
    const value = this.tape[this.dp] + delta;
    this.tape[this.dp] = ((value % CELL_MODULUS) + CELL_MODULUS) % CELL_MODULUS;
  }

  /**
   * '['
   */
  openLoop(): void {
    this.jumpStack.push(this.ip);
  }

  /**
   * ']' - pop the innermost open loop. On a non-zero cell, resume at that
   * '[' so it re-opens itself and the body runs again.
   */
  closeLoop(): void {
    const begin = this.jumpStack.pop();
    if (begin === undefined) {
      throw new UnmatchedLoopEndError(this.ip);
    }
    if (this.tape[this.dp] !== 0) {
      this.nextIp = begin;
    }
  }

  /**
   * ','
   */
  readInput(): void {
    let byte: number | null;
    try {
      byte = this.input.readByte();
    } catch (cause) {
      throw new NoInputError({ cause });
    }
    if (byte === null) {
      throw new NoInputError();
    }
    this.tape[this.dp] = byte;
  }

  /**
   * '.'
   */
  writeOutput(): void {
    this.output.writeByte(this.tape[this.dp]);
  }

  private finish(): void {
    if (this.jumpStack.length > 0) {
      this.fail(new UnmatchedLoopBeginError(this.openLoops()));
    }
    this.halted = { status: 'halted', outcome: 'success' };
  }

  private fail(error: unknown): never {
    this.halted = {
      status: 'halted',
      outcome: 'error',
      error: error instanceof Error ? error : new Error(String(error)),
    };
    throw error;
  }
}
