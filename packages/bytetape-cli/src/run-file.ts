/**
 * Top-level driver: load a source file, run it, report the outcome
 */

import * as fs from 'fs';
import {
  BufferInput,
  Machine,
  Program,
  matchLoops,
  type ByteInput,
  type ByteOutput,
} from 'bytetape-core';

export const COMPLETION_NOTICE = '\nSuccessfully completed program';

export interface RunFileOptions {
  tapeSize?: number;
  /** Only match loops; do not execute */
  check?: boolean;
  /** Suppress the completion notice */
  quiet?: boolean;
  /** Report execution time and step count */
  time?: boolean;
  /** Read program input from this file instead of io.input */
  inputFile?: string;
}

export interface RunFileIO {
  input: ByteInput;
  output: ByteOutput;
  log(line: string): void;
  error(line: string): void;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the program in `file`. Returns the process exit code.
 */
export function runFile(file: string, options: RunFileOptions, io: RunFileIO): number {
  try {
    const program = Program.fromBytes(fs.readFileSync(file));

    if (options.check) {
      const loops = matchLoops(program);
      io.log(`OK (${program.length} instructions, ${loops.size} loops)`);
      return 0;
    }

    const input = options.inputFile ? new BufferInput(fs.readFileSync(options.inputFile)) : io.input;
    const machine = new Machine(program, {
      tapeLength: options.tapeSize,
      input,
      output: io.output,
    });

    const start = process.hrtime.bigint();
    try {
      machine.run();
    } finally {
      if (machine.outputFault) {
        io.error(`Error: output could not be flushed: ${describe(machine.outputFault)}`);
      }
      if (options.time) {
        const timeMs = Number(process.hrtime.bigint() - start) / 1e6;
        io.error(`\nExecution time: ${timeMs.toFixed(2)}ms (${machine.steps} steps)`);
      }
    }

    if (!options.quiet) {
      io.log(COMPLETION_NOTICE);
    }
    return 0;
  } catch (error) {
    io.error(`Error: ${describe(error)}`);
    if (process.env.DEBUG && error instanceof Error && error.stack) {
      io.error(error.stack);
    }
    return 1;
  }
}
