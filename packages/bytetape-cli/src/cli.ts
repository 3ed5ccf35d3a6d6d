#!/usr/bin/env tsx
/**
 * bytetape CLI
 */

import { Command } from 'commander';
import { DEFAULT_TAPE_LENGTH } from 'bytetape-core';
import { parseTapeSize } from './options.js';
import { runFile } from './run-file.js';
import { StdinInput, StdoutOutput } from './stdio.js';

interface CliOptions {
  tapeSize: number;
  check?: boolean;
  quiet?: boolean;
  time?: boolean;
  input?: string;
}

const program = new Command();

program
  .name('bytetape')
  .description('Interpreter for the eight-instruction byte tape language')
  .version('0.1.0')
  .option('-s, --tape-size <cells>', 'Number of tape cells', parseTapeSize, DEFAULT_TAPE_LENGTH)
  .option('-c, --check', 'Only check that every loop is balanced')
  .option('-q, --quiet', 'Do not print the completion notice')
  .option('-t, --time', 'Show execution time on stderr')
  .option('-i, --input <file>', 'Read program input from a file instead of stdin')
  .argument('<file>', 'Program source file')
  .action((file: string, options: CliOptions) => {
    process.exitCode = runFile(
      file,
      {
        tapeSize: options.tapeSize,
        check: options.check,
        quiet: options.quiet,
        time: options.time,
        inputFile: options.input,
      },
      {
        input: new StdinInput(),
        output: new StdoutOutput(),
        log: (line) => console.log(line),
        error: (line) => console.error(line),
      }
    );
  });

program.parse();
