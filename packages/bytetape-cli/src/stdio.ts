/**
 * Byte I/O bound to the process's standard streams
 *
 * Reads and writes are synchronous: the machine blocks on ',' until a byte
 * arrives or the stream ends.
 */

import * as fs from 'fs';
import type { ByteInput, ByteOutput } from 'bytetape-core';

const STDIN_FD = 0;
const STDOUT_FD = 1;
const OUTPUT_BUFFER_SIZE = 4096;
const RETRY_DELAY_MS = 10;

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function sleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

export class StdinInput implements ByteInput {
  private readonly buffer = Buffer.alloc(1);

  constructor(private readonly fd: number = STDIN_FD) {}

  readByte(): number | null {
    for (;;) {
      try {
        const bytesRead = fs.readSync(this.fd, this.buffer, 0, 1, null);
        return bytesRead === 0 ? null : this.buffer[0];
      } catch (error) {
        const code = errorCode(error);
        // Non-blocking stdin (some TTYs and pipes) has no data yet
        if (code === 'EAGAIN') {
          sleep(RETRY_DELAY_MS);
          continue;
        }
        // Windows reports a closed pipe this way
        if (code === 'EOF') {
          return null;
        }
        throw error;
      }
    }
  }
}

export class StdoutOutput implements ByteOutput {
  private readonly buffer = Buffer.alloc(OUTPUT_BUFFER_SIZE);
  private length: number = 0;

  constructor(private readonly fd: number = STDOUT_FD) {}

  writeByte(byte: number): void {
    this.buffer[this.length++] = byte;
    if (this.length === this.buffer.length) {
      this.flush();
    }
  }

  flush(): void {
    let offset = 0;
    while (offset < this.length) {
      try {
        offset += fs.writeSync(this.fd, this.buffer, offset, this.length - offset);
      } catch (error) {
        if (errorCode(error) !== 'EAGAIN') {
          throw error;
        }
        sleep(RETRY_DELAY_MS);
      }
    }
    this.length = 0;
  }
}
