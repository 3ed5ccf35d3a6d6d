/**
 * In-memory byte I/O
 */

import type { ByteInput, ByteOutput } from '../io.js';

/**
 * Reads from a fixed byte buffer. Strings are taken as latin1.
 */
export class BufferInput implements ByteInput {
  private readonly data: Uint8Array;
  private offset: number = 0;

  constructor(data: Uint8Array | string = new Uint8Array(0)) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'latin1') : data;
  }

  readByte(): number | null {
    if (this.offset >= this.data.length) {
      return null;
    }
    return this.data[this.offset++];
  }

  /** Bytes not yet read */
  remaining(): number {
    return this.data.length - this.offset;
  }
}

/**
 * Collects every byte written
 */
export class BufferOutput implements ByteOutput {
  private chunks: number[] = [];

  writeByte(byte: number): void {
    this.chunks.push(byte & 0xff);
  }

  flush(): void {
    // nothing buffered beyond the collected bytes
  }

  bytes(): Uint8Array {
    return Uint8Array.from(this.chunks);
  }

  toString(): string {
    return Buffer.from(this.chunks).toString('latin1');
  }
}

/** Input that is always at end of stream */
export const EMPTY_INPUT: ByteInput = {
  readByte: () => null,
};

/** Output that discards everything */
export const NULL_OUTPUT: ByteOutput = {
  writeByte: () => {},
  flush: () => {},
};
