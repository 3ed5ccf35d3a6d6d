/**
 * Byte I/O interfaces
 *
 * The machine talks to the outside world only through these. The CLI binds
 * them to the process's standard streams; tests bind them to memory.
 */

export interface ByteInput {
  /**
   * Read the next byte, or null at end of stream.
   * Throws if the underlying source faults.
   */
  readByte(): number | null;
}

export interface ByteOutput {
  /**
   * Write one byte (0-255)
   */
  writeByte(byte: number): void;

  /**
   * Deliver anything still buffered
   */
  flush(): void;
}
