/**
 * Stdio binding tests - run against temporary files instead of fd 0 and 1
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StdinInput, StdoutOutput } from './stdio';

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bytetape-stdio-'));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('StdinInput', () => {
  it('should read one byte at a time and then report end of stream', () => {
    const file = path.join(dir, 'in.txt');
    fs.writeFileSync(file, 'ab');
    const fd = fs.openSync(file, 'r');
    try {
      const input = new StdinInput(fd);

      expect(input.readByte()).toBe(97);
      expect(input.readByte()).toBe(98);
      expect(input.readByte()).toBeNull();
    } finally {
      fs.closeSync(fd);
    }
  });

  it('should throw a read fault', () => {
    const fd = fs.openSync(dir, 'r');
    try {
      const input = new StdinInput(fd);

      let fault: unknown = null;
      try {
        input.readByte();
      } catch (error) {
        fault = error;
      }

      expect(fault).toHaveProperty('code', 'EISDIR');
    } finally {
      fs.closeSync(fd);
    }
  });
});

describe('StdoutOutput', () => {
  it('should write once the buffer fills and again on flush', () => {
    const file = path.join(dir, 'out.bin');
    const fd = fs.openSync(file, 'w');
    try {
      const output = new StdoutOutput(fd);

      for (let i = 0; i < 4095; i++) {
        output.writeByte(0x61);
      }
      expect(fs.fstatSync(fd).size).toBe(0);

      output.writeByte(0x61);
      expect(fs.fstatSync(fd).size).toBe(4096);

      for (let i = 0; i < 904; i++) {
        output.writeByte(0x62);
      }
      expect(fs.fstatSync(fd).size).toBe(4096);

      output.flush();
      expect(fs.fstatSync(fd).size).toBe(5000);
    } finally {
      fs.closeSync(fd);
    }

    const written = fs.readFileSync(file);
    expect(written[0]).toBe(0x61);
    expect(written[4095]).toBe(0x61);
    expect(written[4096]).toBe(0x62);
    expect(written[4999]).toBe(0x62);
  });

  it('should do nothing when flushed empty', () => {
    const file = path.join(dir, 'empty.bin');
    const fd = fs.openSync(file, 'w');
    try {
      new StdoutOutput(fd).flush();
    } finally {
      fs.closeSync(fd);
    }

    expect(fs.readFileSync(file).length).toBe(0);
  });
});
