/**
 * Error taxonomy tests
 */

import { describe, it, expect } from 'vitest';
import {
  InterpreterError,
  NoInputError,
  PointerOutOfBoundsError,
  UnmatchedLoopBeginError,
  UnmatchedLoopEndError,
  isInterpreterError,
} from './errors';

describe('InterpreterError', () => {
  it('should describe unmatched loop begins', () => {
    const error = new UnmatchedLoopBeginError([0, 3]);

    expect(error.kind).toBe('UnmatchedLoopBegin');
    expect(error.name).toBe('UnmatchedLoopBeginError');
    expect(error.message).toBe("The '['s at these indices are unmatched: [0, 3]");
  });

  it('should describe an unmatched loop end', () => {
    const error = new UnmatchedLoopEndError(5);

    expect(error.kind).toBe('UnmatchedLoopEnd');
    expect(error.message).toBe("Unmatched ']' at character 5");
  });

  it('should describe both pointer directions', () => {
    expect(new PointerOutOfBoundsError('above', 7, 30000).message).toBe(
      'Data pointer moved past the last cell (29999) at character 7'
    );
    expect(new PointerOutOfBoundsError('below', 7, 30000).message).toBe(
      'Data pointer moved below cell 0 at character 7'
    );
  });

  it('should narrow caught values', () => {
    const error: unknown = new NoInputError();

    expect(isInterpreterError(error)).toBe(true);
    expect(error).toBeInstanceOf(InterpreterError);
    expect(error).toBeInstanceOf(Error);
    expect(isInterpreterError(new Error('other'))).toBe(false);
    expect(isInterpreterError('NoInput')).toBe(false);
  });
});
