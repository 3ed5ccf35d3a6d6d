/**
 * Interpreter error taxonomy
 *
 * Every fault a program can cause while running is one of these classes.
 * The first fault halts the machine; nothing is retried or recovered.
 */

export type InterpreterErrorKind =
  | 'UnmatchedLoopBegin'
  | 'UnmatchedLoopEnd'
  | 'PointerOutOfBounds'
  | 'NoInput';

/**
 * Base class for all interpreter faults
 */
export abstract class InterpreterError extends Error {
  abstract readonly kind: InterpreterErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * One or more '[' were still open when the program ended
 */
export class UnmatchedLoopBeginError extends InterpreterError {
  readonly kind = 'UnmatchedLoopBegin';

  constructor(public readonly positions: readonly number[]) {
    super(`The '['s at these indices are unmatched: [${positions.join(', ')}]`);
  }
}

/**
 * A ']' ran with no open '['
 */
export class UnmatchedLoopEndError extends InterpreterError {
  readonly kind = 'UnmatchedLoopEnd';

  constructor(public readonly position: number) {
    super(`Unmatched ']' at character ${position}`);
  }
}

export type PointerDirection = 'above' | 'below';

/**
 * A pointer move would have left the tape
 */
export class PointerOutOfBoundsError extends InterpreterError {
  readonly kind = 'PointerOutOfBounds';

  constructor(
    public readonly direction: PointerDirection,
    public readonly position: number,
    public readonly tapeLength: number
  ) {
    super(
      direction === 'above'
        ? `Data pointer moved past the last cell (${tapeLength - 1}) at character ${position}`
        : `Data pointer moved below cell 0 at character ${position}`
    );
  }
}

/**
 * A ',' found the input exhausted or unreadable
 */
export class NoInputError extends InterpreterError {
  readonly kind = 'NoInput';

  constructor(options?: { cause?: unknown }) {
    super('No input given', options);
  }
}

/**
 * step() was called on a machine that already halted
 */
export class MachineHaltedError extends Error {
  constructor() {
    super('Machine has already halted');
    this.name = 'MachineHaltedError';
  }
}

export function isInterpreterError(value: unknown): value is InterpreterError {
  return value instanceof InterpreterError;
}
