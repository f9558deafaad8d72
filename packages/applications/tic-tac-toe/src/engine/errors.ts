/**
 * A move named a cell outside the grid. The peers disagree about the board,
 * so this is not reported as an invalid move: it propagates to whoever
 * published the move.
 */
export class MoveOutOfBoundsError extends Error {
  constructor(
    readonly row: number,
    readonly col: number
  ) {
    super(`Move out of bounds: (${row}, ${col})`);
    this.name = 'MoveOutOfBoundsError';
  }
}

/**
 * An operation was called on an engine in the wrong mode.
 */
export class EngineModeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineModeError';
  }
}
