/**
 * @fileoverview Pure board helpers. None of them mutate their input except
 * `setCell`, which callers use on their own private copy.
 */

import { BOARD_SIZE, type Board, type Cell, type PlayerSymbol } from '../shared/types.js';

export type MutableBoard = Cell[][];

/** Every line that wins: three rows, three columns, two diagonals */
const WINNING_LINES: readonly (readonly [number, number])[][] = [
  [[0, 0], [0, 1], [0, 2]],
  [[1, 0], [1, 1], [1, 2]],
  [[2, 0], [2, 1], [2, 2]],
  [[0, 0], [1, 0], [2, 0]],
  [[0, 1], [1, 1], [2, 1]],
  [[0, 2], [1, 2], [2, 2]],
  [[0, 0], [1, 1], [2, 2]],
  [[0, 2], [1, 1], [2, 0]],
];

export function createBoard(): MutableBoard {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, () => null));
}

export function cloneBoard(board: Board): MutableBoard {
  return board.map((row) => [...row]);
}

export function isInBounds(row: number, col: number): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < BOARD_SIZE &&
    col >= 0 &&
    col < BOARD_SIZE
  );
}

export function getCell(board: Board, row: number, col: number): Cell {
  return board[row]?.[col] ?? null;
}

export function setCell(board: MutableBoard, row: number, col: number, cell: Cell): void {
  const cells = board[row];
  if (cells) {
    cells[col] = cell;
  }
}

/**
 * Empty cells in row-major order.
 */
export function getAvailableMoves(board: Board): [number, number][] {
  const moves: [number, number][] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (getCell(board, row, col) === null) {
        moves.push([row, col]);
      }
    }
  }
  return moves;
}

/**
 * The symbol filling a whole line, or null if no line is complete.
 */
export function getWinner(board: Board): PlayerSymbol | null {
  for (const line of WINNING_LINES) {
    const [first, ...rest] = line.map(([row, col]) => getCell(board, row, col));
    if (first && rest.every((cell) => cell === first)) {
      return first;
    }
  }
  return null;
}

export function isBoardFull(board: Board): boolean {
  return board.every((row) => row.every((cell) => cell !== null));
}

export function isDraw(board: Board): boolean {
  return isBoardFull(board) && getWinner(board) === null;
}

export function otherSymbol(symbol: PlayerSymbol): PlayerSymbol {
  return symbol === 'X' ? 'O' : 'X';
}

/**
 * Render the board as three text rows, `.` for empty cells.
 */
export function formatBoard(board: Board): string {
  return board.map((row) => row.map((cell) => cell ?? '.').join(' ')).join('\n');
}
