import { describe, expect, it } from 'vitest';
import {
  cloneBoard,
  createBoard,
  formatBoard,
  getAvailableMoves,
  getWinner,
  isBoardFull,
  isDraw,
  isInBounds,
  otherSymbol,
  setCell,
} from '../../src/engine/board.js';
import type { Board } from '../../src/shared/types.js';

function boardFrom(rows: string[]): Board {
  return rows.map((row) => [...row].map((cell) => (cell === 'X' || cell === 'O' ? cell : null)));
}

describe('board helpers', () => {
  it('should create an empty 3x3 board', () => {
    expect(createBoard()).toEqual([
      [null, null, null],
      [null, null, null],
      [null, null, null],
    ]);
  });

  it('should clone without sharing rows', () => {
    const original = createBoard();
    const copy = cloneBoard(original);

    setCell(copy, 1, 1, 'X');

    expect(original[1]?.[1]).toBeNull();
    expect(copy[1]?.[1]).toBe('X');
  });

  it('should check bounds', () => {
    expect(isInBounds(0, 0)).toBe(true);
    expect(isInBounds(2, 2)).toBe(true);
    expect(isInBounds(3, 0)).toBe(false);
    expect(isInBounds(0, -1)).toBe(false);
    expect(isInBounds(1.5, 1)).toBe(false);
  });

  it('should list empty cells in row-major order', () => {
    const board = boardFrom(['XO.', '...', 'OX.']);

    expect(getAvailableMoves(board)).toEqual([
      [0, 2],
      [1, 0],
      [1, 1],
      [1, 2],
      [2, 2],
    ]);
  });

  describe('getWinner', () => {
    it.each([
      ['top row', ['XXX', 'OO.', '...'], 'X'],
      ['middle row', ['OO.', 'XXX', '...'], 'X'],
      ['bottom row', ['X.X', 'XX.', 'OOO'], 'O'],
      ['left column', ['OX.', 'OX.', 'O.X'], 'O'],
      ['middle column', ['XO.', '.OX', 'XO.'], 'O'],
      ['right column', ['O.X', 'O.X', '..X'], 'X'],
      ['diagonal', ['X.O', '.XO', '..X'], 'X'],
      ['anti-diagonal', ['X.O', 'XO.', 'O..'], 'O'],
    ])('should detect a %s', (_line, rows, expected) => {
      expect(getWinner(boardFrom(rows))).toBe(expected);
    });

    it('should not count a line with mixed symbols', () => {
      expect(getWinner(boardFrom(['XXO', 'OOX', 'XOX']))).toBeNull();
    });

    it('should not count an empty line', () => {
      expect(getWinner(createBoard())).toBeNull();
    });
  });

  it('should tell a draw from a full board with a winner', () => {
    const drawn = boardFrom(['XOX', 'XOO', 'OXX']);
    const won = boardFrom(['XXX', 'OOX', 'OXO']);

    expect(isBoardFull(drawn)).toBe(true);
    expect(isDraw(drawn)).toBe(true);
    expect(isBoardFull(won)).toBe(true);
    expect(isDraw(won)).toBe(false);
  });

  it('should swap symbols', () => {
    expect(otherSymbol('X')).toBe('O');
    expect(otherSymbol('O')).toBe('X');
  });

  it('should format the board as text', () => {
    expect(formatBoard(boardFrom(['X.O', '.X.', '..O']))).toBe('X . O\n. X .\n. . O');
  });
});
