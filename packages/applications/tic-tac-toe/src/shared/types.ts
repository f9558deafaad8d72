/**
 * @fileoverview Core tic-tac-toe types shared by the engine, the participants
 * and the wire messages.
 */

export type PlayerSymbol = 'X' | 'O';

/** A cell is empty (null) or holds the symbol of the player who took it */
export type Cell = PlayerSymbol | null;

/** Read-only view of the 3×3 grid, indexed `[row][col]` */
export type Board = readonly (readonly Cell[])[];

export const BOARD_SIZE = 3;

export interface Move {
  readonly player: PlayerSymbol;
  readonly row: number;
  readonly col: number;
}

export function isPlayerSymbol(value: unknown): value is PlayerSymbol {
  return value === 'X' || value === 'O';
}
