/**
 * @fileoverview Perfect play by minimax search with alpha-beta pruning.
 *
 * Scores are from the searching player's side: a win scores
 * `WIN_SCORE - depth`, a loss `depth - WIN_SCORE`, a draw 0, so faster wins
 * and slower losses are preferred. Equal scores keep the first cell in
 * row-major order.
 */

import { cloneBoard, getAvailableMoves, getWinner, type MutableBoard, otherSymbol, setCell } from '../engine/board.js';
import type { GameBus } from '../shared/events.js';
import type { Board, PlayerSymbol } from '../shared/types.js';
import { AiParticipant, type FaultHandler } from './AiParticipant.js';

const WIN_SCORE = 10;

export interface OptimalAiOptions {
  readonly onFault?: FaultHandler;
}

/**
 * Best cell for `symbol` to play, or null if the board is full.
 */
export function chooseOptimalMove(board: Board, symbol: PlayerSymbol): [number, number] | null {
  const work = cloneBoard(board);
  let best: [number, number] | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;
  let alpha = Number.NEGATIVE_INFINITY;

  for (const [row, col] of getAvailableMoves(work)) {
    setCell(work, row, col, symbol);
    const score = minimax(work, otherSymbol(symbol), symbol, 1, alpha, Number.POSITIVE_INFINITY);
    setCell(work, row, col, null);

    if (score > bestScore) {
      bestScore = score;
      best = [row, col];
    }
    alpha = Math.max(alpha, score);
  }
  return best;
}

function minimax(
  board: MutableBoard,
  toMove: PlayerSymbol,
  maximizer: PlayerSymbol,
  depth: number,
  alpha: number,
  beta: number
): number {
  const winner = getWinner(board);
  if (winner) {
    return winner === maximizer ? WIN_SCORE - depth : depth - WIN_SCORE;
  }
  const moves = getAvailableMoves(board);
  if (moves.length === 0) {
    return 0;
  }

  const maximizing = toMove === maximizer;
  let value = maximizing ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  let low = alpha;
  let high = beta;

  for (const [row, col] of moves) {
    setCell(board, row, col, toMove);
    const score = minimax(board, otherSymbol(toMove), maximizer, depth + 1, low, high);
    setCell(board, row, col, null);

    if (maximizing) {
      value = Math.max(value, score);
      low = Math.max(low, value);
    } else {
      value = Math.min(value, score);
      high = Math.min(high, value);
    }
    if (low >= high) {
      break;
    }
  }
  return value;
}

/**
 * Never loses: against another optimal player every game is a draw.
 */
export class OptimalAiParticipant extends AiParticipant {
  override readonly policy = 'optimal';

  constructor(bus: GameBus, symbol: PlayerSymbol, options: OptimalAiOptions = {}) {
    super(bus, symbol, options.onFault);
  }

  protected override chooseMove(board: Board): [number, number] | null {
    return chooseOptimalMove(board, this.symbol);
  }
}
