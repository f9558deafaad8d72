import { getAvailableMoves } from '../engine/board.js';
import type { GameBus } from '../shared/events.js';
import type { Board, PlayerSymbol } from '../shared/types.js';
import { AiParticipant, type FaultHandler } from './AiParticipant.js';

export interface RandomAiOptions {
  /** Source of numbers in [0, 1) (default Math.random) */
  readonly random?: () => number;
  readonly onFault?: FaultHandler;
}

/**
 * Plays a uniformly random empty cell.
 */
export class RandomAiParticipant extends AiParticipant {
  override readonly policy = 'random';
  private readonly random: () => number;

  constructor(bus: GameBus, symbol: PlayerSymbol, options: RandomAiOptions = {}) {
    super(bus, symbol, options.onFault);
    this.random = options.random ?? Math.random;
  }

  protected override chooseMove(board: Board): [number, number] | null {
    const moves = getAvailableMoves(board);
    const index = Math.min(Math.floor(this.random() * moves.length), moves.length - 1);
    return moves[index] ?? null;
  }
}
