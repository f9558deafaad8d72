/**
 * @fileoverview Base for computer players.
 *
 * On `StartTurn` for its symbol an AI chooses a cell and publishes the move
 * deferred, so the choice never runs on the engine's stack and the engine
 * finishes publishing the current turn first.
 */

import { BusClosedError } from '@turnlink/framework-events';
import { toError } from '@turnlink/framework-transport';
import type { GameBus } from '../shared/events.js';
import type { Board, PlayerSymbol } from '../shared/types.js';
import { logger } from '../utils/logger.js';

export type AiPolicy = 'random' | 'optimal';

/** Called when a chosen move could not be delivered or chosen */
export type FaultHandler = (error: Error) => void;

export class NoMoveAvailableError extends Error {
  constructor(symbol: PlayerSymbol) {
    super(`No moves available for player ${symbol}, but the game is not over`);
    this.name = 'NoMoveAvailableError';
  }
}

export abstract class AiParticipant {
  readonly kind = 'ai';
  abstract readonly policy: AiPolicy;
  private readonly unsubscribe: () => void;
  private readonly onFault: FaultHandler;

  constructor(
    private readonly bus: GameBus,
    readonly symbol: PlayerSymbol,
    onFault?: FaultHandler
  ) {
    this.onFault = onFault ?? ((error) => this.logFault(error));
    this.unsubscribe = bus.subscribe('StartTurn', (event) => {
      if (event.currentPlayer === this.symbol) {
        this.takeTurn(event.board);
      }
    });
  }

  /**
   * Pick the cell to play on a board that still has empty cells.
   * @returns [row, col], or null if the board is full
   */
  protected abstract chooseMove(board: Board): [number, number] | null;

  dispose(): void {
    this.unsubscribe();
  }

  private takeTurn(board: Board): void {
    const move = this.chooseMove(board);
    if (!move) {
      this.onFault(new NoMoveAvailableError(this.symbol));
      return;
    }
    const [row, col] = move;
    this.bus
      .publishDeferred({ type: 'MoveRequested', player: this.symbol, row, col })
      .catch((error: unknown) => {
        // The session was torn down before the move went out.
        if (error instanceof BusClosedError) {
          return;
        }
        this.onFault(toError(error));
      });
  }

  private logFault(error: Error): void {
    logger.error('AI move failed', {
      player: this.symbol,
      policy: this.policy,
      error: error.message,
    });
  }
}
