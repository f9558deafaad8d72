/**
 * @fileoverview Input adapter for a player sitting at this peer.
 *
 * A front end listens for `EnableInput` and calls `submitMove` with the cell
 * the player picked. Errors from the bus (for example a `NetworkError` when
 * the peer is gone) are thrown back to the front end.
 */

import type { GameBus } from '../shared/events.js';
import type { PlayerSymbol } from '../shared/types.js';

export class LocalParticipant {
  readonly kind = 'local';
  private awaitingInput = false;
  private readonly unsubscribe: () => void;

  constructor(
    private readonly bus: GameBus,
    readonly symbol: PlayerSymbol
  ) {
    this.unsubscribe = bus.subscribe('StartTurn', (event) => {
      if (event.currentPlayer !== this.symbol) {
        return;
      }
      this.awaitingInput = true;
      this.bus.publish({ type: 'EnableInput', player: this.symbol });
    });
  }

  /** Whether it is this player's turn and no move was submitted yet */
  get isAwaitingInput(): boolean {
    return this.awaitingInput;
  }

  /**
   * Request a move for this player. The engine decides whether it is valid.
   */
  submitMove(row: number, col: number): void {
    this.awaitingInput = false;
    this.bus.publish({ type: 'MoveRequested', player: this.symbol, row, col });
  }

  dispose(): void {
    this.unsubscribe();
  }
}
