import { formatBoard } from '../engine/board.js';
import type { GameBus } from '../shared/events.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';

/**
 * Headless front end: writes every board change, rejected move and network
 * fault to the log.
 */
export class BoardLogger {
  private readonly unsubscribers: (() => void)[];

  constructor(
    bus: GameBus,
    private readonly logger: Logger = defaultLogger
  ) {
    this.unsubscribers = [
      bus.subscribe('StateUpdated', (event) => {
        const status =
          event.winner !== null
            ? `${event.winner} wins`
            : event.isDraw
              ? 'draw'
              : `${event.currentPlayer} to move`;
        this.logger.info(`Move ${event.moveCount}: ${status}\n${formatBoard(event.board)}`);
      }),
      bus.subscribe('InvalidMove', (event) => {
        this.logger.warn('Move rejected', {
          player: event.player,
          row: event.row,
          col: event.col,
          reason: event.reason,
        });
      }),
      bus.subscribe('NetworkFault', (event) => {
        this.logger.error('Network fault', { reason: event.reason, message: event.message });
      }),
    ];
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}
