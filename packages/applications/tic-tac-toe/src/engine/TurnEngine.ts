/**
 * @fileoverview The turn engine owns the board of one peer.
 *
 * In `authority` mode it is the only code that mutates game state: it reacts
 * to `MoveRequested`, validates the move, and publishes `StateUpdated`
 * followed by `StartTurn`. In `mirror` mode (the relay peer) it never applies
 * moves; it adopts the `StateUpdated` snapshots the authority relays, so both
 * peers see the same board.
 *
 * Validation order for a requested move:
 * 1. the requester must be the current player (`not_your_turn`)
 * 2. the cell must be on the board (`MoveOutOfBoundsError`, thrown)
 * 3. the cell must be empty (`cell_occupied`)
 * 4. the game must not be won yet (`game_over`)
 *
 * Rule violations publish `InvalidMove` and then `StartTurn` again for the
 * player whose turn it still is. The board is unchanged.
 */

import type {
  GameBus,
  InvalidMoveReason,
  StateUpdatedEvent,
} from '../shared/events.js';
import type { Board, Move, PlayerSymbol } from '../shared/types.js';
import {
  cloneBoard,
  createBoard,
  getCell,
  getWinner,
  isBoardFull,
  isInBounds,
  type MutableBoard,
  otherSymbol,
  setCell,
} from './board.js';
import { EngineModeError, MoveOutOfBoundsError } from './errors.js';

export type TurnEngineMode = 'authority' | 'mirror';

export interface TurnEngineOptions {
  /** @default 'authority' */
  readonly mode?: TurnEngineMode;
}

export interface TurnEngineSnapshot {
  readonly board: Board;
  readonly currentPlayer: PlayerSymbol;
  readonly winner: PlayerSymbol | null;
  readonly isDraw: boolean;
  readonly moveCount: number;
}

export interface GameOutcome {
  readonly winner: PlayerSymbol | null;
  readonly isDraw: boolean;
  readonly board: Board;
}

const INVALID_MOVE_MESSAGES: Record<InvalidMoveReason, string> = {
  not_your_turn: 'Not your turn.',
  cell_occupied: 'Cell occupied.',
  game_over: 'Game over.',
};

export class TurnEngine {
  readonly mode: TurnEngineMode;
  private _board: MutableBoard = createBoard();
  private _currentPlayer: PlayerSymbol = 'X';
  private _winner: PlayerSymbol | null = null;
  private _moveCount = 0;
  private outcome: GameOutcome | null = null;
  private readonly finishWaiters: ((outcome: GameOutcome) => void)[] = [];
  private readonly unsubscribers: (() => void)[] = [];

  constructor(
    private readonly bus: GameBus,
    options: TurnEngineOptions = {}
  ) {
    this.mode = options.mode ?? 'authority';

    if (this.mode === 'authority') {
      this.unsubscribers.push(bus.subscribe('MoveRequested', (event) => this.applyMove(event)));
    } else {
      this.unsubscribers.push(bus.subscribe('StateUpdated', (event) => this.adoptState(event)));
    }
  }

  // ============ Getters ============

  /** Copy of the current board */
  get board(): Board {
    return cloneBoard(this._board);
  }

  get currentPlayer(): PlayerSymbol {
    return this._currentPlayer;
  }

  get winner(): PlayerSymbol | null {
    return this._winner;
  }

  get isDraw(): boolean {
    return this._winner === null && isBoardFull(this._board);
  }

  get isFinished(): boolean {
    return this._winner !== null || isBoardFull(this._board);
  }

  /** Number of moves applied so far */
  get moveCount(): number {
    return this._moveCount;
  }

  snapshot(): TurnEngineSnapshot {
    return {
      board: this.board,
      currentPlayer: this._currentPlayer,
      winner: this._winner,
      isDraw: this.isDraw,
      moveCount: this._moveCount,
    };
  }

  /**
   * Resolves once the game is won or drawn.
   */
  whenFinished(): Promise<GameOutcome> {
    const { outcome } = this;
    if (outcome) {
      return Promise.resolve(outcome);
    }
    return new Promise((resolve) => {
      this.finishWaiters.push(resolve);
    });
  }

  // ============ Commands ============

  /**
   * Announce the initial state and give X the first turn.
   */
  start(): void {
    this.requireAuthority('start');
    this.publishStateUpdated();
    this.publishStartTurn();
  }

  /**
   * Validate and apply a move, then publish the outcome.
   * @throws {MoveOutOfBoundsError} if the move names a cell outside the grid
   */
  applyMove(move: Move): void {
    this.requireAuthority('applyMove');
    const { player, row, col } = move;

    if (player !== this._currentPlayer) {
      this.reject(move, 'not_your_turn');
      return;
    }
    if (!isInBounds(row, col)) {
      throw new MoveOutOfBoundsError(row, col);
    }
    if (getCell(this._board, row, col) !== null) {
      this.reject(move, 'cell_occupied');
      return;
    }
    if (this._winner !== null) {
      this.reject(move, 'game_over');
      return;
    }

    setCell(this._board, row, col, player);
    this._moveCount++;
    this._winner = getWinner(this._board);
    this._currentPlayer = otherSymbol(player);

    this.publishStateUpdated();
    this.publishStartTurn();
    if (this.isFinished) {
      this.finish();
    }
  }

  /**
   * Stop listening to the bus.
   */
  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }

  // ============ Internals ============

  private adoptState(event: StateUpdatedEvent): void {
    this._board = cloneBoard(event.board);
    this._currentPlayer = event.currentPlayer;
    this._winner = event.winner;
    this._moveCount = event.moveCount;
    if (this.isFinished) {
      this.finish();
    }
  }

  private reject(move: Move, reason: InvalidMoveReason): void {
    this.bus.publish({
      type: 'InvalidMove',
      player: move.player,
      row: move.row,
      col: move.col,
      reason,
      message: INVALID_MOVE_MESSAGES[reason],
    });
    this.publishStartTurn();
  }

  private publishStateUpdated(): void {
    this.bus.publish({ type: 'StateUpdated', ...this.snapshot() });
  }

  private publishStartTurn(): void {
    if (this.isFinished) {
      return;
    }
    this.bus.publish({ type: 'StartTurn', board: this.board, currentPlayer: this._currentPlayer });
  }

  private finish(): void {
    if (this.outcome) {
      return;
    }
    const outcome: GameOutcome = { winner: this._winner, isDraw: this.isDraw, board: this.board };
    this.outcome = outcome;
    for (const resolve of this.finishWaiters.splice(0)) {
      resolve(outcome);
    }
  }

  private requireAuthority(operation: string): void {
    if (this.mode !== 'authority') {
      throw new EngineModeError(`${operation} is only available on the authority engine`);
    }
  }
}
