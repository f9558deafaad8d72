/**
 * @fileoverview Game events carried by the in-process bus.
 *
 * The engine, the participants, the network bridges and any front end only
 * know each other through these events.
 */

import type { EventBus } from '@turnlink/framework-events';
import type { ChannelCloseReason } from '@turnlink/framework-transport';
import type { Board, PlayerSymbol } from './types.js';

/**
 * A participant asks to place its symbol.
 */
export interface MoveRequestedEvent {
  readonly type: 'MoveRequested';
  readonly player: PlayerSymbol;
  readonly row: number;
  readonly col: number;
}

/**
 * The board changed (or the game started). Published before the next
 * `StartTurn`.
 */
export interface StateUpdatedEvent {
  readonly type: 'StateUpdated';
  readonly board: Board;
  readonly currentPlayer: PlayerSymbol;
  readonly winner: PlayerSymbol | null;
  readonly isDraw: boolean;
  readonly moveCount: number;
}

/**
 * It is `currentPlayer`'s turn to move. Never published once the game is over.
 */
export interface StartTurnEvent {
  readonly type: 'StartTurn';
  readonly board: Board;
  readonly currentPlayer: PlayerSymbol;
}

export type InvalidMoveReason = 'not_your_turn' | 'cell_occupied' | 'game_over';

/**
 * A requested move broke a rule; the board is unchanged.
 */
export interface InvalidMoveEvent {
  readonly type: 'InvalidMove';
  readonly player: PlayerSymbol;
  readonly row: number;
  readonly col: number;
  readonly reason: InvalidMoveReason;
  readonly message: string;
}

/**
 * A local front end should accept input for `player`.
 */
export interface EnableInputEvent {
  readonly type: 'EnableInput';
  readonly player: PlayerSymbol;
}

/** Why the session lost its peer: how the channel closed, or a failed send */
export type NetworkFaultReason = ChannelCloseReason | 'send_failed';

/**
 * The connection to the peer is gone and the session is over.
 */
export interface NetworkFaultEvent {
  readonly type: 'NetworkFault';
  readonly message: string;
  readonly reason: NetworkFaultReason;
}

export type GameEvent =
  | MoveRequestedEvent
  | StateUpdatedEvent
  | StartTurnEvent
  | InvalidMoveEvent
  | EnableInputEvent
  | NetworkFaultEvent;

export type GameEventType = GameEvent['type'];

/** The bus one game session shares between all of its components */
export type GameBus = EventBus<GameEvent>;
