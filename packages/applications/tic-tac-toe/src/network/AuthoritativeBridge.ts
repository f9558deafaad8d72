/**
 * @fileoverview Host side of the network bridge.
 *
 * Stands in for the remote player on the host's bus. The host's engine is
 * the only authority: the remote peer's `move_request` frames become local
 * `MoveRequested` events, and every `StateUpdated` and `StartTurn` the engine
 * publishes (plus `InvalidMove` for the remote symbol) is relayed back.
 */

import { ProtocolError } from '@turnlink/framework-protocol';
import {
  type ChannelCloseInfo,
  type FramedChannel,
  TransportError,
} from '@turnlink/framework-transport';
import type { GameBus } from '../shared/events.js';
import type { MoveRequestMessage, PeerMessage } from '../shared/protocol.js';
import type { PlayerSymbol } from '../shared/types.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { assignRole, DEFAULT_HANDSHAKE_TIMEOUT_MS } from './handshake.js';
import { expectMessage, networkFaultFromClose } from './messages.js';

export interface AuthoritativeBridgeOptions {
  readonly bus: GameBus;
  readonly channel: FramedChannel;
  /** Symbol the remote peer plays */
  readonly symbol: PlayerSymbol;
  readonly handshakeTimeoutMs?: number;
  readonly logger?: Logger;
}

export class AuthoritativeBridge {
  readonly kind = 'network-authoritative';
  private readonly unsubscribers: (() => void)[] = [];
  private disposed = false;

  private constructor(
    private readonly bus: GameBus,
    private readonly channel: FramedChannel,
    readonly symbol: PlayerSymbol,
    private readonly logger: Logger
  ) {}

  /**
   * Assign the remote peer its symbol and start relaying.
   * @throws {NetworkError} if the peer does not acknowledge in time or the channel closes
   * @throws {ProtocolError} if the peer answers with anything but the matching ack
   */
  static async open(options: AuthoritativeBridgeOptions): Promise<AuthoritativeBridge> {
    const { bus, channel, symbol } = options;
    const logger = options.logger ?? defaultLogger;

    try {
      await assignRole(channel, symbol, options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS);
    } catch (error) {
      channel.close();
      throw error;
    }
    logger.info('Remote peer acknowledged role', { role: symbol });

    const bridge = new AuthoritativeBridge(bus, channel, symbol, logger);
    bridge.attach();
    return bridge;
  }

  get isOpen(): boolean {
    return !this.disposed && !this.channel.isClosed;
  }

  /**
   * Stop relaying and close the channel. No `NetworkFault` is published.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.detach();
    this.channel.close();
  }

  private attach(): void {
    const { bus, channel } = this;

    this.unsubscribers.push(
      bus.subscribe('StateUpdated', (event) => {
        this.forward({
          type: 'state_update',
          board: event.board.map((row) => [...row]),
          currentPlayer: event.currentPlayer,
          winner: event.winner,
          isDraw: event.isDraw,
          moveCount: event.moveCount,
        });
      }),
      bus.subscribe('StartTurn', (event) => {
        this.forward({
          type: 'start_turn',
          board: event.board.map((row) => [...row]),
          currentPlayer: event.currentPlayer,
        });
      }),
      bus.subscribe('InvalidMove', (event) => {
        if (event.player !== this.symbol) {
          return;
        }
        this.forward({
          type: 'invalid_move',
          player: event.player,
          row: event.row,
          col: event.col,
          reason: event.reason,
          message: event.message,
        });
      }),
      channel.registerHandler('move_request', (frame) => {
        this.handleMoveRequest(expectMessage(frame, 'move_request'));
      }),
      channel.onClose((info) => this.handleClose(info))
    );
  }

  private handleMoveRequest(message: MoveRequestMessage): void {
    if (message.player !== this.symbol) {
      throw new ProtocolError(
        `Peer playing '${this.symbol}' requested a move for '${message.player}'`
      );
    }
    // Errors from the engine (an out-of-bounds move) close the channel.
    this.bus.publish({
      type: 'MoveRequested',
      player: message.player,
      row: message.row,
      col: message.col,
    });
  }

  /**
   * Relay an engine event. Once the channel is closed this does nothing;
   * a failed write closes the channel, which reports the fault.
   */
  private forward(message: PeerMessage): void {
    try {
      this.channel.send(message);
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.logger.warn('Failed to relay game event', { type: message.type, error: error.message });
    }
  }

  private handleClose(info: ChannelCloseInfo): void {
    this.detach();
    if (this.disposed) {
      return;
    }
    this.logger.warn('Connection to remote peer lost', {
      reason: info.reason,
      error: info.error?.message,
    });
    this.bus.publish(networkFaultFromClose(info));
  }

  private detach(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}
