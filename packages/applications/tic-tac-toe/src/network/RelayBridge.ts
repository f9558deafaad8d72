/**
 * @fileoverview Client side of the network bridge.
 *
 * The relay peer never applies moves itself. Its own `MoveRequested` events
 * go to the authority as `move_request` frames, and the authority's
 * `state_update`, `start_turn` and `invalid_move` frames come back as local
 * bus events for the mirror engine, the participants and the front end.
 */

import {
  type ChannelCloseInfo,
  type FramedChannel,
  NetworkError,
  TransportError,
} from '@turnlink/framework-transport';
import type { GameBus, MoveRequestedEvent } from '../shared/events.js';
import type { PlayerSymbol } from '../shared/types.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { acceptRole, DEFAULT_HANDSHAKE_TIMEOUT_MS } from './handshake.js';
import { expectMessage, networkFaultFromClose } from './messages.js';

export interface RelayBridgeOptions {
  readonly bus: GameBus;
  readonly channel: FramedChannel;
  readonly handshakeTimeoutMs?: number;
  /** Runs with the assigned symbol before any game frame is relayed */
  readonly onRoleAssigned?: (symbol: PlayerSymbol) => void;
  readonly logger?: Logger;
}

export class RelayBridge {
  readonly kind = 'network-relay';
  private readonly unsubscribers: (() => void)[] = [];
  private unsubscribeMoves: (() => void) | null = null;
  private disposed = false;

  private constructor(
    private readonly bus: GameBus,
    private readonly channel: FramedChannel,
    readonly symbol: PlayerSymbol,
    private readonly logger: Logger
  ) {}

  /**
   * Wait for the authority to assign this peer its symbol, acknowledge it and
   * start relaying.
   * @throws {NetworkError} if no assignment arrives in time or the channel closes
   * @throws {ProtocolError} if the assignment is malformed or names an unknown role
   */
  static async open(options: RelayBridgeOptions): Promise<RelayBridge> {
    const { bus, channel } = options;
    const logger = options.logger ?? defaultLogger;
    let bridge: RelayBridge;

    try {
      bridge = await acceptRole(
        channel,
        options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
        (symbol) => {
          options.onRoleAssigned?.(symbol);
          // Handlers go in before the ack so no game frame can slip past them.
          const attached = new RelayBridge(bus, channel, symbol, logger);
          attached.attach();
          return attached;
        }
      );
    } catch (error) {
      channel.close();
      throw error;
    }

    logger.info('Assigned role by host', { role: bridge.symbol });
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
    this.unsubscribeMoves?.();
    this.channel.close();
  }

  private attach(): void {
    const { bus, channel } = this;

    this.unsubscribers.push(
      channel.registerHandler('state_update', (frame) => {
        const message = expectMessage(frame, 'state_update');
        bus.publish({
          type: 'StateUpdated',
          board: message.board,
          currentPlayer: message.currentPlayer,
          winner: message.winner,
          isDraw: message.isDraw,
          moveCount: message.moveCount,
        });
      }),
      channel.registerHandler('start_turn', (frame) => {
        const message = expectMessage(frame, 'start_turn');
        bus.publish({ type: 'StartTurn', board: message.board, currentPlayer: message.currentPlayer });
      }),
      channel.registerHandler('invalid_move', (frame) => {
        const message = expectMessage(frame, 'invalid_move');
        bus.publish({
          type: 'InvalidMove',
          player: message.player,
          row: message.row,
          col: message.col,
          reason: message.reason,
          message: message.message,
        });
      }),
      channel.onClose((info) => this.handleClose(info))
    );

    // Outlives the channel so a move made after the peer is gone fails loudly.
    this.unsubscribeMoves = bus.subscribe('MoveRequested', (event) => this.sendMove(event));
  }

  /**
   * @throws {NetworkError} if the move cannot reach the authority
   */
  private sendMove(event: MoveRequestedEvent): void {
    if (event.player !== this.symbol) {
      return;
    }
    if (this.channel.isClosed) {
      throw new NetworkError('Cannot send move: connection to host is closed');
    }
    try {
      this.channel.send({ type: 'move_request', player: event.player, row: event.row, col: event.col });
    } catch (error) {
      if (error instanceof TransportError) {
        throw new NetworkError('Failed to send move to host', { cause: error });
      }
      throw error;
    }
  }

  private handleClose(info: ChannelCloseInfo): void {
    this.detach();
    if (this.disposed) {
      return;
    }
    this.logger.warn('Connection to host lost', {
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
