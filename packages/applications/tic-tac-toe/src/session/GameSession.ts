/**
 * @fileoverview One game, wired up: a bus, a turn engine and a participant
 * per symbol.
 *
 * - `local`: both players on this peer; the engine is the authority.
 * - `host`: this peer is the authority and plays one symbol; an
 *   `AuthoritativeBridge` plays the other for the remote peer.
 * - `join`: this peer mirrors the host's board; a `RelayBridge` learns which
 *   symbol this side plays and forwards its moves.
 *
 * `dispose()` tears everything down and is safe on every exit path.
 */

import { EventBus } from '@turnlink/framework-events';
import { type FramedChannel, NetworkError } from '@turnlink/framework-transport';
import { otherSymbol } from '../engine/board.js';
import { type GameOutcome, TurnEngine } from '../engine/TurnEngine.js';
import { AuthoritativeBridge } from '../network/AuthoritativeBridge.js';
import { RelayBridge } from '../network/RelayBridge.js';
import {
  createParticipant,
  type FaultHandler,
  type LocalPlayer,
  type Participant,
  type ParticipantSpec,
} from '../participants/index.js';
import type { GameBus, GameEvent, NetworkFaultEvent } from '../shared/events.js';
import type { PlayerSymbol } from '../shared/types.js';
import type { Logger } from '../utils/logger.js';

export type SessionRole = 'local' | 'host' | 'join';

export interface LocalSessionOptions {
  readonly playerX: ParticipantSpec;
  readonly playerO: ParticipantSpec;
  readonly onFault?: FaultHandler;
}

export interface HostSessionOptions {
  readonly channel: FramedChannel;
  readonly localPlayer: ParticipantSpec;
  /** Symbol this peer plays; picked at random when omitted */
  readonly localSymbol?: PlayerSymbol;
  readonly handshakeTimeoutMs?: number;
  /** Source of numbers in [0, 1) for the symbol pick (default Math.random) */
  readonly random?: () => number;
  readonly onFault?: FaultHandler;
  readonly logger?: Logger;
}

export interface JoinSessionOptions {
  readonly channel: FramedChannel;
  readonly localPlayer: ParticipantSpec;
  readonly handshakeTimeoutMs?: number;
  readonly onFault?: FaultHandler;
  readonly logger?: Logger;
}

export class GameSession {
  private readonly participantList: Participant[] = [];
  private readonly faultWaiters: ((error: NetworkError) => void)[] = [];
  private fault: NetworkFaultEvent | null = null;
  private disposed = false;

  private constructor(
    readonly role: SessionRole,
    readonly bus: GameBus,
    readonly engine: TurnEngine
  ) {
    bus.subscribe('NetworkFault', (event) => this.handleFault(event));
  }

  // ============ Static Constructors ============

  /**
   * Both players on this peer.
   */
  static local(options: LocalSessionOptions): GameSession {
    const bus = new EventBus<GameEvent>();
    const session = new GameSession('local', bus, new TurnEngine(bus));
    session.participantList.push(
      createParticipant(options.playerX, { bus, symbol: 'X', onFault: options.onFault }),
      createParticipant(options.playerO, { bus, symbol: 'O', onFault: options.onFault })
    );
    return session;
  }

  /**
   * Authoritative peer: assigns the remote peer its symbol over `channel`.
   * @throws {NetworkError} or {ProtocolError} if the handshake fails; the channel is closed
   */
  static async host(options: HostSessionOptions): Promise<GameSession> {
    const localSymbol = options.localSymbol ?? pickSymbol(options.random ?? Math.random);
    const bus = new EventBus<GameEvent>();
    const session = new GameSession('host', bus, new TurnEngine(bus));
    session.participantList.push(
      createParticipant(options.localPlayer, { bus, symbol: localSymbol, onFault: options.onFault })
    );

    try {
      const bridge = await AuthoritativeBridge.open({
        bus,
        channel: options.channel,
        symbol: otherSymbol(localSymbol),
        handshakeTimeoutMs: options.handshakeTimeoutMs,
        logger: options.logger,
      });
      session.participantList.push(bridge);
    } catch (error) {
      session.dispose();
      throw error;
    }
    return session;
  }

  /**
   * Relay peer: plays whichever symbol the host assigns.
   * @throws {NetworkError} or {ProtocolError} if the handshake fails; the channel is closed
   */
  static async join(options: JoinSessionOptions): Promise<GameSession> {
    const bus = new EventBus<GameEvent>();
    const session = new GameSession('join', bus, new TurnEngine(bus, { mode: 'mirror' }));

    try {
      const bridge = await RelayBridge.open({
        bus,
        channel: options.channel,
        handshakeTimeoutMs: options.handshakeTimeoutMs,
        logger: options.logger,
        onRoleAssigned: (symbol) => {
          session.participantList.push(
            createParticipant(options.localPlayer, { bus, symbol, onFault: options.onFault })
          );
        },
      });
      session.participantList.push(bridge);
    } catch (error) {
      session.dispose();
      throw error;
    }
    return session;
  }

  // ============ Getters ============

  get participants(): readonly Participant[] {
    return this.participantList;
  }

  /** The participant playing for this peer (the first in local games) */
  get localPlayer(): LocalPlayer | undefined {
    return this.participantList.find(isLocalPlayer);
  }

  /** Participant playing `symbol`, if any */
  participantFor(symbol: PlayerSymbol): Participant | undefined {
    return this.participantList.find((participant) => participant.symbol === symbol);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ============ Lifecycle ============

  /**
   * Give X the first turn. The joining peer waits for the host instead.
   */
  start(): void {
    if (this.engine.mode === 'authority') {
      this.engine.start();
    }
  }

  /**
   * Resolves with the outcome once the game is won or drawn.
   * @throws {NetworkError} if the peer is lost before that
   */
  whenFinished(): Promise<GameOutcome> {
    return new Promise((resolve, reject) => {
      const { fault } = this;
      if (fault) {
        reject(faultToError(fault));
        return;
      }
      this.faultWaiters.push(reject);
      this.engine.whenFinished().then(resolve, reject);
    });
  }

  /**
   * Release the bridge, the participants, the engine and the bus.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const participant of this.participantList) {
      participant.dispose();
    }
    this.engine.dispose();
    this.bus.clear();
  }

  private handleFault(event: NetworkFaultEvent): void {
    // The peer hanging up after the last move does not spoil the result.
    if (this.fault || this.engine.isFinished) {
      return;
    }
    this.fault = event;
    const error = faultToError(event);
    for (const reject of this.faultWaiters.splice(0)) {
      reject(error);
    }
  }
}

function isLocalPlayer(participant: Participant): participant is LocalPlayer {
  return participant.kind === 'local' || participant.kind === 'ai';
}

function faultToError(event: NetworkFaultEvent): NetworkError {
  return new NetworkError(event.message);
}

function pickSymbol(random: () => number): PlayerSymbol {
  return random() < 0.5 ? 'X' : 'O';
}
