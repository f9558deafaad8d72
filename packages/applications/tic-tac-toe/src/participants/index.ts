/**
 * @fileoverview Participant variants and the factory the session uses.
 *
 * A participant is whatever produces moves for one symbol on this peer: a
 * local input adapter, an AI policy, or a network bridge standing in for the
 * remote player. Every variant carries a `kind` tag.
 */

import type { AuthoritativeBridge } from '../network/AuthoritativeBridge.js';
import type { RelayBridge } from '../network/RelayBridge.js';
import type { GameBus } from '../shared/events.js';
import type { PlayerSymbol } from '../shared/types.js';
import type { FaultHandler } from './AiParticipant.js';
import { LocalParticipant } from './LocalParticipant.js';
import { OptimalAiParticipant } from './OptimalAiParticipant.js';
import { RandomAiParticipant } from './RandomAiParticipant.js';

export { AiParticipant, type AiPolicy, type FaultHandler, NoMoveAvailableError } from './AiParticipant.js';
export { LocalParticipant } from './LocalParticipant.js';
export { chooseOptimalMove, OptimalAiParticipant, type OptimalAiOptions } from './OptimalAiParticipant.js';
export { RandomAiParticipant, type RandomAiOptions } from './RandomAiParticipant.js';

export type Participant =
  | LocalParticipant
  | RandomAiParticipant
  | OptimalAiParticipant
  | AuthoritativeBridge
  | RelayBridge;

export type ParticipantKind = Participant['kind'];

/** Policy for a player on this peer */
export type ParticipantSpec =
  | { readonly kind: 'human' }
  | { readonly kind: 'random-ai'; readonly random?: () => number }
  | { readonly kind: 'optimal-ai' };

/** A player on this peer: the local input adapter or an AI */
export type LocalPlayer = LocalParticipant | RandomAiParticipant | OptimalAiParticipant;

export interface ParticipantContext {
  readonly bus: GameBus;
  readonly symbol: PlayerSymbol;
  readonly onFault?: FaultHandler;
}

export function createParticipant(spec: ParticipantSpec, context: ParticipantContext): LocalPlayer {
  const { bus, symbol, onFault } = context;
  switch (spec.kind) {
    case 'human':
      return new LocalParticipant(bus, symbol);
    case 'random-ai':
      return new RandomAiParticipant(bus, symbol, { random: spec.random, onFault });
    case 'optimal-ai':
      return new OptimalAiParticipant(bus, symbol, { onFault });
  }
}
