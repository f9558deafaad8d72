import { type Frame, ProtocolError } from '@turnlink/framework-protocol';
import type { ChannelCloseInfo } from '@turnlink/framework-transport';
import type { NetworkFaultEvent } from '../shared/events.js';
import {
  isPeerMessageType,
  type PeerMessage,
  type PeerMessageType,
  parsePeerMessage,
} from '../shared/protocol.js';

/**
 * Validate a frame routed to the handler for `type`.
 * @throws {ProtocolError} if the frame is not a valid message of that type
 */
export function expectMessage<T extends PeerMessageType>(
  frame: Frame,
  type: T
): Extract<PeerMessage, { type: T }> {
  const message = parsePeerMessage(frame);
  if (!message || !isPeerMessageType(message, type)) {
    throw new ProtocolError(`Invalid ${type} message`);
  }
  return message;
}

export function networkFaultFromClose(info: ChannelCloseInfo): NetworkFaultEvent {
  const detail = info.error ? `: ${info.error.message}` : '';
  return {
    type: 'NetworkFault',
    reason: info.reason,
    message: `Connection to peer closed (${info.reason})${detail}`,
  };
}
