/**
 * @fileoverview Framework transport.
 *
 * Framed, newline-delimited JSON channels over duplex streams, and helpers
 * that establish the single connection between two peers over TCP or
 * WebSocket.
 */

export {
  connectToPeer,
  type ConnectOptions,
  listenForPeer,
  type ListenOptions,
  type TransportKind,
} from './establish.js';
export { NetworkError, TransportError, toError } from './errors.js';
export {
  type ChannelCloseInfo,
  type ChannelCloseReason,
  type CloseListener,
  FramedChannel,
  type FramedChannelOptions,
  type FrameHandler,
  type ReceiveOptions,
} from './FramedChannel.js';
export { silentLogger, type TransportLogger } from './logger.js';
