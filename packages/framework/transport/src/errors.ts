/**
 * Error raised when a frame cannot be written: the value does not encode,
 * or the stream is no longer writable. The channel is closed when this is
 * thrown.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Error raised when the peer cannot be reached: connection setup failed or
 * timed out, the handshake timed out, or a message that needs delivery was
 * sent on a closed channel.
 */
export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
