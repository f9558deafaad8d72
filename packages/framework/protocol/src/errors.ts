/**
 * Error thrown when a peer violates the protocol: a frame that does not match
 * its schema, a message arriving out of order, or a reserved type used by an
 * application. Always fatal for the channel it was detected on.
 */
export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/**
 * Error thrown when a line read from the wire is not a valid frame.
 */
export class FrameDecodeError extends ProtocolError {
  constructor(
    message: string,
    readonly line: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid frame: ${message}`, options);
    this.name = 'FrameDecodeError';
  }
}
