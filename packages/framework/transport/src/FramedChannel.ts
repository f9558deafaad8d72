/**
 * @fileoverview Framed message channel over a duplex byte stream.
 *
 * Turns a stream of bytes into a sequence of frames and back. Incoming
 * frames go either to the handlers registered for their type or, when there
 * are none, to an inbox that `receive` reads from. Synchronous protocol steps
 * (the role handshake) use `receive`; steady-state traffic uses handlers.
 *
 * A channel closes exactly once, for one of these reasons:
 * - `local`: `close()` was called
 * - `peer`: the peer sent a close frame
 * - `eof`: the stream ended without a close frame
 * - `error`: the stream failed or a frame could not be written
 * - `protocol`: a malformed frame arrived or a handler threw
 */

import type { Duplex } from 'node:stream';
import {
  CLOSE_FRAME_TYPE,
  decodeFrame,
  encodeFrame,
  type Frame,
  FrameDecodeError,
  isControlFrameType,
  ProtocolError,
} from '@turnlink/framework-protocol';
import { toError, TransportError } from './errors.js';
import { silentLogger, type TransportLogger } from './logger.js';

const NEWLINE = 0x0a;
const UTF8 = new TextDecoder('utf-8', { fatal: true });

export type ChannelCloseReason = 'local' | 'peer' | 'eof' | 'error' | 'protocol';

export interface ChannelCloseInfo {
  readonly reason: ChannelCloseReason;
  /** Set for `error` and `protocol` closes */
  readonly error?: Error;
}

export type FrameHandler = (frame: Frame) => void;

export type CloseListener = (info: ChannelCloseInfo) => void;

export interface ReceiveOptions {
  /** Wait for a frame when the inbox is empty (default true) */
  readonly block?: boolean;
  /** Give up after this many milliseconds and return null */
  readonly timeoutMs?: number;
}

export interface FramedChannelOptions {
  /** Name used in log entries */
  readonly label?: string;
  /** How long close waits for buffered writes to flush before destroying the stream */
  readonly closeLingerMs?: number;
  readonly logger?: TransportLogger;
}

interface PendingReceiver {
  readonly resolve: (frame: Frame | null) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

const DEFAULT_CLOSE_LINGER_MS = 250;

export class FramedChannel {
  private readonly handlers = new Map<string, readonly FrameHandler[]>();
  private readonly inbox: Frame[] = [];
  private readonly receivers: PendingReceiver[] = [];
  private readonly closeListeners: CloseListener[] = [];
  private readonly label: string;
  private readonly closeLingerMs: number;
  private readonly logger: TransportLogger;
  private buffer: Buffer = Buffer.alloc(0);
  private info: ChannelCloseInfo | null = null;

  constructor(
    private readonly stream: Duplex,
    options: FramedChannelOptions = {}
  ) {
    this.label = options.label ?? 'channel';
    this.closeLingerMs = options.closeLingerMs ?? DEFAULT_CLOSE_LINGER_MS;
    this.logger = options.logger ?? silentLogger;

    stream.on('data', this.handleData);
    stream.on('end', this.handleEnd);
    stream.on('error', this.handleStreamError);
    stream.on('close', this.handleStreamClose);
  }

  // ============ State ============

  get isClosed(): boolean {
    return this.info !== null;
  }

  /** Why the channel closed, or null while it is open */
  get closeInfo(): ChannelCloseInfo | null {
    return this.info;
  }

  // ============ Sending ============

  /**
   * Encode and write one frame. Does nothing once the channel is closed.
   * @throws {ProtocolError} if the frame uses a reserved control type
   * @throws {TransportError} if the frame cannot be written; the channel is closed
   */
  send(frame: Frame): void {
    if (this.info) {
      return;
    }
    if (isControlFrameType(frame.type)) {
      throw new ProtocolError(`Frame type '${frame.type}' is reserved for transport control`);
    }

    let line: string;
    try {
      line = encodeFrame(frame);
    } catch (error) {
      const failure = new TransportError(`Failed to encode frame '${frame.type}'`, {
        cause: error,
      });
      this.shutdown('error', failure);
      throw failure;
    }

    if (!this.stream.writable) {
      const failure = new TransportError('Stream is no longer writable');
      this.shutdown('error', failure);
      throw failure;
    }

    this.stream.write(line, (error) => {
      if (error) {
        this.shutdown('error', new TransportError('Write failed', { cause: error }));
      }
    });
  }

  // ============ Receiving ============

  /**
   * Take the next frame no handler claimed.
   * @returns The frame, or null if the channel is closed, the timeout elapsed,
   *   or `block` is false and the inbox is empty
   */
  receive(options: ReceiveOptions = {}): Promise<Frame | null> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.info || options.block === false) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const receiver: PendingReceiver = { resolve, timer: null };
      if (options.timeoutMs !== undefined) {
        receiver.timer = setTimeout(() => {
          this.removeReceiver(receiver);
          resolve(null);
        }, options.timeoutMs);
      }
      this.receivers.push(receiver);
    });
  }

  /**
   * Register a handler for a frame type. Frames of that type already waiting
   * in the inbox are handed to it immediately, in arrival order.
   * @returns Function that unregisters the handler
   */
  registerHandler(type: string, handler: FrameHandler): () => void {
    const unregister = (): void => {
      this.unregisterHandler(type, handler);
    };
    if (this.info) {
      return unregister;
    }

    const current = this.handlers.get(type) ?? [];
    this.handlers.set(type, [...current, handler]);

    const waiting = this.takeQueued(type);
    for (const frame of waiting) {
      if (!this.invoke(handler, frame)) {
        break;
      }
    }
    return unregister;
  }

  /**
   * Remove one registration of a handler.
   * @returns true if a registration was removed
   */
  unregisterHandler(type: string, handler: FrameHandler): boolean {
    const current = this.handlers.get(type);
    if (!current) {
      return false;
    }
    const index = current.indexOf(handler);
    if (index === -1) {
      return false;
    }
    const next = [...current.slice(0, index), ...current.slice(index + 1)];
    if (next.length === 0) {
      this.handlers.delete(type);
    } else {
      this.handlers.set(type, next);
    }
    return true;
  }

  /**
   * Be told when the channel closes. Called once; if the channel is already
   * closed the listener runs on the next microtask.
   * @returns Function that removes the listener
   */
  onClose(listener: CloseListener): () => void {
    const { info } = this;
    if (info) {
      queueMicrotask(() => listener(info));
      return () => {};
    }
    this.closeListeners.push(listener);
    return () => {
      const index = this.closeListeners.indexOf(listener);
      if (index !== -1) {
        this.closeListeners.splice(index, 1);
      }
    };
  }

  // ============ Closing ============

  /**
   * Close the channel and tell the peer. Safe to call more than once.
   */
  close(): void {
    this.shutdown('local');
  }

  private shutdown(reason: ChannelCloseReason, error?: Error): void {
    if (this.info) {
      return;
    }
    const info: ChannelCloseInfo = error ? { reason, error } : { reason };
    this.info = info;

    if (error) {
      this.logger.warn('Channel closed with error', {
        channel: this.label,
        reason,
        error: error.message,
      });
    } else {
      this.logger.debug('Channel closed', { channel: this.label, reason });
    }

    this.endStream(reason !== 'peer' && reason !== 'eof');
    this.detachReader();

    this.handlers.clear();
    this.inbox.length = 0;
    this.buffer = Buffer.alloc(0);

    const receivers = this.receivers.splice(0);
    for (const receiver of receivers) {
      if (receiver.timer) {
        clearTimeout(receiver.timer);
      }
      receiver.resolve(null);
    }

    const listeners = this.closeListeners.splice(0);
    for (const listener of listeners) {
      listener(info);
    }
  }

  /**
   * Half-close the stream, optionally after a close frame, and destroy it
   * once the write side has flushed or the linger time has passed.
   */
  private endStream(notifyPeer: boolean): void {
    const { stream } = this;
    if (!stream.writable) {
      stream.destroy();
      return;
    }

    const linger = setTimeout(() => {
      stream.destroy();
    }, this.closeLingerMs);
    linger.unref();

    stream.once('finish', () => {
      clearTimeout(linger);
      stream.destroy();
    });

    if (notifyPeer) {
      stream.end(encodeFrame({ type: CLOSE_FRAME_TYPE }));
    } else {
      stream.end();
    }
  }

  private detachReader(): void {
    this.stream.off('data', this.handleData);
    this.stream.off('end', this.handleEnd);
    this.stream.off('error', this.handleStreamError);
    this.stream.off('close', this.handleStreamClose);
    // The stream may still report a failed flush of the close frame.
    this.stream.on('error', this.handleLateError);
  }

  // ============ Read Path ============

  private readonly handleData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    let newline = this.buffer.indexOf(NEWLINE);
    while (newline !== -1 && !this.info) {
      const raw = this.buffer.subarray(0, newline);
      this.buffer = this.buffer.subarray(newline + 1);
      let line: string;
      try {
        line = UTF8.decode(raw);
      } catch (error) {
        this.shutdown(
          'protocol',
          new FrameDecodeError('invalid UTF-8', raw.toString('utf8'), { cause: error })
        );
        return;
      }
      if (line.trim().length > 0) {
        this.handleLine(line);
      }
      newline = this.buffer.indexOf(NEWLINE);
    }
  };

  private handleLine(line: string): void {
    let frame: Frame;
    try {
      frame = decodeFrame(line);
    } catch (error) {
      this.shutdown('protocol', toError(error));
      return;
    }

    if (frame.type === CLOSE_FRAME_TYPE) {
      this.shutdown('peer');
      return;
    }
    this.dispatch(frame);
  }

  private dispatch(frame: Frame): void {
    const snapshot = this.handlers.get(frame.type);
    if (!snapshot) {
      this.enqueue(frame);
      return;
    }
    for (const handler of snapshot) {
      if (!this.invoke(handler, frame) || this.info) {
        return;
      }
    }
  }

  /**
   * Run a handler; a throwing handler means the peers disagree about the
   * protocol, so the channel closes and the error goes to close listeners.
   * @returns false if the handler threw
   */
  private invoke(handler: FrameHandler, frame: Frame): boolean {
    try {
      handler(frame);
      return true;
    } catch (error) {
      this.shutdown('protocol', toError(error));
      return false;
    }
  }

  private enqueue(frame: Frame): void {
    const receiver = this.receivers.shift();
    if (receiver) {
      if (receiver.timer) {
        clearTimeout(receiver.timer);
      }
      receiver.resolve(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private takeQueued(type: string): Frame[] {
    const matching: Frame[] = [];
    const remaining: Frame[] = [];
    for (const frame of this.inbox) {
      (frame.type === type ? matching : remaining).push(frame);
    }
    this.inbox.splice(0, this.inbox.length, ...remaining);
    return matching;
  }

  private removeReceiver(receiver: PendingReceiver): void {
    const index = this.receivers.indexOf(receiver);
    if (index !== -1) {
      this.receivers.splice(index, 1);
    }
  }

  private readonly handleEnd = (): void => {
    this.shutdown('eof');
  };

  private readonly handleStreamError = (error: Error): void => {
    this.shutdown('error', new TransportError('Stream failed', { cause: error }));
  };

  private readonly handleStreamClose = (): void => {
    this.shutdown('eof');
  };

  private readonly handleLateError = (error: Error): void => {
    this.logger.debug('Stream error after close', { channel: this.label, error: error.message });
  };
}
