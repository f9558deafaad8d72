/**
 * @fileoverview Establishing the one connection between two peers.
 *
 * One peer listens and accepts exactly one connection; the other connects.
 * Both resolve to a plain duplex stream so `FramedChannel` runs the same way
 * over a TCP socket or a WebSocket.
 */

import { connect as connectTcp, createServer, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { createWebSocketStream, WebSocket, WebSocketServer } from 'ws';
import { NetworkError } from './errors.js';

export type TransportKind = 'tcp' | 'ws';

export interface ListenOptions {
  readonly transport?: TransportKind;
  readonly port: number;
  /** Interface to bind (default all interfaces) */
  readonly host?: string;
  /** Fail if no peer connects within this many milliseconds */
  readonly timeoutMs?: number;
  /** Called once listening, with the bound port */
  readonly onListening?: (port: number) => void;
}

export interface ConnectOptions {
  readonly transport?: TransportKind;
  readonly host: string;
  readonly port: number;
  /** Fail if the connection is not established within this many milliseconds */
  readonly timeoutMs?: number;
}

/**
 * Listen on a port and accept exactly one peer.
 * @throws {NetworkError} if listening fails or no peer connects in time
 */
export function listenForPeer(options: ListenOptions): Promise<Duplex> {
  return options.transport === 'ws' ? listenWebSocket(options) : listenTcp(options);
}

/**
 * Connect to a listening peer.
 * @throws {NetworkError} if the connection fails or times out
 */
export function connectToPeer(options: ConnectOptions): Promise<Duplex> {
  return options.transport === 'ws' ? connectWebSocket(options) : connectTcpPeer(options);
}

function describeEndpoint(host: string | undefined, port: number): string {
  return `${host ?? '0.0.0.0'}:${port}`;
}

// ============ TCP ============

function listenTcp(options: ListenOptions): Promise<Duplex> {
  const endpoint = describeEndpoint(options.host, options.port);

  return new Promise((resolve, reject) => {
    const server = createServer();
    server.maxConnections = 1;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const stop = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      server.removeAllListeners('connection');
      server.close();
    };

    server.once('connection', (socket: Socket) => {
      stop();
      resolve(socket);
    });

    server.once('error', (error: Error) => {
      stop();
      reject(new NetworkError(`Failed to listen on ${endpoint}`, { cause: error }));
    });

    server.listen(options.port, options.host, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : options.port;
      options.onListening?.(port);

      if (options.timeoutMs !== undefined) {
        const { timeoutMs } = options;
        timer = setTimeout(() => {
          stop();
          reject(new NetworkError(`No peer connected to ${endpoint} within ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  });
}

function connectTcpPeer(options: ConnectOptions): Promise<Duplex> {
  const endpoint = describeEndpoint(options.host, options.port);

  return new Promise((resolve, reject) => {
    const socket = connectTcp({ host: options.host, port: options.port });
    let timer: ReturnType<typeof setTimeout> | null = null;

    const onConnect = (): void => {
      cleanup();
      resolve(socket);
    };
    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(new NetworkError(`Failed to connect to ${endpoint}`, { cause: error }));
    };
    const cleanup = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      socket.off('connect', onConnect);
      socket.off('error', onError);
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);

    if (options.timeoutMs !== undefined) {
      const { timeoutMs } = options;
      timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new NetworkError(`Connecting to ${endpoint} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }
  });
}

// ============ WebSocket ============

function listenWebSocket(options: ListenOptions): Promise<Duplex> {
  const endpoint = describeEndpoint(options.host, options.port);

  return new Promise((resolve, reject) => {
    const wss = new WebSocketServer({ port: options.port, host: options.host });
    let timer: ReturnType<typeof setTimeout> | null = null;

    const stop = (): void => {
      if (timer) {
        clearTimeout(timer);
      }
      wss.removeAllListeners('connection');
      // Stops accepting; the accepted socket stays open.
      wss.close();
    };

    wss.once('connection', (ws: WebSocket) => {
      stop();
      resolve(createWebSocketStream(ws));
    });

    wss.once('error', (error: Error) => {
      stop();
      reject(new NetworkError(`Failed to listen on ${endpoint}`, { cause: error }));
    });

    wss.once('listening', () => {
      const address = wss.address();
      const port = typeof address === 'object' && address ? address.port : options.port;
      options.onListening?.(port);

      if (options.timeoutMs !== undefined) {
        const { timeoutMs } = options;
        timer = setTimeout(() => {
          stop();
          reject(new NetworkError(`No peer connected to ${endpoint} within ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  });
}

function connectWebSocket(options: ConnectOptions): Promise<Duplex> {
  const url = `ws://${options.host}:${options.port}`;

  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url);
    let timer: ReturnType<typeof setTimeout> | null = null;
    let settled = false;

    // Terminating a connecting socket emits 'error' again, so the listener
    // stays attached and only the first outcome counts.
    const settle = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      return true;
    };

    ws.once('open', () => {
      if (settle()) {
        resolve(createWebSocketStream(ws));
      }
    });

    ws.on('error', (error: Error) => {
      if (settle()) {
        reject(new NetworkError(`Failed to connect to ${url}`, { cause: error }));
      }
    });

    if (options.timeoutMs !== undefined) {
      const { timeoutMs } = options;
      timer = setTimeout(() => {
        if (settle()) {
          ws.terminate();
          reject(new NetworkError(`Connecting to ${url} timed out after ${timeoutMs}ms`));
        }
      }, timeoutMs);
    }
  });
}
