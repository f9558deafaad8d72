import { FrameDecodeError, ProtocolError } from '@turnlink/framework-protocol';
import { createMockConnectionPair, type MockConnection } from '@turnlink/framework-testing';
import { describe, expect, it, vi } from 'vitest';
import { type ChannelCloseInfo, FramedChannel, TransportError } from '../src/index.js';

interface Channels {
  host: FramedChannel;
  client: FramedChannel;
  hostConnection: MockConnection;
  clientConnection: MockConnection;
}

function createChannels(): Channels {
  const { host: hostConnection, client: clientConnection } = createMockConnectionPair();
  return {
    host: new FramedChannel(hostConnection, { label: 'host' }),
    client: new FramedChannel(clientConnection, { label: 'client' }),
    hostConnection,
    clientConnection,
  };
}

function nextClose(channel: FramedChannel): Promise<ChannelCloseInfo> {
  return new Promise((resolve) => {
    channel.onClose(resolve);
  });
}

describe('FramedChannel', () => {
  describe('send / receive', () => {
    it('should deliver a frame to the peer inbox', async () => {
      const { host, client } = createChannels();

      host.send({ type: 'ping', n: 1 });

      await expect(client.receive({ timeoutMs: 1000 })).resolves.toEqual({ type: 'ping', n: 1 });
    });

    it('should write one delimited line per frame', () => {
      const { host, hostConnection } = createChannels();

      host.send({ type: 'ping', n: 1 });
      host.send({ type: 'pong', n: 2 });

      expect(hostConnection.sentMessages).toEqual(['{"type":"ping","n":1}', '{"type":"pong","n":2}']);
    });

    it('should deliver frames in the order they were sent', async () => {
      const { host, client } = createChannels();

      for (const n of [1, 2, 3]) {
        host.send({ type: 'seq', n });
      }

      const received = [
        await client.receive({ timeoutMs: 1000 }),
        await client.receive({ timeoutMs: 1000 }),
        await client.receive({ timeoutMs: 1000 }),
      ];
      expect(received.map((frame) => frame?.['n'])).toEqual([1, 2, 3]);
    });

    it('should reassemble frames split across chunks', async () => {
      const { client, clientConnection } = createChannels();

      clientConnection.injectRaw('{"type":"pi');
      clientConnection.injectRaw('ng"}\n{"type":"po');
      clientConnection.injectRaw('ng"}\n');

      await expect(client.receive({ timeoutMs: 1000 })).resolves.toEqual({ type: 'ping' });
      await expect(client.receive({ timeoutMs: 1000 })).resolves.toEqual({ type: 'pong' });
    });

    it('should decode multi-byte characters split across chunks', async () => {
      const { client, clientConnection } = createChannels();
      const bytes = Buffer.from('{"type":"note","text":"é"}\n', 'utf8');
      const splitAt = bytes.indexOf(0xc3) + 1;

      clientConnection.injectRaw(bytes.subarray(0, splitAt));
      clientConnection.injectRaw(bytes.subarray(splitAt));

      await expect(client.receive({ timeoutMs: 1000 })).resolves.toEqual({
        type: 'note',
        text: 'é',
      });
    });

    it('should skip empty lines', async () => {
      const { client, clientConnection } = createChannels();

      clientConnection.injectRaw('\n\n{"type":"ping"}\n');

      await expect(client.receive({ timeoutMs: 1000 })).resolves.toEqual({ type: 'ping' });
    });

    it('should return null without blocking when the inbox is empty', async () => {
      const { client } = createChannels();
      await expect(client.receive({ block: false })).resolves.toBeNull();
    });

    it('should return null when the timeout elapses', async () => {
      const { client } = createChannels();
      await expect(client.receive({ timeoutMs: 20 })).resolves.toBeNull();
    });

    it('should refuse reserved control frame types without closing', () => {
      const { host } = createChannels();

      expect(() => host.send({ type: '$close' })).toThrow(ProtocolError);
      expect(host.isClosed).toBe(false);
    });

    it('should throw TransportError and close when a frame cannot be encoded', () => {
      const { host } = createChannels();

      expect(() => host.send({ type: 'big', value: 1n })).toThrow(TransportError);
      expect(host.closeInfo?.reason).toBe('error');
    });

    it('should throw TransportError and close when the stream is not writable', () => {
      const { host, hostConnection } = createChannels();
      hostConnection.end();

      expect(() => host.send({ type: 'ping' })).toThrow(TransportError);
      expect(host.closeInfo?.reason).toBe('error');
    });
  });

  describe('handlers', () => {
    it('should dispatch frames to the handler for their type instead of the inbox', async () => {
      const { host, client } = createChannels();
      const onMove = vi.fn();
      client.registerHandler('move', onMove);

      host.send({ type: 'move', cell: 4 });
      host.send({ type: 'other' });

      await expect(client.receive({ timeoutMs: 1000 })).resolves.toEqual({ type: 'other' });
      expect(onMove).toHaveBeenCalledTimes(1);
      expect(onMove).toHaveBeenCalledWith({ type: 'move', cell: 4 });
      await expect(client.receive({ block: false })).resolves.toBeNull();
    });

    it('should call every handler of a type in registration order', async () => {
      const { host, client } = createChannels();
      const calls: string[] = [];
      client.registerHandler('move', () => calls.push('first'));
      client.registerHandler('move', () => calls.push('second'));

      host.send({ type: 'move' });

      await vi.waitFor(() => expect(calls).toEqual(['first', 'second']));
    });

    it('should hand queued frames of the type to a newly registered handler', async () => {
      const { host, client } = createChannels();
      const sentinel = new Promise<void>((resolve) => {
        client.registerHandler('sentinel', () => resolve());
      });

      host.send({ type: 'assign', n: 1 });
      host.send({ type: 'other' });
      host.send({ type: 'assign', n: 2 });
      host.send({ type: 'sentinel' });
      await sentinel;

      const onAssign = vi.fn();
      client.registerHandler('assign', onAssign);

      expect(onAssign.mock.calls).toEqual([[{ type: 'assign', n: 1 }], [{ type: 'assign', n: 2 }]]);
      await expect(client.receive({ block: false })).resolves.toEqual({ type: 'other' });
    });

    it('should route frames to the inbox again after the handler is unregistered', async () => {
      const { host, client } = createChannels();
      const onMove = vi.fn();
      const unregister = client.registerHandler('move', onMove);

      unregister();
      host.send({ type: 'move' });

      await expect(client.receive({ timeoutMs: 1000 })).resolves.toEqual({ type: 'move' });
      expect(onMove).not.toHaveBeenCalled();
    });

    it('should report whether unregisterHandler removed anything', () => {
      const { client } = createChannels();
      const handler = vi.fn();
      client.registerHandler('move', handler);

      expect(client.unregisterHandler('move', handler)).toBe(true);
      expect(client.unregisterHandler('move', handler)).toBe(false);
    });

    it('should close with a protocol error when a handler throws', async () => {
      const { host, client } = createChannels();
      client.registerHandler('boom', () => {
        throw new Error('bad handler');
      });
      const closed = nextClose(client);

      host.send({ type: 'boom' });

      const info = await closed;
      expect(info.reason).toBe('protocol');
      expect(info.error?.message).toBe('bad handler');
    });
  });

  describe('closing', () => {
    it('should send a close frame and close the peer with reason peer', async () => {
      const { host, client, hostConnection } = createChannels();
      const clientClosed = nextClose(client);

      host.close();

      await expect(clientClosed).resolves.toEqual({ reason: 'peer' });
      expect(host.closeInfo).toEqual({ reason: 'local' });
      expect(hostConnection.sentMessages).toEqual(['{"type":"$close"}']);
    });

    it('should close with reason eof when the stream ends without a close frame', async () => {
      const { client, hostConnection } = createChannels();
      const clientClosed = nextClose(client);

      hostConnection.end();

      await expect(clientClosed).resolves.toEqual({ reason: 'eof' });
    });

    it('should close with a protocol error on a malformed frame', async () => {
      const { host, client, clientConnection } = createChannels();
      const clientClosed = nextClose(client);
      const hostClosed = nextClose(host);

      clientConnection.injectRaw('not json\n');

      const info = await clientClosed;
      expect(info.reason).toBe('protocol');
      expect(info.error).toBeInstanceOf(FrameDecodeError);
      await expect(hostClosed).resolves.toEqual({ reason: 'peer' });
    });

    it('should close with a protocol error on a frame that is not valid UTF-8', async () => {
      const { client, clientConnection } = createChannels();
      const clientClosed = nextClose(client);

      clientConnection.injectRaw(
        Buffer.concat([
          Buffer.from('{"type":"t","s":"', 'utf8'),
          Buffer.from([0xff, 0xfe]),
          Buffer.from('"}\n', 'utf8'),
        ])
      );

      const info = await clientClosed;
      expect(info.reason).toBe('protocol');
      expect(info.error).toBeInstanceOf(FrameDecodeError);
      expect(info.error?.message).toBe('Invalid frame: invalid UTF-8');
      await expect(client.receive({ block: false })).resolves.toBeNull();
    });

    it('should ignore frames that follow a close frame', async () => {
      const { client, clientConnection } = createChannels();
      const onLate = vi.fn();
      client.registerHandler('late', onLate);
      const clientClosed = nextClose(client);

      clientConnection.injectRaw('{"type":"$close"}\n{"type":"late"}\n');

      await expect(clientClosed).resolves.toEqual({ reason: 'peer' });
      expect(onLate).not.toHaveBeenCalled();
    });

    it('should release blocked receivers with null', async () => {
      const { client } = createChannels();
      const pending = client.receive();

      client.close();

      await expect(pending).resolves.toBeNull();
    });

    it('should drop queued frames on close', async () => {
      const { host, client } = createChannels();
      const sentinel = new Promise<void>((resolve) => {
        client.registerHandler('sentinel', () => resolve());
      });
      host.send({ type: 'queued' });
      host.send({ type: 'sentinel' });
      await sentinel;

      client.close();

      await expect(client.receive({ block: false })).resolves.toBeNull();
    });

    it('should ignore sends after close', () => {
      const { host, hostConnection } = createChannels();

      host.close();
      host.send({ type: 'late' });

      expect(hostConnection.sentMessages).toEqual(['{"type":"$close"}']);
    });

    it('should run cleanup once when closed twice', () => {
      const { host, hostConnection } = createChannels();
      const listener = vi.fn();
      host.onClose(listener);

      host.close();
      host.close();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(hostConnection.sentMessages).toEqual(['{"type":"$close"}']);
    });

    it('should tell late close listeners on the next microtask', async () => {
      const { host } = createChannels();
      host.close();
      const listener = vi.fn();

      host.onClose(listener);
      expect(listener).not.toHaveBeenCalled();

      await Promise.resolve();
      expect(listener).toHaveBeenCalledWith({ reason: 'local' });
    });

    it('should not call a close listener that was removed', () => {
      const { host } = createChannels();
      const listener = vi.fn();
      const remove = host.onClose(listener);

      remove();
      host.close();

      expect(listener).not.toHaveBeenCalled();
    });

    it('should destroy the stream once the close frame is flushed', async () => {
      const { host, hostConnection } = createChannels();

      host.close();

      await vi.waitFor(() => expect(hostConnection.isClosed).toBe(true));
    });
  });
});
