import { createMockConnectionPair } from '@turnlink/framework-testing';
import { FramedChannel, NetworkError } from '@turnlink/framework-transport';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { LocalParticipant } from '../../src/participants/LocalParticipant.js';
import { GameSession } from '../../src/session/GameSession.js';
import type { EnableInputEvent } from '../../src/shared/events.js';

const sessions: GameSession[] = [];

function track(session: GameSession): GameSession {
  sessions.push(session);
  return session;
}

function createChannels(): { host: FramedChannel; client: FramedChannel } {
  const { host, client } = createMockConnectionPair();
  return {
    host: new FramedChannel(host, { label: 'host' }),
    client: new FramedChannel(client, { label: 'client' }),
  };
}

describe('GameSession', () => {
  afterEach(() => {
    for (const session of sessions.splice(0)) {
      session.dispose();
    }
  });

  describe('local', () => {
    it('should draw every game between two optimal players', async () => {
      const session = track(
        GameSession.local({ playerX: { kind: 'optimal-ai' }, playerO: { kind: 'optimal-ai' } })
      );

      session.start();
      const outcome = await session.whenFinished();

      expect(outcome.winner).toBeNull();
      expect(outcome.isDraw).toBe(true);
      expect(session.engine.moveCount).toBe(9);
    });

    it('should finish every random game with a win or a draw within nine moves', async () => {
      for (let game = 0; game < 50; game++) {
        const session = track(
          GameSession.local({ playerX: { kind: 'random-ai' }, playerO: { kind: 'random-ai' } })
        );

        session.start();
        const outcome = await session.whenFinished();

        expect(outcome.winner !== null || outcome.isDraw).toBe(true);
        expect(session.engine.moveCount).toBeGreaterThanOrEqual(5);
        expect(session.engine.moveCount).toBeLessThanOrEqual(9);
      }
    });

    it('should replay the same game from the same number source', async () => {
      const first = () => 0;
      const session = track(
        GameSession.local({
          playerX: { kind: 'random-ai', random: first },
          playerO: { kind: 'random-ai', random: first },
        })
      );

      session.start();
      const outcome = await session.whenFinished();

      // Both always take the first empty cell; X completes the anti-diagonal.
      expect(outcome).toEqual({
        winner: 'X',
        isDraw: false,
        board: [
          ['X', 'O', 'X'],
          ['O', 'X', 'O'],
          ['X', null, null],
        ],
      });
      expect(session.engine.moveCount).toBe(7);
    });

    it('should wait for a human player to submit a move', async () => {
      const session = track(
        GameSession.local({ playerX: { kind: 'human' }, playerO: { kind: 'optimal-ai' } })
      );
      const enabled: EnableInputEvent[] = [];
      session.bus.subscribe('EnableInput', (event) => {
        enabled.push(event);
      });

      session.start();
      expect(enabled).toEqual([{ type: 'EnableInput', player: 'X' }]);

      const human = session.localPlayer;
      if (!(human instanceof LocalParticipant)) {
        throw new Error('expected a local participant for X');
      }
      human.submitMove(1, 1);

      await vi.waitFor(() => {
        expect(session.engine.moveCount).toBe(2);
      });
      expect(enabled).toHaveLength(2);
      expect(human.isAwaitingInput).toBe(true);
    });

    it('should list one participant per symbol', () => {
      const session = track(
        GameSession.local({ playerX: { kind: 'human' }, playerO: { kind: 'random-ai' } })
      );

      expect(session.role).toBe('local');
      expect(session.participantFor('X')?.kind).toBe('local');
      expect(session.participantFor('O')?.kind).toBe('ai');
    });
  });

  describe('host and join', () => {
    it('should play a full game over a channel with mirrored boards', async () => {
      const { host, client } = createChannels();
      const [hostSession, joinSession] = await Promise.all([
        GameSession.host({ channel: host, localPlayer: { kind: 'optimal-ai' }, localSymbol: 'X' }),
        GameSession.join({ channel: client, localPlayer: { kind: 'optimal-ai' } }),
      ]);
      track(hostSession);
      track(joinSession);

      expect(joinSession.localPlayer?.symbol).toBe('O');
      expect(hostSession.participantFor('O')?.kind).toBe('network-authoritative');
      expect(joinSession.participantFor('O')?.kind).toBe('ai');

      hostSession.start();
      joinSession.start();
      const [hostOutcome, joinOutcome] = await Promise.all([
        hostSession.whenFinished(),
        joinSession.whenFinished(),
      ]);

      expect(hostOutcome.isDraw).toBe(true);
      expect(joinOutcome).toEqual(hostOutcome);
      expect(joinSession.engine.snapshot()).toEqual(hostSession.engine.snapshot());
    });

    it('should pick the host symbol from its number source when none is given', async () => {
      const { host, client } = createChannels();
      const [hostSession, joinSession] = await Promise.all([
        GameSession.host({ channel: host, localPlayer: { kind: 'optimal-ai' }, random: () => 0.7 }),
        GameSession.join({ channel: client, localPlayer: { kind: 'human' } }),
      ]);
      track(hostSession);
      track(joinSession);

      expect(hostSession.localPlayer?.symbol).toBe('O');
      expect(joinSession.localPlayer?.symbol).toBe('X');
    });

    it('should keep the result when the host leaves after the last move', async () => {
      const { host, client } = createChannels();
      const [hostSession, joinSession] = await Promise.all([
        GameSession.host({ channel: host, localPlayer: { kind: 'optimal-ai' }, localSymbol: 'O' }),
        GameSession.join({ channel: client, localPlayer: { kind: 'optimal-ai' } }),
      ]);
      track(joinSession);

      hostSession.start();
      await hostSession.whenFinished();
      const joined = joinSession.whenFinished();
      await vi.waitFor(() => {
        expect(joinSession.engine.isFinished).toBe(true);
      });
      hostSession.dispose();

      await expect(joined).resolves.toMatchObject({ isDraw: true });
    });

    it('should fail the game when the peer is lost mid-game', async () => {
      const { host, client } = createChannels();
      const [hostSession, joinSession] = await Promise.all([
        GameSession.host({ channel: host, localPlayer: { kind: 'human' }, localSymbol: 'X' }),
        GameSession.join({ channel: client, localPlayer: { kind: 'human' } }),
      ]);
      track(joinSession);
      const finished = joinSession.whenFinished();

      hostSession.start();
      hostSession.dispose();

      await expect(finished).rejects.toThrow(new NetworkError('Connection to peer closed (peer)'));
      await expect(joinSession.whenFinished()).rejects.toBeInstanceOf(NetworkError);
    });

    it('should surface a failed move when the host is gone', async () => {
      const { host, client } = createChannels();
      const [hostSession, joinSession] = await Promise.all([
        GameSession.host({ channel: host, localPlayer: { kind: 'human' }, localSymbol: 'X' }),
        GameSession.join({ channel: client, localPlayer: { kind: 'human' } }),
      ]);
      track(joinSession);
      const human = joinSession.localPlayer;
      if (!(human instanceof LocalParticipant)) {
        throw new Error('expected a local participant for O');
      }

      hostSession.dispose();
      await vi.waitFor(() => {
        expect(client.isClosed).toBe(true);
      });

      expect(() => human.submitMove(0, 0)).toThrow(NetworkError);
    });

    it('should close the channel when the handshake times out', async () => {
      const { client } = createChannels();

      await expect(
        GameSession.join({ channel: client, localPlayer: { kind: 'human' }, handshakeTimeoutMs: 20 })
      ).rejects.toThrow(new NetworkError('No role assignment within 20ms'));
      expect(client.isClosed).toBe(true);
    });
  });

  it('should be safe to dispose twice', () => {
    const session = GameSession.local({ playerX: { kind: 'human' }, playerO: { kind: 'human' } });

    session.dispose();
    session.dispose();

    expect(session.isDisposed).toBe(true);
  });
});
