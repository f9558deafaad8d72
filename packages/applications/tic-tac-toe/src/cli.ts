/**
 * @fileoverview `turnlink` entry point: runs one game and exits.
 *
 * Exit codes: 0 game finished, 1 connection or handshake failure,
 * 2 bad command line or configuration.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  connectToPeer,
  FramedChannel,
  listenForPeer,
  NetworkError,
  toError,
} from '@turnlink/framework-transport';
import { CliUsageError, type CliOptions, parseCliArgs, resolveCliOptions, USAGE } from './cliArgs.js';
import { InvalidConfigError, loadGameConfig } from './config/gameConfig.js';
import { BoardLogger } from './session/BoardLogger.js';
import { GameSession } from './session/GameSession.js';
import { logger } from './utils/logger.js';

async function openSession(options: CliOptions): Promise<GameSession> {
  if (options.mode === 'local') {
    return GameSession.local({ playerX: options.playerX, playerO: options.playerO });
  }

  const { network } = options;
  if (options.mode === 'host') {
    const stream = await listenForPeer({
      transport: network.transport,
      host: network.host,
      port: network.port,
      timeoutMs: network.acceptTimeoutMs,
      onListening: (port) => logger.info('Waiting for a peer', { transport: network.transport, port }),
    });
    const channel = new FramedChannel(stream, {
      label: 'host',
      closeLingerMs: network.closeLingerMs,
      logger,
    });
    return GameSession.host({
      channel,
      localPlayer: options.player,
      localSymbol: options.symbol,
      handshakeTimeoutMs: network.handshakeTimeoutMs,
    });
  }

  const stream = await connectToPeer({
    transport: network.transport,
    host: network.host,
    port: network.port,
    timeoutMs: network.connectTimeoutMs,
  });
  const channel = new FramedChannel(stream, {
    label: 'join',
    closeLingerMs: network.closeLingerMs,
    logger,
  });
  return GameSession.join({
    channel,
    localPlayer: options.player,
    handshakeTimeoutMs: network.handshakeTimeoutMs,
  });
}

/**
 * Run one game as described by the command line.
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.info(USAGE);
      return 0;
    }
    options = resolveCliOptions(args, loadGameConfig(args.configPath));
  } catch (error) {
    if (error instanceof CliUsageError || error instanceof InvalidConfigError) {
      logger.error(error.message);
      console.info(USAGE);
      return 2;
    }
    throw error;
  }

  let session: GameSession;
  try {
    session = await openSession(options);
  } catch (error) {
    if (error instanceof NetworkError) {
      logger.error('Could not connect to peer', { error: error.message });
      return 1;
    }
    throw error;
  }

  const boardLogger = new BoardLogger(session.bus);
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} received, ending game...`);
    boardLogger.dispose();
    session.dispose();
    process.exit(0);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    logger.info('Game starting', { mode: session.role });
    session.start();
    const outcome = await session.whenFinished();
    logger.info('Game over', { winner: outcome.winner, isDraw: outcome.isDraw });
    return 0;
  } catch (error) {
    if (error instanceof NetworkError) {
      logger.error('Game ended early', { error: error.message });
      return 1;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    boardLogger.dispose();
    session.dispose();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('Fatal error', { error: toError(error).message });
      process.exitCode = 1;
    }
  );
}
