/**
 * @fileoverview Command line parsing for the `turnlink` entry point.
 *
 * Flags override the YAML configuration; anything not given on the command
 * line comes from it.
 */

import { parseArgs } from 'node:util';
import type { TransportKind } from '@turnlink/framework-transport';
import type { GameConfigYaml } from './config/gameConfig.js';
import type { ParticipantSpec } from './participants/index.js';
import { parseRole } from './shared/protocol.js';
import type { PlayerSymbol } from './shared/types.js';

export type CliMode = 'local' | 'host' | 'join';

/** Policies the CLI can run without a front end */
export type CliPolicy = 'random-ai' | 'optimal-ai';

export interface CliArgs {
  readonly mode: CliMode;
  readonly playerX?: CliPolicy;
  readonly playerO?: CliPolicy;
  readonly player?: CliPolicy;
  readonly symbol?: PlayerSymbol;
  readonly host?: string;
  readonly port?: number;
  readonly transport?: TransportKind;
  readonly configPath?: string;
  readonly help: boolean;
}

export interface CliNetworkOptions {
  readonly transport: TransportKind;
  readonly host: string;
  readonly port: number;
  readonly acceptTimeoutMs: number;
  readonly connectTimeoutMs: number;
  readonly handshakeTimeoutMs: number;
  readonly closeLingerMs: number;
}

export type CliOptions =
  | { readonly mode: 'local'; readonly playerX: ParticipantSpec; readonly playerO: ParticipantSpec }
  | {
      readonly mode: 'host';
      readonly player: ParticipantSpec;
      readonly symbol?: PlayerSymbol;
      readonly network: CliNetworkOptions;
    }
  | { readonly mode: 'join'; readonly player: ParticipantSpec; readonly network: CliNetworkOptions };

/**
 * Bad flags or values on the command line.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: turnlink [options]

  --mode local|host|join      Where the game runs (default local)
  --player-x <policy>         Policy for X in local games
  --player-o <policy>         Policy for O in local games
  --player <policy>           Policy for this peer in host and join games
  --symbol X|O                Symbol the host plays (default random)
  --host <address>            Address to bind (host) or connect to (join)
  --port <number>             Port to listen on or connect to
  --transport tcp|ws          Byte stream between the peers
  --config <path>             YAML configuration file
  --help                      Show this message

Policies: random-ai, optimal-ai. Human players need a front end.`;

const MODES: readonly CliMode[] = ['local', 'host', 'join'];
const POLICIES: readonly CliPolicy[] = ['random-ai', 'optimal-ai'];
const TRANSPORTS: readonly TransportKind[] = ['tcp', 'ws'];

function oneOf<T extends string>(flag: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new CliUsageError(`--${flag} must be one of ${allowed.join(', ')}, got '${value}'`);
  }
  return match;
}

function policy(flag: string, value: string | undefined): CliPolicy | undefined {
  if (value === 'human') {
    throw new CliUsageError(`--${flag} human needs a front end; the CLI runs AI players only`);
  }
  return oneOf(flag, value, POLICIES);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(argv);
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }

  let symbol: PlayerSymbol | undefined;
  if (values.symbol !== undefined) {
    const parsed = parseRole(values.symbol);
    if (!parsed) {
      throw new CliUsageError(`--symbol must be X or O, got '${values.symbol}'`);
    }
    symbol = parsed;
  }

  let port: number | undefined;
  if (values.port !== undefined) {
    port = Number(values.port);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new CliUsageError(`--port must be an integer between 0 and 65535, got '${values.port}'`);
    }
  }

  return {
    mode: oneOf('mode', values.mode, MODES) ?? 'local',
    playerX: policy('player-x', values['player-x']),
    playerO: policy('player-o', values['player-o']),
    player: policy('player', values.player),
    symbol,
    host: values.host,
    port,
    transport: oneOf('transport', values.transport, TRANSPORTS),
    configPath: values.config,
    help: values.help ?? false,
  };
}

function parseFlags(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      mode: { type: 'string' },
      'player-x': { type: 'string' },
      'player-o': { type: 'string' },
      player: { type: 'string' },
      symbol: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' },
      transport: { type: 'string' },
      config: { type: 'string' },
      help: { type: 'boolean' },
    },
  }).values;
}

/**
 * Fill in everything the command line left out from the configuration.
 * @throws {CliUsageError} if the configuration names a human player
 */
export function resolveCliOptions(args: CliArgs, config: GameConfigYaml): CliOptions {
  const network: CliNetworkOptions = {
    ...config.network,
    transport: args.transport ?? config.network.transport,
    host: args.host ?? config.network.host,
    port: args.port ?? config.network.port,
  };

  switch (args.mode) {
    case 'local':
      return {
        mode: 'local',
        playerX: { kind: args.playerX ?? policy('player-x', config.players.x) ?? 'optimal-ai' },
        playerO: { kind: args.playerO ?? policy('player-o', config.players.o) ?? 'optimal-ai' },
      };
    case 'host':
      return {
        mode: 'host',
        player: { kind: args.player ?? 'optimal-ai' },
        symbol: args.symbol,
        network,
      };
    case 'join':
      return { mode: 'join', player: { kind: args.player ?? 'optimal-ai' }, network };
  }
}
