import { describe, expect, it } from 'vitest';
import { CliUsageError, parseCliArgs, resolveCliOptions } from '../src/cliArgs.js';
import type { GameConfigYaml } from '../src/config/gameConfig.js';

const CONFIG: GameConfigYaml = {
  network: {
    transport: 'tcp',
    host: '127.0.0.1',
    port: 5000,
    acceptTimeoutMs: 60000,
    connectTimeoutMs: 5000,
    handshakeTimeoutMs: 5000,
    closeLingerMs: 250,
  },
  players: { x: 'optimal-ai', o: 'random-ai' },
};

describe('parseCliArgs', () => {
  it('should default to a local game', () => {
    expect(parseCliArgs([])).toEqual({
      mode: 'local',
      playerX: undefined,
      playerO: undefined,
      player: undefined,
      symbol: undefined,
      host: undefined,
      port: undefined,
      transport: undefined,
      configPath: undefined,
      help: false,
    });
  });

  it('should parse host options', () => {
    const args = parseCliArgs([
      '--mode',
      'host',
      '--player',
      'random-ai',
      '--symbol',
      'O',
      '--port',
      '0',
      '--transport',
      'ws',
    ]);

    expect(args).toMatchObject({ mode: 'host', player: 'random-ai', symbol: 'O', port: 0, transport: 'ws' });
  });

  it('should parse --help', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it.each([
    [['--mode', 'spectate'], "--mode must be one of local, host, join, got 'spectate'"],
    [['--symbol', 'Z'], "--symbol must be X or O, got 'Z'"],
    [['--port', '70000'], "--port must be an integer between 0 and 65535, got '70000'"],
    [['--port', 'http'], "--port must be an integer between 0 and 65535, got 'http'"],
    [['--player-x', 'human'], '--player-x human needs a front end; the CLI runs AI players only'],
  ])('should reject %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new CliUsageError(message));
  });

  it('should reject unknown flags and positionals', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['local'])).toThrow(CliUsageError);
  });
});

describe('resolveCliOptions', () => {
  it('should take local players from the config', () => {
    expect(resolveCliOptions(parseCliArgs([]), CONFIG)).toEqual({
      mode: 'local',
      playerX: { kind: 'optimal-ai' },
      playerO: { kind: 'random-ai' },
    });
  });

  it('should prefer flags over the config', () => {
    const options = resolveCliOptions(parseCliArgs(['--player-o', 'optimal-ai']), CONFIG);

    expect(options).toMatchObject({ playerO: { kind: 'optimal-ai' } });
  });

  it('should refuse a human player from the config', () => {
    const config: GameConfigYaml = { ...CONFIG, players: { x: 'human', o: 'random-ai' } };

    expect(() => resolveCliOptions(parseCliArgs([]), config)).toThrow(CliUsageError);
  });

  it('should merge network flags into the config', () => {
    const options = resolveCliOptions(
      parseCliArgs(['--mode', 'join', '--host', '10.0.0.2', '--port', '6000']),
      CONFIG
    );

    expect(options).toEqual({
      mode: 'join',
      player: { kind: 'optimal-ai' },
      network: {
        transport: 'tcp',
        host: '10.0.0.2',
        port: 6000,
        acceptTimeoutMs: 60000,
        connectTimeoutMs: 5000,
        handshakeTimeoutMs: 5000,
        closeLingerMs: 250,
      },
    });
  });

  it('should leave the host symbol open unless given', () => {
    const options = resolveCliOptions(parseCliArgs(['--mode', 'host']), CONFIG);

    expect(options).toMatchObject({ mode: 'host', symbol: undefined, player: { kind: 'optimal-ai' } });
  });
});
