/**
 * @fileoverview Game configuration loading from YAML.
 * Validates and caches configuration for tic-tac-toe sessions.
 */

import { readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

export const ParticipantKindSchema = z.enum(['human', 'random-ai', 'optimal-ai']);

// Schema for game configuration
const GameConfigSchema = z.object({
  network: z.object({
    transport: z.enum(['tcp', 'ws']),
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    acceptTimeoutMs: z.number().int().positive(),
    connectTimeoutMs: z.number().int().positive(),
    handshakeTimeoutMs: z.number().int().positive(),
    closeLingerMs: z.number().int().min(0),
  }),
  players: z.object({
    x: ParticipantKindSchema,
    o: ParticipantKindSchema,
  }),
});

export type GameConfigYaml = z.infer<typeof GameConfigSchema>;

/**
 * Raised when the configuration file or an override does not validate.
 */
export class InvalidConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidConfigError';
  }
}

let cached: { path: string; config: GameConfigYaml } | null = null;

/**
 * Load and validate game configuration from YAML file.
 * Caches the result per resolved path; loading another path replaces it.
 *
 * Config file is loaded from:
 * - the `path` argument if given
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/game.yaml relative to cwd (project root)
 *
 * PORT and HANDSHAKE_TIMEOUT_MS environment variables override the file.
 */
export function loadGameConfig(path?: string): GameConfigYaml {
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const envPath = process.env['CONFIG_PATH'];
  const configPath = resolve(path ?? envPath ?? join(process.cwd(), 'config/game.yaml'));

  if (cached?.path === configPath) {
    return cached.config;
  }

  try {
    const fileContents = readFileSync(configPath, 'utf8');
    const rawConfig = parseYaml(fileContents) as unknown;
    const validatedConfig = applyEnvOverrides(GameConfigSchema.parse(rawConfig));
    cached = { path: configPath, config: validatedConfig };
    return validatedConfig;
  } catch (error) {
    if (error instanceof z.ZodError) {
      logger.error('Invalid game configuration', { path: configPath, issues: error.issues });
      throw new InvalidConfigError(`Invalid game configuration: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cached = null;
}

function applyEnvOverrides(config: GameConfigYaml): GameConfigYaml {
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const port = readIntegerEnv('PORT', process.env['PORT']);
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const handshakeTimeoutMs = readIntegerEnv('HANDSHAKE_TIMEOUT_MS', process.env['HANDSHAKE_TIMEOUT_MS']);

  return GameConfigSchema.parse({
    ...config,
    network: {
      ...config.network,
      ...(port !== undefined && { port }),
      ...(handshakeTimeoutMs !== undefined && { handshakeTimeoutMs }),
    },
  });
}

function readIntegerEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidConfigError(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}
