/**
 * @fileoverview Tic-tac-toe application.
 *
 * Two peers play over one framed channel. The host's turn engine is the only
 * authority over the board; the joining peer mirrors it and sends move
 * requests. Every component talks through the session's event bus, so local
 * games, AI players and networked games share the same engine.
 */

export {
  clearConfigCache,
  type GameConfigYaml,
  InvalidConfigError,
  loadGameConfig,
} from './config/gameConfig.js';
export * from './engine/index.js';
export * from './network/index.js';
export * from './participants/index.js';
export * from './session/index.js';
export * from './shared/index.js';
export { type Logger, logger } from './utils/logger.js';
