export * from './board.js';
export { EngineModeError, MoveOutOfBoundsError } from './errors.js';
export {
  type GameOutcome,
  TurnEngine,
  type TurnEngineMode,
  type TurnEngineOptions,
  type TurnEngineSnapshot,
} from './TurnEngine.js';
