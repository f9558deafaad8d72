export { BoardLogger } from './BoardLogger.js';
export {
  GameSession,
  type HostSessionOptions,
  type JoinSessionOptions,
  type LocalSessionOptions,
  type SessionRole,
} from './GameSession.js';
