/**
 * @fileoverview Framework event bus.
 *
 * In-process typed publish/subscribe router shared by every component of a
 * session: turn engine, participants, network bridges and front ends.
 */

export {
  type BusEvent,
  BusClosedError,
  EventBus,
  type EventHandler,
  type EventOfType,
  EventTimeoutError,
} from './EventBus.js';
