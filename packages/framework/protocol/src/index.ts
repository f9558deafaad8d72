/**
 * @fileoverview Framework protocol definitions.
 *
 * This package defines the wire shape shared by every two-peer application:
 * newline-delimited JSON frames with a `type` discriminator, the reserved
 * transport control frames, and the role handshake that runs before any
 * application traffic. Applications define their own message schemas on top.
 */

export { FrameDecodeError, ProtocolError } from './errors.js';
export {
  CLOSE_FRAME_TYPE,
  CONTROL_TYPE_PREFIX,
  decodeFrame,
  encodeFrame,
  FRAME_DELIMITER,
  type Frame,
  FrameSchema,
  isControlFrameType,
} from './frame.js';
export {
  ASSIGN_ROLE_ACK_TYPE,
  ASSIGN_ROLE_TYPE,
  AssignRoleAckMessage,
  AssignRoleMessage,
} from './handshake.js';

/**
 * Framework protocol version, exchanged during the role handshake.
 */
export const FRAMEWORK_PROTOCOL_VERSION = '1.0.0';
