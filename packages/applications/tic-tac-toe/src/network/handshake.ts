/**
 * @fileoverview Role handshake, run once before any game traffic.
 *
 * The authoritative peer sends `assign_role` naming the symbol the relay peer
 * plays and waits for `assign_role_ack` echoing it. A timeout or a closed
 * channel is a `NetworkError`; a wrong message, role or version is a
 * `ProtocolError`.
 */

import {
  ASSIGN_ROLE_ACK_TYPE,
  ASSIGN_ROLE_TYPE,
  AssignRoleAckMessage,
  AssignRoleMessage,
  FRAMEWORK_PROTOCOL_VERSION,
  type Frame,
  ProtocolError,
} from '@turnlink/framework-protocol';
import { type ChannelCloseInfo, type FramedChannel, NetworkError } from '@turnlink/framework-transport';
import { parseRole } from '../shared/protocol.js';
import type { PlayerSymbol } from '../shared/types.js';

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5000;

function closedDuringHandshake(info: ChannelCloseInfo): NetworkError {
  return new NetworkError(`Channel closed during role handshake (${info.reason})`, {
    cause: info.error,
  });
}

/**
 * Tell the peer which symbol it plays and wait for its acknowledgement.
 */
export async function assignRole(
  channel: FramedChannel,
  role: PlayerSymbol,
  timeoutMs: number = DEFAULT_HANDSHAKE_TIMEOUT_MS
): Promise<void> {
  channel.send({ type: ASSIGN_ROLE_TYPE, role, protocolVersion: FRAMEWORK_PROTOCOL_VERSION });

  const frame = await channel.receive({ timeoutMs });
  if (!frame) {
    const { closeInfo } = channel;
    throw closeInfo
      ? closedDuringHandshake(closeInfo)
      : new NetworkError(`No role acknowledgement within ${timeoutMs}ms`);
  }

  const ack = AssignRoleAckMessage.safeParse(frame);
  if (!ack.success) {
    throw new ProtocolError(`Expected ${ASSIGN_ROLE_ACK_TYPE}, got '${frame.type}'`);
  }
  if (ack.data.role !== role) {
    throw new ProtocolError(`Peer acknowledged role '${ack.data.role}', expected '${role}'`);
  }
}

/**
 * Wait for the peer to assign this side its symbol.
 * @param onAssigned - Runs with the validated symbol before the ack is sent
 * @returns What `onAssigned` returned
 */
export async function acceptRole<T>(
  channel: FramedChannel,
  timeoutMs: number,
  onAssigned: (role: PlayerSymbol) => T
): Promise<T> {
  const frame = await waitForRoleAssignment(channel, timeoutMs);

  const assignment = AssignRoleMessage.safeParse(frame);
  if (!assignment.success) {
    throw new ProtocolError(`Malformed ${ASSIGN_ROLE_TYPE} message`, { cause: assignment.error });
  }
  const { protocolVersion } = assignment.data;
  if (protocolVersion !== FRAMEWORK_PROTOCOL_VERSION) {
    throw new ProtocolError(
      `Peer speaks protocol ${protocolVersion}, this side speaks ${FRAMEWORK_PROTOCOL_VERSION}`
    );
  }
  const role = parseRole(assignment.data.role);
  if (!role) {
    throw new ProtocolError(`Peer assigned unknown role '${assignment.data.role}'`);
  }

  const result = onAssigned(role);

  channel.send({ type: ASSIGN_ROLE_ACK_TYPE, role });
  const { closeInfo } = channel;
  if (closeInfo) {
    throw closedDuringHandshake(closeInfo);
  }
  return result;
}

/**
 * Resolve with the first `assign_role` frame, including one that arrived
 * before this was called.
 */
function waitForRoleAssignment(channel: FramedChannel, timeoutMs: number): Promise<Frame> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const cleanups: (() => void)[] = [];

    const settle = (outcome: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      for (const cleanup of cleanups.splice(0)) {
        cleanup();
      }
      outcome();
    };

    const timer = setTimeout(() => {
      settle(() => reject(new NetworkError(`No role assignment within ${timeoutMs}ms`)));
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timer));

    cleanups.push(
      channel.onClose((info) => {
        settle(() => reject(closedDuringHandshake(info)));
      })
    );

    const unregister = channel.registerHandler(ASSIGN_ROLE_TYPE, (frame) => {
      settle(() => resolve(frame));
    });
    // A queued assignment is delivered during registration.
    if (settled) {
      unregister();
    } else {
      cleanups.push(unregister);
    }
  });
}
