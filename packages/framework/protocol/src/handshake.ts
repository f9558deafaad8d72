/**
 * @fileoverview Role handshake messages.
 *
 * The peer that knows which role the other side plays sends `assign_role`
 * and waits for `assign_role_ack` before any application message flows.
 * Role names are application-defined; applications validate the value.
 */

import { z } from 'zod';

/**
 * Role assignment (assigning peer → assigned peer).
 */
export const AssignRoleMessage = z
  .object({
    type: z.literal('assign_role'),
    role: z.string().min(1),
    protocolVersion: z.string().min(1),
  })
  .strict();

export type AssignRoleMessage = z.infer<typeof AssignRoleMessage>;

/**
 * Role acknowledgement (assigned peer → assigning peer), echoing the role.
 */
export const AssignRoleAckMessage = z
  .object({
    type: z.literal('assign_role_ack'),
    role: z.string().min(1),
  })
  .strict();

export type AssignRoleAckMessage = z.infer<typeof AssignRoleAckMessage>;

export const ASSIGN_ROLE_TYPE = 'assign_role' satisfies AssignRoleMessage['type'];
export const ASSIGN_ROLE_ACK_TYPE = 'assign_role_ack' satisfies AssignRoleAckMessage['type'];
