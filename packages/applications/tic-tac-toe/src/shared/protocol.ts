/**
 * @fileoverview Tic-tac-toe wire messages exchanged after the role handshake.
 * Uses Zod for runtime validation of incoming frames; unknown or missing
 * fields fail validation.
 */

import { z } from 'zod';
import { isPlayerSymbol, type PlayerSymbol } from './types.js';

// ============ Shared Schemas ============

export const PlayerSymbolSchema = z.enum(['X', 'O']);

export const CellSchema = PlayerSymbolSchema.nullable();

/**
 * Schema for the 3×3 board, rows first.
 */
export const BoardSchema = z.array(z.array(CellSchema).length(3)).length(3);

export const InvalidMoveReasonSchema = z.enum(['not_your_turn', 'cell_occupied', 'game_over']);

// ============ Relay -> Authority Messages ============

/**
 * The relay peer asks the authority to apply its move.
 */
export const MoveRequestMessage = z
  .object({
    type: z.literal('move_request'),
    player: PlayerSymbolSchema,
    row: z.number().int(),
    col: z.number().int(),
  })
  .strict();

// ============ Authority -> Relay Messages ============

/**
 * Board snapshot after a move was applied (or at game start).
 */
export const StateUpdateMessage = z
  .object({
    type: z.literal('state_update'),
    board: BoardSchema,
    currentPlayer: PlayerSymbolSchema,
    winner: PlayerSymbolSchema.nullable(),
    isDraw: z.boolean(),
    moveCount: z.number().int().min(0),
  })
  .strict();

/**
 * Next turn notification.
 */
export const StartTurnMessage = z
  .object({
    type: z.literal('start_turn'),
    board: BoardSchema,
    currentPlayer: PlayerSymbolSchema,
  })
  .strict();

/**
 * Rejection of the relay peer's move.
 */
export const InvalidMoveMessage = z
  .object({
    type: z.literal('invalid_move'),
    player: PlayerSymbolSchema,
    row: z.number().int(),
    col: z.number().int(),
    reason: InvalidMoveReasonSchema,
    message: z.string(),
  })
  .strict();

/**
 * Union of every application message.
 */
export const PeerMessage = z.discriminatedUnion('type', [
  MoveRequestMessage,
  StateUpdateMessage,
  StartTurnMessage,
  InvalidMoveMessage,
]);

export type MoveRequestMessage = z.infer<typeof MoveRequestMessage>;
export type StateUpdateMessage = z.infer<typeof StateUpdateMessage>;
export type StartTurnMessage = z.infer<typeof StartTurnMessage>;
export type InvalidMoveMessage = z.infer<typeof InvalidMoveMessage>;
export type PeerMessage = z.infer<typeof PeerMessage>;
export type PeerMessageType = PeerMessage['type'];

// ============ Parsing ============

/**
 * Parse and validate an incoming frame.
 * @param data - Decoded frame
 * @returns Validated message or null if invalid
 */
export function parsePeerMessage(data: unknown): PeerMessage | null {
  const result = PeerMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Type guard for checking if a message is a specific type.
 */
export function isPeerMessageType<T extends PeerMessageType>(
  message: PeerMessage,
  type: T
): message is Extract<PeerMessage, { type: T }> {
  return message.type === type;
}

/**
 * Validate the role named in a handshake message.
 * @returns The symbol, or null if the role is not one
 */
export function parseRole(role: unknown): PlayerSymbol | null {
  return isPlayerSymbol(role) ? role : null;
}
