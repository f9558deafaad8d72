import { z } from 'zod';
import { FrameDecodeError, ProtocolError } from './errors.js';

/**
 * One discrete message on the wire. Every frame carries a `type` used for
 * dispatch; the remaining keys are application data.
 */
export interface Frame {
  readonly type: string;
  readonly [key: string]: unknown;
}

/**
 * Schema for the envelope every frame shares.
 */
export const FrameSchema = z
  .object({
    type: z.string().min(1),
  })
  .passthrough();

/** Byte that terminates each encoded frame. */
export const FRAME_DELIMITER = '\n';

/** Types starting with this prefix are reserved for transport control frames. */
export const CONTROL_TYPE_PREFIX = '$';

/** Control frame announcing an orderly close. */
export const CLOSE_FRAME_TYPE = `${CONTROL_TYPE_PREFIX}close`;

export function isControlFrameType(type: string): boolean {
  return type.startsWith(CONTROL_TYPE_PREFIX);
}

/**
 * Encode a frame as one delimited line.
 *
 * `JSON.stringify` without indentation escapes newlines inside strings, so
 * the delimiter can never appear inside the payload.
 * @throws {ProtocolError} if the value cannot be serialized
 */
export function encodeFrame(frame: Frame): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(frame);
  } catch (error) {
    throw new ProtocolError(`Frame of type '${frame.type}' is not serializable`, {
      cause: error,
    });
  }
  if (json === undefined) {
    throw new ProtocolError(`Frame of type '${frame.type}' is not serializable`);
  }
  return `${json}${FRAME_DELIMITER}`;
}

/**
 * Decode one line (without its delimiter) into a frame.
 * @throws {FrameDecodeError} if the line is not a JSON object with a string type
 */
export function decodeFrame(line: string): Frame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    throw new FrameDecodeError('not valid JSON', line, { cause: error });
  }

  const result = FrameSchema.safeParse(parsed);
  if (!result.success) {
    throw new FrameDecodeError('expected an object with a string type', line);
  }
  return result.data;
}
