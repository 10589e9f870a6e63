/**
 * @file Wire Codec
 *
 * Converts outbound frames to wire text and wire text to validated inbound
 * frames. DDP frames are JSON objects with a `msg` discriminator.
 *
 * @module ddp-client/protocol/codec
 */

import { DdpUsageError, FrameDecodeError } from '../errors.js'
import { isInboundMessageKind } from './messages.js'
import type { OutboundFrame } from './messages.js'
import { parseInboundFrame } from './schemas.js'
import type { InboundFrame } from './schemas.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Outcome of decoding one inbound payload.
 *
 * - `frame`: a validated frame of a known kind
 * - `ignored`: valid JSON object without a known `msg`; not an error
 */
export type DecodeResult =
  | { kind: 'frame'; frame: InboundFrame }
  | { kind: 'ignored'; msg: unknown }

// =============================================================================
// Encoding
// =============================================================================

/**
 * Serializes an outbound frame. Fields set to `undefined` are left out.
 *
 * @throws {DdpUsageError} If the frame serializes to nothing
 */
export function encodeFrame(frame: OutboundFrame): string {
  const text: string | undefined = JSON.stringify(frame)
  if (text === undefined) {
    throw new DdpUsageError('Frame would be serialized to nothing')
  }
  return text
}

/**
 * Re-serializes a sub-document (fields, cleared list, method result) so that
 * listeners receive it as raw wire text.
 *
 * @returns JSON text, or `null` when the sub-document is absent
 */
export function rawJson(value: unknown): string | null {
  if (value === undefined) {
    return null
  }
  return JSON.stringify(value)
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decodes and validates one inbound payload.
 *
 * @throws {FrameDecodeError} If the payload is not JSON, not an object, or a
 *   frame of a known kind with invalid fields
 *
 * @example
 * ```typescript
 * const decoded = decodeFrame('{"msg":"ready","subs":["a1"]}')
 * if (decoded.kind === 'frame' && decoded.frame.msg === 'ready') {
 *   decoded.frame.subs // ['a1']
 * }
 * ```
 */
export function decodeFrame(payload: string): DecodeResult {
  let data: unknown
  try {
    data = JSON.parse(payload)
  } catch (error) {
    throw new FrameDecodeError('Failed to parse JSON message', payload, { cause: error })
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new FrameDecodeError('Message is not a JSON object', payload)
  }

  const msg: unknown = 'msg' in data ? data.msg : undefined
  if (!isInboundMessageKind(msg)) {
    return { kind: 'ignored', msg }
  }

  const parsed = parseInboundFrame(data)
  if (!parsed.success) {
    throw new FrameDecodeError(`Invalid '${msg}' message`, payload, {
      cause: parsed.error,
      data: { issues: parsed.error.issues },
    })
  }

  return { kind: 'frame', frame: parsed.data }
}
