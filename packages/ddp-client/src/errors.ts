/**
 * @file DDP Client Error Classes
 *
 * Error classes for the failures the client can run into: transport problems,
 * protocol mismatches, malformed frames and misuse of the API. Errors the
 * server reports for a particular method call or subscription are not thrown;
 * they are handed to the listener waiting for that request.
 *
 * @example
 * ```typescript
 * client.setCallback({
 *   onException(error) {
 *     if (error instanceof FrameDecodeError) {
 *       console.warn('Dropped frame:', error.payload)
 *     } else if (error instanceof DdpProtocolError) {
 *       console.error('Server wants version', error.proposedVersion)
 *     }
 *   },
 * })
 * ```
 */

import type { ErrorPayload } from './protocol/schemas.js'

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes used by {@link DdpError}.
 */
export enum DdpErrorCode {
  /** Transport could not be opened or used */
  TRANSPORT_FAILED = 'TRANSPORT_FAILED',
  /** Server proposed a protocol version this client does not speak */
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  /** Inbound payload could not be decoded */
  MALFORMED_FRAME = 'MALFORMED_FRAME',
  /** API used against its preconditions */
  INVALID_USAGE = 'INVALID_USAGE',
  /** Error reported by the server for a request */
  SERVER_ERROR = 'SERVER_ERROR',
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for all errors raised by the DDP client.
 */
export class DdpError extends Error {
  /** Category of the failure. */
  readonly code: DdpErrorCode

  /** Additional context about the failure. */
  readonly data?: Record<string, unknown>

  constructor(
    message: string,
    code: DdpErrorCode,
    options?: { cause?: unknown; data?: Record<string, unknown> }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'DdpError'
    this.code = code
    this.data = options?.data

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * The transport failed to connect, or was used while not open.
 */
export class DdpTransportError extends DdpError {
  constructor(message: string, options?: { cause?: unknown; data?: Record<string, unknown> }) {
    super(message, DdpErrorCode.TRANSPORT_FAILED, options)
    this.name = 'DdpTransportError'
  }

  /**
   * Creates an error for a send attempted on a socket that is not open.
   */
  static notOpen(): DdpTransportError {
    return new DdpTransportError('WebSocket is not open')
  }
}

// =============================================================================
// Protocol Errors
// =============================================================================

/**
 * The server and client could not agree on a protocol version.
 *
 * Fatal for the session: no further connection attempt is made.
 */
export class DdpProtocolError extends DdpError {
  /** Version the server asked for, if it named one. */
  readonly proposedVersion: string | null

  constructor(proposedVersion: string | null) {
    super(
      proposedVersion === null
        ? 'Server rejected the handshake without proposing a protocol version'
        : `Protocol version not supported: ${proposedVersion}`,
      DdpErrorCode.UNSUPPORTED_VERSION,
      { data: { proposedVersion } }
    )
    this.name = 'DdpProtocolError'
    this.proposedVersion = proposedVersion
  }
}

/**
 * An inbound payload could not be decoded into a frame.
 *
 * The frame is dropped and the session carries on.
 */
export class FrameDecodeError extends DdpError {
  /** The raw text that failed to decode. */
  readonly payload: string

  constructor(message: string, payload: string, options?: { cause?: unknown; data?: Record<string, unknown> }) {
    super(message, DdpErrorCode.MALFORMED_FRAME, options)
    this.name = 'FrameDecodeError'
    this.payload = payload
  }
}

// =============================================================================
// Usage Errors
// =============================================================================

/**
 * The API was called in a way that violates its preconditions.
 */
export class DdpUsageError extends DdpError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(message, DdpErrorCode.INVALID_USAGE, { data })
    this.name = 'DdpUsageError'
  }
}

// =============================================================================
// Server Errors
// =============================================================================

/**
 * Error reported by the server in a `result` or `nosub` frame.
 *
 * Listeners receive its parts (`error`, `reason`, `details`) rather than the
 * instance itself.
 */
export class DdpServerError extends DdpError {
  /** Server error code, stringified when the server sent a number. */
  readonly error: string | null

  /** Human-readable reason, if any. */
  readonly reason: string | null

  /** Details serialized to text, if any. */
  readonly details: string | null

  constructor(error: string | null, reason: string | null, details: string | null) {
    super(reason ?? error ?? 'Server reported an error', DdpErrorCode.SERVER_ERROR, {
      data: { error, reason, details },
    })
    this.name = 'DdpServerError'
    this.error = error
    this.reason = reason
    this.details = details
  }

  /**
   * Builds an error from the payload of a `result` or `nosub` frame.
   *
   * @example
   * ```typescript
   * const err = DdpServerError.fromPayload({ error: 404, reason: 'Not found' })
   * err.error  // '404'
   * err.reason // 'Not found'
   * ```
   */
  static fromPayload(payload: ErrorPayload): DdpServerError {
    let details: string | null = null
    if (typeof payload.details === 'string') {
      details = payload.details
    } else if (payload.details !== undefined && payload.details !== null) {
      details = JSON.stringify(payload.details)
    }

    const error = payload.error === undefined || payload.error === null ? null : String(payload.error)
    return new DdpServerError(error, payload.reason ?? null, details)
  }
}
