/**
 * @file Session State
 *
 * The mutable state of one DDP session, kept in a single object owned by the
 * client and shared with its transport event handlers.
 *
 * @module ddp-client/session/session-state
 */

import type { DdpVersion } from '../protocol/messages.js'
import type { SessionStatus } from '../types.js'

export interface SessionState {
  /** Server address. */
  readonly url: string
  /** Version sent in the next handshake; narrowed by `failed` replies. */
  version: DdpVersion
  /** Session id assigned by the server, kept for resumption. */
  sessionId: string | null
  status: SessionStatus
  /** Consecutive automatic reconnect attempts since the transport last opened. */
  reconnectAttempts: number
}

export function createSessionState(url: string, version: DdpVersion): SessionState {
  return {
    url,
    version,
    sessionId: null,
    status: 'disconnected',
    reconnectAttempts: 0,
  }
}

/**
 * Whether a transport close in this status counts as losing a session, which
 * triggers automatic reconnection.
 *
 * A close while `connecting` means the initial or a manual connection never
 * opened; that is reported but not retried.
 */
export function isReconnectEligible(status: SessionStatus): boolean {
  return status === 'awaitingHandshake' || status === 'connected' || status === 'reconnecting'
}
