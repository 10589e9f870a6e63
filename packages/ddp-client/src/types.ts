/**
 * @file DDP Client Types
 *
 * Public types of the client: configuration, logging, the application
 * callback surface and the per-request listeners.
 *
 * @module ddp-client/types
 */

import type { DdpTransport } from './transport/types.js'

// =============================================================================
// Request Listeners
// =============================================================================

/**
 * Receives the outcome of a method call.
 *
 * @example
 * ```typescript
 * client.call('/tasks/insert', [{ text: 'Buy milk' }], {
 *   onSuccess: (result) => console.log('Inserted:', result),
 *   onError: (error, reason) => console.error(error, reason),
 * })
 * ```
 */
export interface ResultListener {
  /**
   * Called with the method result as raw JSON text, or `null` when the method
   * returned nothing.
   */
  onSuccess(result: string | null): void
  /** Called with the error the server reported for the call. */
  onError(error: string | null, reason: string | null, details: string | null): void
}

/**
 * Receives the outcome of a subscription request.
 *
 * `onError` is also called with all arguments `null` when the server ends the
 * subscription without giving an error.
 */
export interface SubscribeListener {
  onSuccess(): void
  onError(error: string | null, reason: string | null, details: string | null): void
}

/**
 * Receives the acknowledgement of an unsubscription.
 */
export interface UnsubscribeListener {
  onSuccess(): void
}

// =============================================================================
// Application Callback
// =============================================================================

/**
 * Connection and data events delivered to the application.
 *
 * Every member is optional. Field payloads are passed as raw JSON text, exactly
 * as the server sent them.
 *
 * @example
 * ```typescript
 * client.setCallback({
 *   onConnect: () => console.log('Session established'),
 *   onDisconnect: (code, reason) => console.log('Gone:', code, reason),
 *   onDataAdded: (collection, id, fields) => store.add(collection, id, JSON.parse(fields ?? '{}')),
 * })
 * ```
 */
export interface DdpCallback {
  /** The server accepted the handshake. */
  onConnect?(): void
  /** The connection ended and will not be re-established automatically. */
  onDisconnect?(code: number, reason: string): void
  /** A transport, protocol or decoding error occurred. */
  onException?(error: Error): void
  onDataAdded?(collection: string, documentId: string, fieldsJson: string | null): void
  onDataChanged?(
    collection: string,
    documentId: string,
    updatedFieldsJson: string | null,
    clearedFieldsJson: string | null
  ): void
  onDataRemoved?(collection: string, documentId: string): void
}

// =============================================================================
// Logging Types
// =============================================================================

/**
 * Log levels supported by the DdpClient logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger interface for DdpClient debug output.
 *
 * Implement this interface to integrate with your logging infrastructure.
 * All methods are optional; missing methods will be no-ops.
 *
 * @example
 * ```typescript
 * const structuredLogger: DdpLogger = {
 *   debug: (msg, data) => console.debug(JSON.stringify({ level: 'debug', msg, ...data })),
 *   warn: (msg, data) => console.warn(JSON.stringify({ level: 'warn', msg, ...data })),
 *   error: (msg, data) => console.error(JSON.stringify({ level: 'error', msg, ...data })),
 * }
 * ```
 */
export interface DdpLogger {
  /** Frames sent, queued and received. */
  debug?: (message: string, data?: Record<string, unknown>) => void
  /** Connection lifecycle. */
  info?: (message: string, data?: Record<string, unknown>) => void
  /** Reconnect attempts, dropped frames, replies nobody waits for. */
  warn?: (message: string, data?: Record<string, unknown>) => void
  /** Fatal session conditions. */
  error?: (message: string, data?: Record<string, unknown>) => void
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Configuration options for creating a DdpClient.
 *
 * @example
 * ```typescript
 * const client = new DdpClient({
 *   url: 'wss://example.com/websocket',
 *   protocolVersion: 'pre2',
 *   maxReconnectAttempts: 5,
 *   debug: true,
 * })
 * ```
 */
export interface DdpClientOptions {
  /**
   * The WebSocket URL of the server. Must use `ws://` or `wss://`.
   *
   * @example 'wss://example.com/websocket'
   */
  url: string

  /**
   * Preferred DDP protocol version. Must be one of `SUPPORTED_DDP_VERSIONS`.
   *
   * @defaultValue '1'
   */
  protocolVersion?: string

  /**
   * Number of consecutive automatic reconnect attempts after losing an open
   * connection before the client gives up.
   *
   * @defaultValue 5
   */
  maxReconnectAttempts?: number

  /**
   * Whether to open the connection from the constructor.
   *
   * When `false`, nothing happens until `reconnect()` is called.
   *
   * @defaultValue true
   */
  autoConnect?: boolean

  /**
   * Transport carrying the frames. Defaults to a `ws`-based WebSocket.
   */
  transport?: DdpTransport

  /**
   * Enable debug logging.
   *
   * @defaultValue false
   */
  debug?: boolean

  /**
   * Custom logger used when `debug` is enabled. Defaults to the console.
   */
  logger?: DdpLogger
}

// =============================================================================
// Event Types
// =============================================================================

/**
 * Connection states of a DdpClient.
 *
 * - `disconnected` -> `connecting`: constructor or `reconnect()`
 * - `connecting` -> `awaitingHandshake`: transport opened, `connect` sent
 * - `awaitingHandshake` -> `connected`: server replied `connected`
 * - `awaitingHandshake` | `connected` -> `reconnecting`: transport lost
 * - `reconnecting` -> `awaitingHandshake`: transport reopened
 * - any -> `disconnected`: `disconnect()`, give-up, or a fatal protocol error
 */
export type SessionStatus =
  | 'disconnected'
  | 'connecting'
  | 'awaitingHandshake'
  | 'connected'
  | 'reconnecting'

/**
 * Events emitted by DdpClient in addition to the callback surface.
 */
export interface DdpClientEventMap {
  /** Emitted on every state transition. */
  stateChange: [state: SessionStatus]
  /** Emitted before each automatic reconnect attempt. */
  reconnecting: [attempt: number]
  /** Emitted when a session was re-established after an automatic reconnect. */
  reconnected: []
  /** Emitted once when automatic reconnection gives up. */
  reconnectFailed: [code: number, reason: string]
}
