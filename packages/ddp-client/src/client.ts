/**
 * @file DdpClient - DDP Session Client
 *
 * This module provides the client side of the Distributed Data Protocol. It
 * handles:
 * - Transport lifecycle (open, handshake, automatic reconnect, give-up)
 * - Protocol version negotiation and session resumption
 * - Method calls, subscriptions and unsubscriptions over one connection,
 *   each reply correlated to the listener that is waiting for it
 * - Queueing of frames sent before the session is established
 * - Collection data notifications (`added`, `changed`, `removed`)
 * - Debug logging with customizable logger interface
 *
 * @module ddp-client
 * @see https://github.com/meteor/meteor/blob/devel/packages/ddp/DDP.md
 *
 * @example Basic Usage
 * ```typescript
 * import { DdpClient } from 'ddp-client'
 *
 * const client = new DdpClient('wss://example.com/websocket')
 *
 * client.setCallback({
 *   onConnect: () => console.log('Connected'),
 *   onDataAdded: (collection, id, fields) => console.log(collection, id, fields),
 * })
 *
 * const subscriptionId = client.subscribe('todos', [], {
 *   onSuccess: () => console.log('todos ready'),
 *   onError: (error, reason) => console.error(error, reason),
 * })
 *
 * client.call('/todos/insert', [{ text: 'Buy milk' }], {
 *   onSuccess: (result) => console.log('Inserted', result),
 *   onError: (error, reason) => console.error(error, reason),
 * })
 *
 * client.unsubscribe(subscriptionId)
 * client.disconnect()
 * ```
 *
 * ## Connection State Machine
 *
 * ```
 *     +--------------+  constructor / reconnect()  +--------------+
 *     | disconnected | --------------------------> |  connecting  |
 *     +--------------+ <-------------------------- +--------------+
 *        ^    ^          never opened                     |
 *        |    |                                           | transport open
 *        |    |                                           v   send `connect`
 *        |    |   give up / fatal failed        +-------------------+
 *        |    +-------------------------------- | awaitingHandshake | <--+
 *        |                                      +-------------------+    |
 *        |                                                |              |
 *        |     disconnect()                               | `connected`  |
 *        +---------------------------------+              v              |
 *                                          |      +--------------+       |
 *                                          +----- |  connected   |       |
 *                                                 +--------------+       |
 *                                                         | transport    |
 *                                                         v lost         |
 *                                                 +--------------+       |
 *                                                 | reconnecting | ------+
 *                                                 +--------------+ open
 * ```
 */

import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import { DdpProtocolError, DdpUsageError } from './errors.js'
import { decodeFrame, encodeFrame } from './protocol/codec.js'
import type { DecodeResult } from './protocol/codec.js'
import {
  DOCUMENT_ID_FIELD,
  MessageKind,
  SUPPORTED_DDP_VERSIONS,
  isVersionSupported,
} from './protocol/messages.js'
import type { DdpVersion, OutboundFrame } from './protocol/messages.js'
import { OutboundQueue } from './session/outbound-queue.js'
import { PendingRequestRegistry } from './session/pending-requests.js'
import { InboundRouter } from './session/router.js'
import type { RouterTarget } from './session/router.js'
import { createSessionState, isReconnectEligible } from './session/session-state.js'
import type { SessionState } from './session/session-state.js'
import { WebSocketTransport } from './transport/ws-transport.js'
import type { DdpTransport, TransportHandler } from './transport/types.js'
import type {
  DdpCallback,
  DdpClientEventMap,
  DdpClientOptions,
  DdpLogger,
  LogLevel,
  ResultListener,
  SessionStatus,
  SubscribeListener,
  UnsubscribeListener,
} from './types.js'

// =============================================================================
// Constants
// =============================================================================

/**
 * Default configuration values for DdpClient.
 *
 * @internal
 */
const DEFAULT_OPTIONS = {
  maxReconnectAttempts: 5,
  autoConnect: true,
  debug: false,
} as const

// =============================================================================
// DdpClient Class
// =============================================================================

/**
 * Client for servers speaking DDP over WebSocket.
 *
 * Method calls, subscriptions and unsubscriptions never block: they send (or
 * queue) a frame and return, and the outcome arrives later through the
 * listener passed with the request. There is no request timeout; a listener
 * whose reply never arrives stays registered until the session is torn down.
 *
 * @fires DdpClient#stateChange - On every session state transition
 * @fires DdpClient#reconnecting - Before each automatic reconnect attempt
 * @fires DdpClient#reconnected - When a session is re-established after a loss
 * @fires DdpClient#reconnectFailed - When automatic reconnection gives up
 */
export class DdpClient extends EventEmitter {
  // ---------------------------------------------------------------------------
  // Private Properties
  // ---------------------------------------------------------------------------

  private readonly session: SessionState
  private readonly transport: DdpTransport
  private readonly maxReconnectAttempts: number
  private readonly registry = new PendingRequestRegistry()
  private readonly queue = new OutboundQueue()
  private readonly router: InboundRouter
  private readonly transportHandler: TransportHandler
  private callback: DdpCallback | null = null
  private logger: DdpLogger | null = null

  /** Set between an automatic reconnect attempt and the next `connected`. */
  private recovering = false

  // ---------------------------------------------------------------------------
  // Constructor
  // ---------------------------------------------------------------------------

  /**
   * Creates a client and, unless `autoConnect` is `false`, starts connecting.
   *
   * @param urlOrOptions - WebSocket URL or full configuration object
   *
   * @throws {DdpUsageError} If the URL scheme is not ws:// or wss://
   * @throws {DdpUsageError} If the protocol version is not supported
   * @throws {DdpUsageError} If `maxReconnectAttempts` is not a non-negative integer
   *
   * @example
   * ```typescript
   * const client = new DdpClient({
   *   url: 'ws://localhost:3000/websocket',
   *   protocolVersion: 'pre2',
   *   debug: true,
   * })
   * ```
   */
  constructor(urlOrOptions: string | DdpClientOptions) {
    super()

    const options: DdpClientOptions =
      typeof urlOrOptions === 'string' ? { url: urlOrOptions } : urlOrOptions
    const config = { ...DEFAULT_OPTIONS, ...options }

    if (!config.url.startsWith('ws://') && !config.url.startsWith('wss://')) {
      throw new DdpUsageError(`Invalid WebSocket URL scheme. Expected ws:// or wss://, got: ${config.url}`, {
        url: config.url,
      })
    }

    const version = config.protocolVersion ?? SUPPORTED_DDP_VERSIONS[0]
    if (!isVersionSupported(version)) {
      throw new DdpUsageError(`DDP protocol version not supported: ${version}`, { version })
    }

    if (!Number.isInteger(config.maxReconnectAttempts) || config.maxReconnectAttempts < 0) {
      throw new DdpUsageError('maxReconnectAttempts must be a non-negative integer', {
        maxReconnectAttempts: config.maxReconnectAttempts,
      })
    }

    if (config.debug) {
      this.logger = config.logger ?? createDefaultLogger()
    }

    this.session = createSessionState(config.url, version)
    this.transport = config.transport ?? new WebSocketTransport()
    this.maxReconnectAttempts = config.maxReconnectAttempts
    this.router = new InboundRouter(this.registry, this.createRouterTarget())
    this.transportHandler = {
      onOpen: () => this.handleOpen(),
      onClose: (code, reason) => this.handleClose(code, reason),
      onMessage: (payload) => this.handleMessage(payload),
      onError: (error) => this.handleTransportError(error),
    }

    this.log('debug', 'Client created', { url: config.url, version })

    if (config.autoConnect) {
      this.openConnection(false)
    }
  }

  // ---------------------------------------------------------------------------
  // Static Helpers
  // ---------------------------------------------------------------------------

  /**
   * Creates a random request id (UUID v4).
   */
  static uniqueId(): string {
    return randomUUID()
  }

  /**
   * Checks whether a protocol version is supported by this client.
   */
  static isVersionSupported(version: string): boolean {
    return isVersionSupported(version)
  }

  // ---------------------------------------------------------------------------
  // Public Getters
  // ---------------------------------------------------------------------------

  /** The server URL. */
  get url(): string {
    return this.session.url
  }

  /** Current session state. */
  get state(): SessionStatus {
    return this.session.status
  }

  /** Whether the server has accepted the handshake. */
  get isConnected(): boolean {
    return this.session.status === 'connected'
  }

  /** Session id assigned by the server, or `null`. */
  get sessionId(): string | null {
    return this.session.sessionId
  }

  /** Protocol version used in the next handshake. */
  get protocolVersion(): DdpVersion {
    return this.session.version
  }

  /** Consecutive automatic reconnect attempts made so far. */
  get reconnectAttempts(): number {
    return this.session.reconnectAttempts
  }

  /** Number of requests whose listener is still waiting for a reply. */
  get pendingRequestCount(): number {
    return this.registry.size
  }

  /** Number of frames waiting for the session to connect. */
  get queuedMessageCount(): number {
    return this.queue.size
  }

  // ---------------------------------------------------------------------------
  // Public Methods - Connection Management
  // ---------------------------------------------------------------------------

  /**
   * Sets the callback receiving connection and data events, or removes it.
   */
  setCallback(callback: DdpCallback | null): void {
    this.callback = callback
  }

  /**
   * Manually re-establishes the session.
   *
   * If the transport is still open, only the handshake is repeated (resuming
   * the known session); otherwise a new transport connection is opened. Also
   * works after `disconnect()` or after automatic reconnection gave up.
   */
  reconnect(): void {
    this.openConnection(true)
  }

  /**
   * Ends the session.
   *
   * Pending listeners are discarded without being called, the callback is
   * detached and the transport is closed. No automatic reconnect follows.
   */
  disconnect(): void {
    this.log('info', 'Disconnecting', { sessionId: this.session.sessionId })

    this.setState('disconnected')
    this.session.sessionId = null
    this.recovering = false
    this.registry.clear()
    this.callback = null

    try {
      this.transport.disconnect()
    } catch (error) {
      this.log('debug', 'Ignoring error while closing transport', { error })
    }
  }

  // ---------------------------------------------------------------------------
  // Public Methods - Requests
  // ---------------------------------------------------------------------------

  /**
   * Calls a server method.
   *
   * @param method - Method name, e.g. `/tasks/insert`
   * @param params - Positional parameters
   * @param listener - Receives the result or error; omit to fire and forget
   *
   * @example
   * ```typescript
   * client.call('sum', [1, 2], {
   *   onSuccess: (result) => console.log(result), // '3'
   *   onError: (error, reason) => console.error(error, reason),
   * })
   * ```
   */
  call(method: string, params?: readonly unknown[], listener?: ResultListener): void {
    this.callWithSeed(method, undefined, params, listener)
  }

  /**
   * Calls a server method, passing a seed for the server's pseudo-random
   * generators so that ids it generates can be predicted by the client.
   */
  callWithSeed(
    method: string,
    randomSeed?: string,
    params?: readonly unknown[],
    listener?: ResultListener
  ): void {
    const id = DdpClient.uniqueId()

    if (listener !== undefined) {
      this.registry.register(id, { kind: 'result', listener })
    }

    this.send({
      msg: MessageKind.Method,
      method,
      id,
      params,
      randomSeed,
    })
  }

  /**
   * Subscribes to a publication.
   *
   * @returns The subscription id, needed to unsubscribe later
   *
   * @example
   * ```typescript
   * const id = client.subscribe('todos', ['list-1'], {
   *   onSuccess: () => console.log('initial data complete'),
   *   onError: (error, reason) => console.error('subscription ended', error, reason),
   * })
   * ```
   */
  subscribe(name: string, params?: readonly unknown[], listener?: SubscribeListener): string {
    const id = DdpClient.uniqueId()

    if (listener !== undefined) {
      this.registry.register(id, { kind: 'subscribe', listener })
    }

    this.send({
      msg: MessageKind.Subscribe,
      name,
      id,
      params,
    })

    return id
  }

  /**
   * Stops a subscription.
   *
   * A listener given here takes over the slot of the subscription id, so a
   * later `nosub` is reported as a successful unsubscription.
   */
  unsubscribe(subscriptionId: string, listener?: UnsubscribeListener): void {
    if (listener !== undefined) {
      this.registry.register(subscriptionId, { kind: 'unsubscribe', listener })
    }

    this.send({
      msg: MessageKind.Unsubscribe,
      id: subscriptionId,
    })
  }

  /**
   * Inserts a document through the collection's `/<collection>/insert` method.
   */
  insert(collection: string, document: Record<string, unknown>, listener?: ResultListener): void {
    this.call(`/${collection}/insert`, [document], listener)
  }

  /**
   * Updates documents through the collection's `/<collection>/update` method.
   *
   * @param query - Selector for the documents to update
   * @param data - Modifier to apply, e.g. `{ $set: { done: true } }`
   * @param options - Update options such as `{ upsert: true }`
   */
  update(
    collection: string,
    query: Record<string, unknown>,
    data: Record<string, unknown>,
    options: Record<string, unknown> = {},
    listener?: ResultListener
  ): void {
    this.call(`/${collection}/update`, [query, data, options], listener)
  }

  /**
   * Removes the document with the given id through the collection's
   * `/<collection>/remove` method.
   */
  remove(collection: string, documentId: string, listener?: ResultListener): void {
    this.call(`/${collection}/remove`, [{ [DOCUMENT_ID_FIELD]: documentId }], listener)
  }

  // ---------------------------------------------------------------------------
  // Private Methods - Sending
  // ---------------------------------------------------------------------------

  /**
   * Sends a request frame, or queues it until the session is connected.
   *
   * A transport that already stopped being open while its close event is
   * still on the way counts as not connected, so the frame is queued.
   *
   * @throws {DdpUsageError} If no frame is given
   */
  private send(frame: OutboundFrame | null | undefined): void {
    if (frame === null || frame === undefined) {
      throw new DdpUsageError('You cannot send empty messages')
    }
    const message = encodeFrame(frame)

    if (this.session.status === 'connected' && this.transport.isOpen) {
      this.log('debug', 'SEND', { message })
      this.transport.send(message)
    } else {
      this.log('debug', 'QUEUE', { message })
      this.queue.enqueue(message)
    }
  }

  /**
   * Sends a control frame (`connect`, `pong`) straight to the transport; these
   * belong to the connection rather than the session and are never queued.
   */
  private sendControl(frame: OutboundFrame): void {
    const message = encodeFrame(frame)
    if (!this.transport.isOpen) {
      this.log('warn', 'Dropping control frame, transport is not open', { message })
      return
    }
    this.log('debug', 'SEND', { message })
    this.transport.send(message)
  }

  /**
   * Sends the `connect` handshake.
   */
  private sendHandshake(): void {
    this.sendControl({
      msg: MessageKind.Connect,
      version: this.session.version,
      support: SUPPORTED_DDP_VERSIONS,
      session: this.session.sessionId ?? undefined,
    })
  }

  // ---------------------------------------------------------------------------
  // Private Methods - Connection Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Opens the connection, or on a manual reconnect over a live transport
   * repeats the handshake only.
   */
  private openConnection(isReconnect: boolean): void {
    if (isReconnect && this.transport.isOpen) {
      this.log('info', 'Repeating handshake on open transport', { sessionId: this.session.sessionId })
      this.setState('awaitingHandshake')
      this.sendHandshake()
      return
    }

    if (this.session.status !== 'reconnecting') {
      this.setState('connecting')
    }
    this.log('info', 'Connecting to server', { url: this.session.url, version: this.session.version })

    try {
      this.transport.connect(this.session.url, this.transportHandler)
    } catch (error) {
      this.setState('disconnected')
      this.log('error', 'Failed to start connection', { error })
      this.notifyException(error)
    }
  }

  private handleOpen(): void {
    this.log('info', 'Transport open', { url: this.session.url })
    this.session.reconnectAttempts = 0
    this.setState('awaitingHandshake')
    this.sendHandshake()
  }

  /**
   * Handles a transport close: reconnects automatically after losing an open
   * connection, and gives up after `maxReconnectAttempts` consecutive tries.
   */
  private handleClose(code: number, reason: string): void {
    this.log('info', 'Transport closed', { code, reason, state: this.session.status })

    if (!isReconnectEligible(this.session.status)) {
      this.setState('disconnected')
      this.callback?.onDisconnect?.(code, reason)
      return
    }

    this.session.reconnectAttempts++
    if (this.session.reconnectAttempts <= this.maxReconnectAttempts) {
      this.log('warn', 'Connection lost, reconnecting', {
        attempt: this.session.reconnectAttempts,
        maxAttempts: this.maxReconnectAttempts,
      })
      this.recovering = true
      this.setState('reconnecting')
      this.emitEvent('reconnecting', this.session.reconnectAttempts)
      this.openConnection(false)
      return
    }

    this.log('error', 'Giving up after reconnect attempts', { attempts: this.maxReconnectAttempts })
    this.recovering = false
    this.setState('disconnected')
    this.session.sessionId = null
    this.registry.clear()
    this.emitEvent('reconnectFailed', code, reason)
    this.callback?.onDisconnect?.(code, reason)
  }

  private handleMessage(payload: string): void {
    this.log('debug', 'RECEIVE', { message: payload })

    let decoded: DecodeResult
    try {
      decoded = decodeFrame(payload)
    } catch (error) {
      this.log('warn', 'Dropping malformed frame', { error })
      this.notifyException(error)
      return
    }

    if (decoded.kind === 'ignored') {
      this.log('debug', 'Ignoring frame of unknown kind', { msg: decoded.msg })
      return
    }

    this.router.route(decoded.frame)
  }

  private handleTransportError(error: Error): void {
    this.log('warn', 'Transport error', { error: error.message })
    this.notifyException(error)
  }

  /**
   * The server accepted the handshake.
   */
  private handleConnected(sessionId: string | null): void {
    if (sessionId !== null) {
      this.session.sessionId = sessionId
    }
    this.setState('connected')
    this.log('info', 'Session established', { sessionId: this.session.sessionId })

    const flushed = this.queue.drain((message) => {
      this.log('debug', 'SEND', { message })
      this.transport.send(message)
    })
    if (flushed > 0) {
      this.log('debug', 'Flushed queued messages', { count: flushed })
    }

    if (this.recovering) {
      this.recovering = false
      this.emitEvent('reconnected')
    }
    this.callback?.onConnect?.()
  }

  /**
   * The server rejected the handshake and proposed another version.
   *
   * A `failed` reply that names no version is treated as fatal on purpose
   * rather than ignored: the session would otherwise wait forever in
   * `awaitingHandshake` with nothing left to retry.
   */
  private handleFailed(version: string | null): void {
    if (version === null || !isVersionSupported(version)) {
      this.log('error', 'Server proposed an unsupported protocol version', { version })
      this.failSession(new DdpProtocolError(version))
      return
    }

    this.log('info', 'Renegotiating protocol version', { from: this.session.version, to: version })
    this.session.version = version
    this.session.sessionId = null

    // disconnect() suppresses the close event, so this is not a lost connection
    this.transport.disconnect()
    this.openConnection(false)
  }

  /**
   * Tears the session down after a fatal protocol error. Unlike `disconnect()`
   * the callback stays attached so the application learns why.
   */
  private failSession(error: DdpProtocolError): void {
    this.setState('disconnected')
    this.session.sessionId = null
    this.recovering = false
    this.registry.clear()

    try {
      this.transport.disconnect()
    } catch (teardownError) {
      this.log('debug', 'Ignoring error while closing transport', { error: teardownError })
    }

    this.notifyException(error)
  }

  // ---------------------------------------------------------------------------
  // Private Methods - Helpers
  // ---------------------------------------------------------------------------

  private createRouterTarget(): RouterTarget {
    return {
      handleConnected: (sessionId) => this.handleConnected(sessionId),
      handleFailed: (version) => this.handleFailed(version),
      sendPong: (id) => this.sendControl({ msg: MessageKind.Pong, id: id ?? undefined }),
      dataAdded: (collection, documentId, fieldsJson) =>
        this.callback?.onDataAdded?.(collection, documentId, fieldsJson),
      dataChanged: (collection, documentId, updatedFieldsJson, clearedFieldsJson) =>
        this.callback?.onDataChanged?.(collection, documentId, updatedFieldsJson, clearedFieldsJson),
      dataRemoved: (collection, documentId) => this.callback?.onDataRemoved?.(collection, documentId),
      unmatchedReply: (msg, id) => this.log('warn', 'No listener waiting for reply', { msg, id }),
      listenerFailed: (error) => {
        this.log('error', 'Listener threw while handling a reply', { error })
        this.notifyException(error)
      },
    }
  }

  private setState(newState: SessionStatus): void {
    if (this.session.status !== newState) {
      this.session.status = newState
      this.emitEvent('stateChange', newState)
    }
  }

  private emitEvent<K extends keyof DdpClientEventMap>(event: K, ...args: DdpClientEventMap[K]): void {
    this.emit(event, ...args)
  }

  private notifyException(error: unknown): void {
    this.callback?.onException?.(toError(error))
  }

  /**
   * Logs a message using the configured logger.
   * @internal
   */
  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.logger?.[level]?.(message, data)
  }
}

// =============================================================================
// Module Helpers
// =============================================================================

/**
 * Creates a default console-based logger.
 * @internal
 */
function createDefaultLogger(): DdpLogger {
  return {
    debug: (msg, data) => console.debug(`[DdpClient] ${msg}`, data ?? ''),
    info: (msg, data) => console.info(`[DdpClient] ${msg}`, data ?? ''),
    warn: (msg, data) => console.warn(`[DdpClient] ${msg}`, data ?? ''),
    error: (msg, data) => console.error(`[DdpClient] ${msg}`, data ?? ''),
  }
}

function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  return new Error(String(error), { cause: error })
}
