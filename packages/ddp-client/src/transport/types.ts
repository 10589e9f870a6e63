/**
 * @file Transport Types
 *
 * The boundary between the DDP session and whatever duplex text channel
 * carries its frames.
 *
 * @module ddp-client/transport/types
 */

/**
 * Receives lifecycle and message events from a transport.
 */
export interface TransportHandler {
  /** The channel is open and frames can be sent. */
  onOpen(): void
  /** The channel closed, or failed to open. */
  onClose(code: number, reason: string): void
  /** A text frame arrived. */
  onMessage(payload: string): void
  /** The channel reported an error. A close usually follows. */
  onError(error: Error): void
}

/**
 * A full-duplex text channel.
 *
 * Events for one connection are delivered to the handler passed to the
 * `connect` call that created it. After `disconnect()` the handler receives
 * nothing more from that connection, not even `onClose`.
 */
export interface DdpTransport {
  /** Whether a connection is currently open. */
  readonly isOpen: boolean

  /**
   * Opens a connection, replacing any earlier one.
   *
   * @throws {DdpTransportError} If the connection cannot even be started
   */
  connect(url: string, handler: TransportHandler): void

  /** Closes the current connection, if any. */
  disconnect(): void

  /**
   * Sends one text frame.
   *
   * @throws {DdpTransportError} If no connection is open
   */
  send(payload: string): void
}
