/**
 * ddp-client
 *
 * Client for the Distributed Data Protocol over WebSocket: method calls,
 * publications and live collection data from a DDP server, with protocol
 * version negotiation and automatic reconnection.
 *
 * @packageDocumentation
 * @module ddp-client
 */

// ============================================================================
// Client
// ============================================================================

export { DdpClient } from './client.js'

// ============================================================================
// Type Exports
// ============================================================================

export type {
  // Listeners and callback
  ResultListener,
  SubscribeListener,
  UnsubscribeListener,
  DdpCallback,
  // Configuration
  DdpClientOptions,
  DdpLogger,
  LogLevel,
  // State and events
  SessionStatus,
  DdpClientEventMap,
} from './types.js'

// ============================================================================
// Errors
// ============================================================================

export {
  DdpError,
  DdpErrorCode,
  DdpTransportError,
  DdpProtocolError,
  FrameDecodeError,
  DdpUsageError,
  DdpServerError,
} from './errors.js'

// ============================================================================
// Protocol
// ============================================================================

export {
  LIBRARY_VERSION,
  SUPPORTED_DDP_VERSIONS,
  MessageKind,
  DOCUMENT_ID_FIELD,
  isVersionSupported,
} from './protocol/messages.js'

export type {
  DdpVersion,
  ConnectFrame,
  MethodFrame,
  SubscribeFrame,
  UnsubscribeFrame,
  PongFrame,
  OutboundFrame,
} from './protocol/messages.js'

export { encodeFrame, decodeFrame } from './protocol/codec.js'
export type { DecodeResult } from './protocol/codec.js'
export { InboundFrameSchema, parseInboundFrame } from './protocol/schemas.js'
export type { InboundFrame, ErrorPayload } from './protocol/schemas.js'

// ============================================================================
// Session Building Blocks
// ============================================================================

export { PendingRequestRegistry } from './session/pending-requests.js'
export type { Continuation, ContinuationKind } from './session/pending-requests.js'
export { OutboundQueue } from './session/outbound-queue.js'
export { InboundRouter } from './session/router.js'
export type { RouterTarget } from './session/router.js'

// ============================================================================
// Transport
// ============================================================================

export { WebSocketTransport } from './transport/ws-transport.js'
export type { DdpTransport, TransportHandler } from './transport/types.js'
