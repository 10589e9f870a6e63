/**
 * @file DDP Message Definitions
 *
 * Message kinds, protocol versions and the shapes of the frames this client
 * sends. Inbound frame shapes live in `schemas.ts`, where they are validated.
 *
 * @module ddp-client/protocol/messages
 * @see https://github.com/meteor/meteor/blob/devel/packages/ddp/DDP.md
 */

// =============================================================================
// Versions
// =============================================================================

/** Version of this client library. */
export const LIBRARY_VERSION = '0.1.0'

/**
 * DDP protocol versions supported by this client, most preferred first.
 *
 * The full list is sent as `support` in every `connect` handshake, and a
 * version proposed by the server through `failed` is only adopted when it
 * appears here.
 */
export const SUPPORTED_DDP_VERSIONS = ['1', 'pre2', 'pre1'] as const

/** A protocol version this client can speak. */
export type DdpVersion = (typeof SUPPORTED_DDP_VERSIONS)[number]

/**
 * Checks whether a protocol version is one this client supports.
 *
 * @example
 * ```typescript
 * isVersionSupported('pre1') // true
 * isVersionSupported('v99')  // false
 * ```
 */
export function isVersionSupported(version: string | null | undefined): version is DdpVersion {
  return SUPPORTED_DDP_VERSIONS.some((supported) => supported === version)
}

// =============================================================================
// Message Kinds
// =============================================================================

/**
 * Values of the `msg` discriminator.
 */
export const MessageKind = {
  // client -> server
  Connect: 'connect',
  Method: 'method',
  Subscribe: 'sub',
  Unsubscribe: 'unsub',
  Pong: 'pong',
  // server -> client
  Connected: 'connected',
  Failed: 'failed',
  Ping: 'ping',
  Added: 'added',
  AddedBefore: 'addedBefore',
  Changed: 'changed',
  Removed: 'removed',
  Result: 'result',
  Ready: 'ready',
  NoSub: 'nosub',
} as const

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind]

/**
 * Message kinds the server may send. Anything else is ignored on receipt.
 */
export const INBOUND_MESSAGE_KINDS = [
  MessageKind.Connected,
  MessageKind.Failed,
  MessageKind.Ping,
  MessageKind.Added,
  MessageKind.AddedBefore,
  MessageKind.Changed,
  MessageKind.Removed,
  MessageKind.Result,
  MessageKind.Ready,
  MessageKind.NoSub,
] as const

export type InboundMessageKind = (typeof INBOUND_MESSAGE_KINDS)[number]

export function isInboundMessageKind(value: unknown): value is InboundMessageKind {
  return INBOUND_MESSAGE_KINDS.some((kind) => kind === value)
}

/** Name of the document identifier field used by collection methods. */
export const DOCUMENT_ID_FIELD = '_id'

// =============================================================================
// Outbound Frames
// =============================================================================

/**
 * Handshake sent once the transport is open.
 *
 * `session` is present only when resuming an earlier session.
 */
export interface ConnectFrame {
  msg: typeof MessageKind.Connect
  version: DdpVersion
  support: readonly DdpVersion[]
  session?: string
}

/** Remote procedure call. */
export interface MethodFrame {
  msg: typeof MessageKind.Method
  method: string
  id: string
  params?: readonly unknown[]
  randomSeed?: string
}

/** Subscription request. */
export interface SubscribeFrame {
  msg: typeof MessageKind.Subscribe
  name: string
  id: string
  params?: readonly unknown[]
}

/** Request to stop a subscription. */
export interface UnsubscribeFrame {
  msg: typeof MessageKind.Unsubscribe
  id: string
}

/** Reply to a server `ping`, echoing its optional id. */
export interface PongFrame {
  msg: typeof MessageKind.Pong
  id?: string
}

/**
 * Any frame the client sends.
 */
export type OutboundFrame =
  | ConnectFrame
  | MethodFrame
  | SubscribeFrame
  | UnsubscribeFrame
  | PongFrame
