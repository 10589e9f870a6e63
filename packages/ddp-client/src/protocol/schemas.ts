/**
 * @file Inbound Frame Schemas
 *
 * Zod schemas for every frame the server may send. Frames arrive from the
 * network and are validated here before the router looks at them.
 *
 * @module ddp-client/protocol/schemas
 */

import { z } from 'zod'
import { MessageKind } from './messages.js'

// =============================================================================
// Shared Schemas
// =============================================================================

/**
 * Error object carried by `result` and `nosub` frames.
 *
 * `error` is a string or numeric code and may be missing or null, as may
 * `reason`; `details` is whatever the server chose to attach.
 */
export const ErrorPayloadSchema = z.object({
  error: z.union([z.string(), z.number()]).nullable().optional(),
  reason: z.string().nullable().optional(),
  details: z.unknown().optional(),
  message: z.string().optional(),
  errorType: z.string().optional(),
})

/** Document fields as sent with `added` and `changed`. */
export const FieldsSchema = z.record(z.unknown())

// =============================================================================
// Frame Schemas
// =============================================================================

export const ConnectedFrameSchema = z.object({
  msg: z.literal(MessageKind.Connected),
  session: z.string().optional(),
})

export const FailedFrameSchema = z.object({
  msg: z.literal(MessageKind.Failed),
  version: z.string().optional(),
})

export const PingFrameSchema = z.object({
  msg: z.literal(MessageKind.Ping),
  id: z.string().optional(),
})

export const AddedFrameSchema = z.object({
  msg: z.literal(MessageKind.Added),
  collection: z.string(),
  id: z.string(),
  fields: FieldsSchema.optional(),
})

export const AddedBeforeFrameSchema = z.object({
  msg: z.literal(MessageKind.AddedBefore),
  collection: z.string(),
  id: z.string(),
  fields: FieldsSchema.optional(),
  before: z.string().nullable().optional(),
})

export const ChangedFrameSchema = z.object({
  msg: z.literal(MessageKind.Changed),
  collection: z.string(),
  id: z.string(),
  fields: FieldsSchema.optional(),
  cleared: z.array(z.string()).optional(),
})

export const RemovedFrameSchema = z.object({
  msg: z.literal(MessageKind.Removed),
  collection: z.string(),
  id: z.string(),
})

export const ResultFrameSchema = z.object({
  msg: z.literal(MessageKind.Result),
  id: z.string(),
  result: z.unknown().optional(),
  error: ErrorPayloadSchema.optional(),
})

export const ReadyFrameSchema = z.object({
  msg: z.literal(MessageKind.Ready),
  subs: z.array(z.string()),
})

export const NoSubFrameSchema = z.object({
  msg: z.literal(MessageKind.NoSub),
  id: z.string(),
  error: ErrorPayloadSchema.optional(),
})

/**
 * Any frame the server may send, discriminated by `msg`.
 */
export const InboundFrameSchema = z.discriminatedUnion('msg', [
  ConnectedFrameSchema,
  FailedFrameSchema,
  PingFrameSchema,
  AddedFrameSchema,
  AddedBeforeFrameSchema,
  ChangedFrameSchema,
  RemovedFrameSchema,
  ResultFrameSchema,
  ReadyFrameSchema,
  NoSubFrameSchema,
])

// =============================================================================
// Inferred Types
// =============================================================================

export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>
export type ConnectedFrame = z.infer<typeof ConnectedFrameSchema>
export type FailedFrame = z.infer<typeof FailedFrameSchema>
export type PingFrame = z.infer<typeof PingFrameSchema>
export type AddedFrame = z.infer<typeof AddedFrameSchema>
export type AddedBeforeFrame = z.infer<typeof AddedBeforeFrameSchema>
export type ChangedFrame = z.infer<typeof ChangedFrameSchema>
export type RemovedFrame = z.infer<typeof RemovedFrameSchema>
export type ResultFrame = z.infer<typeof ResultFrameSchema>
export type ReadyFrame = z.infer<typeof ReadyFrameSchema>
export type NoSubFrame = z.infer<typeof NoSubFrameSchema>
export type InboundFrame = z.infer<typeof InboundFrameSchema>

/**
 * Validates a parsed JSON value as an inbound frame.
 */
export function parseInboundFrame(data: unknown) {
  return InboundFrameSchema.safeParse(data)
}
