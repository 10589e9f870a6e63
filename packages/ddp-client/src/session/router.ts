/**
 * @file Inbound Router
 *
 * Dispatches decoded server frames. Control frames (`connected`, `failed`,
 * `ping`) and data frames go to the session; replies (`result`, `ready`,
 * `nosub`) are matched against the pending request registry and handed to the
 * listener waiting for them.
 *
 * ## Routing
 *
 * ```
 *   connected            -> target.handleConnected(session)
 *   failed               -> target.handleFailed(version)
 *   ping                 -> target.sendPong(id)
 *   added / addedBefore  -> target.dataAdded(collection, id, fields)
 *   changed              -> target.dataChanged(collection, id, fields, cleared)
 *   removed              -> target.dataRemoved(collection, id)
 *   result               -> result listener: onError | onSuccess
 *   ready                -> subscribe listener of each id: onSuccess
 *   nosub                -> subscribe listener: onError
 *                           unsubscribe listener: onSuccess
 * ```
 *
 * @module ddp-client/session/router
 */

import { DdpServerError } from '../errors.js'
import { rawJson } from '../protocol/codec.js'
import type { ErrorPayload, InboundFrame } from '../protocol/schemas.js'
import type { PendingRequestRegistry } from './pending-requests.js'

/**
 * Receiver of the frames the router does not settle itself.
 */
export interface RouterTarget {
  handleConnected(sessionId: string | null): void
  handleFailed(version: string | null): void
  sendPong(id: string | null): void
  dataAdded(collection: string, documentId: string, fieldsJson: string | null): void
  dataChanged(
    collection: string,
    documentId: string,
    updatedFieldsJson: string | null,
    clearedFieldsJson: string | null
  ): void
  dataRemoved(collection: string, documentId: string): void
  /** A reply arrived for an id nobody is waiting on. */
  unmatchedReply(msg: 'result' | 'ready' | 'nosub', id: string): void
  /** A listener threw while handling a reply. */
  listenerFailed(error: unknown): void
}

export class InboundRouter {
  constructor(
    private readonly registry: PendingRequestRegistry,
    private readonly target: RouterTarget
  ) {}

  route(frame: InboundFrame): void {
    switch (frame.msg) {
      case 'connected':
        this.target.handleConnected(frame.session ?? null)
        return

      case 'failed':
        this.target.handleFailed(frame.version ?? null)
        return

      case 'ping':
        this.target.sendPong(frame.id ?? null)
        return

      case 'added':
      case 'addedBefore':
        this.target.dataAdded(frame.collection, frame.id, rawJson(frame.fields))
        return

      case 'changed':
        this.target.dataChanged(frame.collection, frame.id, rawJson(frame.fields), rawJson(frame.cleared))
        return

      case 'removed':
        this.target.dataRemoved(frame.collection, frame.id)
        return

      case 'result':
        this.routeResult(frame.id, frame.result, frame.error)
        return

      case 'ready':
        for (const id of frame.subs) {
          this.routeReady(id)
        }
        return

      case 'nosub':
        this.routeNoSub(frame.id, frame.error)
        return

      default: {
        const unreachable: never = frame
        return unreachable
      }
    }
  }

  private routeResult(id: string, result: unknown, error: ErrorPayload | undefined): void {
    const waiting = this.registry.resolveIf(id, 'result')
    if (waiting === undefined) {
      this.target.unmatchedReply('result', id)
      return
    }

    if (error !== undefined) {
      const serverError = DdpServerError.fromPayload(error)
      this.invoke(() => waiting.listener.onError(serverError.error, serverError.reason, serverError.details))
    } else {
      const resultJson = rawJson(result)
      this.invoke(() => waiting.listener.onSuccess(resultJson))
    }
  }

  private routeReady(id: string): void {
    const waiting = this.registry.resolveIf(id, 'subscribe')
    if (waiting === undefined) {
      this.target.unmatchedReply('ready', id)
      return
    }
    this.invoke(() => waiting.listener.onSuccess())
  }

  /**
   * `nosub` answers both a failed (or server-ended) subscription and an
   * unsubscription; the registered continuation decides which.
   */
  private routeNoSub(id: string, error: ErrorPayload | undefined): void {
    const waiting = this.registry.resolveIf(id, 'subscribe', 'unsubscribe')
    if (waiting === undefined) {
      this.target.unmatchedReply('nosub', id)
      return
    }

    if (waiting.kind === 'unsubscribe') {
      this.invoke(() => waiting.listener.onSuccess())
      return
    }

    if (error !== undefined) {
      const serverError = DdpServerError.fromPayload(error)
      this.invoke(() => waiting.listener.onError(serverError.error, serverError.reason, serverError.details))
    } else {
      this.invoke(() => waiting.listener.onError(null, null, null))
    }
  }

  private invoke(fn: () => void): void {
    try {
      fn()
    } catch (error) {
      this.target.listenerFailed(error)
    }
  }
}
