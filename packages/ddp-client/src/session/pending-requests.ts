/**
 * @file Pending Request Registry
 *
 * Tracks which listener is waiting for a reply to which request id. Method
 * calls, subscriptions and unsubscriptions share one id space, so each slot
 * records what kind of reply it expects.
 *
 * There is no timeout: a continuation stays registered until a matching reply
 * arrives or the whole registry is cleared.
 *
 * @module ddp-client/session/pending-requests
 */

import type { ResultListener, SubscribeListener, UnsubscribeListener } from '../types.js'

/**
 * A listener waiting for a reply, tagged with the reply kind it expects.
 */
export type Continuation =
  | { kind: 'result'; listener: ResultListener }
  | { kind: 'subscribe'; listener: SubscribeListener }
  | { kind: 'unsubscribe'; listener: UnsubscribeListener }

export type ContinuationKind = Continuation['kind']

/**
 * Narrows a continuation to the variants listed in `K`.
 */
export type ContinuationOf<K extends ContinuationKind> = Extract<Continuation, { kind: K }>

export class PendingRequestRegistry {
  private readonly pending = new Map<string, Continuation>()

  /** Number of requests awaiting a reply. */
  get size(): number {
    return this.pending.size
  }

  /**
   * Registers a continuation for a request id, replacing whatever was there.
   *
   * Without a continuation nothing is recorded: the request is fire and forget.
   */
  register(id: string, continuation?: Continuation): void {
    if (continuation === undefined) {
      return
    }
    this.pending.set(id, continuation)
  }

  has(id: string): boolean {
    return this.pending.has(id)
  }

  /**
   * Removes and returns the continuation for `id`.
   *
   * @returns The continuation, or `undefined` if nobody is waiting
   */
  resolve(id: string): Continuation | undefined {
    const continuation = this.pending.get(id)
    if (continuation !== undefined) {
      this.pending.delete(id)
    }
    return continuation
  }

  /**
   * Removes and returns the continuation for `id` only when it is one of the
   * given kinds. A slot of any other kind is left in place.
   *
   * @example
   * ```typescript
   * const waiting = registry.resolveIf(frame.id, 'subscribe', 'unsubscribe')
   * if (waiting?.kind === 'unsubscribe') {
   *   waiting.listener.onSuccess()
   * }
   * ```
   */
  resolveIf<K extends ContinuationKind>(id: string, ...kinds: K[]): ContinuationOf<K> | undefined {
    const continuation = this.pending.get(id)
    if (continuation === undefined || !isKind(continuation, kinds)) {
      return undefined
    }
    this.pending.delete(id)
    return continuation
  }

  /**
   * Drops every pending continuation without invoking any of them.
   */
  clear(): void {
    this.pending.clear()
  }
}

function isKind<K extends ContinuationKind>(
  continuation: Continuation,
  kinds: readonly K[]
): continuation is ContinuationOf<K> {
  return kinds.some((kind) => kind === continuation.kind)
}
