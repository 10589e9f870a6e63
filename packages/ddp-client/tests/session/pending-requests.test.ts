/**
 * @file Pending Request Registry Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { PendingRequestRegistry } from '../../src/session/pending-requests.js'
import type { ResultListener, SubscribeListener } from '../../src/types.js'

function resultListener(): ResultListener {
  return { onSuccess: vi.fn(), onError: vi.fn() }
}

function subscribeListener(): SubscribeListener {
  return { onSuccess: vi.fn(), onError: vi.fn() }
}

describe('PendingRequestRegistry', () => {
  let registry: PendingRequestRegistry

  beforeEach(() => {
    registry = new PendingRequestRegistry()
  })

  it('should start empty', () => {
    expect(registry.size).toBe(0)
    expect(registry.has('a')).toBe(false)
  })

  it('should record nothing without a continuation', () => {
    registry.register('a')

    expect(registry.size).toBe(0)
  })

  it('should resolve a registered continuation exactly once', () => {
    const listener = resultListener()
    registry.register('a', { kind: 'result', listener })

    expect(registry.resolve('a')).toEqual({ kind: 'result', listener })
    expect(registry.resolve('a')).toBeUndefined()
    expect(registry.size).toBe(0)
  })

  it('should replace the continuation registered under the same id', () => {
    const first = subscribeListener()
    const second = { onSuccess: vi.fn() }
    registry.register('s1', { kind: 'subscribe', listener: first })
    registry.register('s1', { kind: 'unsubscribe', listener: second })

    expect(registry.size).toBe(1)
    expect(registry.resolve('s1')).toEqual({ kind: 'unsubscribe', listener: second })
  })

  describe('resolveIf', () => {
    it('should remove a continuation of a requested kind', () => {
      const listener = subscribeListener()
      registry.register('s1', { kind: 'subscribe', listener })

      const waiting = registry.resolveIf('s1', 'subscribe', 'unsubscribe')

      expect(waiting?.kind).toBe('subscribe')
      expect(registry.has('s1')).toBe(false)
    })

    it('should leave a continuation of another kind in place', () => {
      registry.register('m1', { kind: 'result', listener: resultListener() })

      expect(registry.resolveIf('m1', 'subscribe')).toBeUndefined()
      expect(registry.has('m1')).toBe(true)
    })

    it('should return undefined for an unknown id', () => {
      expect(registry.resolveIf('missing', 'result')).toBeUndefined()
    })
  })

  it('should drop everything on clear without invoking listeners', () => {
    const listener = resultListener()
    registry.register('a', { kind: 'result', listener })
    registry.register('b', { kind: 'subscribe', listener: subscribeListener() })

    registry.clear()

    expect(registry.size).toBe(0)
    expect(listener.onSuccess).not.toHaveBeenCalled()
    expect(listener.onError).not.toHaveBeenCalled()
  })
})
