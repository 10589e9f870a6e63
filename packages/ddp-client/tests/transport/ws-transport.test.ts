/**
 * @file WebSocket Transport Tests
 *
 * Tests for the `ws`-backed transport: event forwarding, sending, and cutting
 * off sockets that were replaced or disconnected.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { WebSocketTransport } from '../../src/transport/ws-transport.js'
import { DdpTransportError } from '../../src/errors.js'
import type { TransportHandler } from '../../src/transport/types.js'

const { MockWebSocket, sockets } = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void

  class MockWebSocket {
    static CONNECTING = 0
    static OPEN = 1
    static CLOSING = 2
    static CLOSED = 3

    readyState: number = MockWebSocket.CONNECTING
    readonly sent: string[] = []
    closeArgs: [number | undefined, string | undefined] | null = null
    terminated = false
    private listeners = new Map<string, Listener[]>()

    constructor(readonly url: string) {
      sockets.push(this)
    }

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener])
      return this
    }

    send(data: string): void {
      this.sent.push(data)
    }

    close(code?: number, reason?: string): void {
      this.readyState = MockWebSocket.CLOSING
      this.closeArgs = [code, reason]
    }

    terminate(): void {
      this.readyState = MockWebSocket.CLOSED
      this.terminated = true
    }

    // Test helpers
    emit(event: string, ...args: unknown[]): void {
      for (const listener of this.listeners.get(event) ?? []) {
        listener(...args)
      }
    }

    simulateOpen(): void {
      this.readyState = MockWebSocket.OPEN
      this.emit('open')
    }

    simulateMessage(data: Buffer | Buffer[]): void {
      this.emit('message', data, false)
    }

    simulateClose(code: number, reason: string): void {
      this.readyState = MockWebSocket.CLOSED
      this.emit('close', code, Buffer.from(reason))
    }
  }

  const sockets: MockWebSocket[] = []
  return { MockWebSocket, sockets }
})

vi.mock('ws', () => ({ default: MockWebSocket }))

function createHandler() {
  return {
    onOpen: vi.fn(),
    onClose: vi.fn(),
    onMessage: vi.fn(),
    onError: vi.fn(),
  } satisfies TransportHandler
}

function lastSocket() {
  const socket = sockets[sockets.length - 1]
  if (socket === undefined) {
    throw new Error('No socket was created')
  }
  return socket
}

describe('WebSocketTransport', () => {
  let transport: WebSocketTransport
  let handler: ReturnType<typeof createHandler>

  beforeEach(() => {
    sockets.length = 0
    transport = new WebSocketTransport()
    handler = createHandler()
  })

  describe('connect', () => {
    it('should open a socket to the given URL', () => {
      transport.connect('ws://localhost:3000/websocket', handler)

      expect(sockets).toHaveLength(1)
      expect(lastSocket().url).toBe('ws://localhost:3000/websocket')
      expect(transport.isOpen).toBe(false)
    })

    it('should report open once the socket opens', () => {
      transport.connect('ws://localhost:3000/websocket', handler)
      lastSocket().simulateOpen()

      expect(handler.onOpen).toHaveBeenCalledTimes(1)
      expect(transport.isOpen).toBe(true)
    })

    it('should terminate a socket still connecting when replaced', () => {
      transport.connect('ws://localhost:3000/websocket', handler)
      const first = lastSocket()

      transport.connect('ws://localhost:3000/websocket', handler)

      expect(first.terminated).toBe(true)
      expect(sockets).toHaveLength(2)
    })
  })

  describe('events', () => {
    beforeEach(() => {
      transport.connect('ws://localhost:3000/websocket', handler)
      lastSocket().simulateOpen()
    })

    it('should forward text messages', () => {
      lastSocket().simulateMessage(Buffer.from('{"msg":"ping"}'))

      expect(handler.onMessage).toHaveBeenCalledWith('{"msg":"ping"}')
    })

    it('should join fragmented messages', () => {
      lastSocket().simulateMessage([Buffer.from('{"msg":'), Buffer.from('"ping"}')])

      expect(handler.onMessage).toHaveBeenCalledWith('{"msg":"ping"}')
    })

    it('should forward errors', () => {
      const error = new Error('ECONNRESET')
      lastSocket().emit('error', error)

      expect(handler.onError).toHaveBeenCalledWith(error)
    })

    it('should forward close with a decoded reason', () => {
      lastSocket().simulateClose(1001, 'Going away')

      expect(handler.onClose).toHaveBeenCalledWith(1001, 'Going away')
      expect(transport.isOpen).toBe(false)
    })
  })

  describe('send', () => {
    it('should write to the open socket', () => {
      transport.connect('ws://localhost:3000/websocket', handler)
      lastSocket().simulateOpen()

      transport.send('{"msg":"pong"}')

      expect(lastSocket().sent).toEqual(['{"msg":"pong"}'])
    })

    it('should throw when no socket is open', () => {
      expect(() => transport.send('{"msg":"pong"}')).toThrow(DdpTransportError)

      transport.connect('ws://localhost:3000/websocket', handler)
      expect(() => transport.send('{"msg":"pong"}')).toThrow('WebSocket is not open')
    })
  })

  describe('disconnect', () => {
    it('should close an open socket with a normal closure', () => {
      transport.connect('ws://localhost:3000/websocket', handler)
      const socket = lastSocket()
      socket.simulateOpen()

      transport.disconnect()

      expect(socket.closeArgs).toEqual([1000, 'Client disconnect'])
      expect(transport.isOpen).toBe(false)
    })

    it('should deliver no events from a disconnected socket', () => {
      transport.connect('ws://localhost:3000/websocket', handler)
      const socket = lastSocket()
      socket.simulateOpen()

      transport.disconnect()
      socket.simulateMessage(Buffer.from('{"msg":"ping"}'))
      socket.simulateClose(1000, 'Client disconnect')

      expect(handler.onMessage).not.toHaveBeenCalled()
      expect(handler.onClose).not.toHaveBeenCalled()
    })

    it('should do nothing without a socket', () => {
      expect(() => transport.disconnect()).not.toThrow()
    })
  })
})
