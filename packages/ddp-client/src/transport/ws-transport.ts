/**
 * @file WebSocket Transport
 *
 * {@link DdpTransport} over the `ws` package. Holds at most one socket; a new
 * `connect()` or a `disconnect()` cuts the previous socket off, so late events
 * from it never reach the session.
 *
 * @module ddp-client/transport/ws-transport
 *
 * @example
 * ```typescript
 * const transport = new WebSocketTransport()
 * transport.connect('wss://example.com/websocket', {
 *   onOpen: () => transport.send('{"msg":"connect","version":"1","support":["1"]}'),
 *   onClose: (code, reason) => console.log('closed', code, reason),
 *   onMessage: (text) => console.log('received', text),
 *   onError: (error) => console.error(error),
 * })
 * ```
 */

import WebSocket from 'ws'
import { DdpTransportError } from '../errors.js'
import type { DdpTransport, TransportHandler } from './types.js'

/** Close code sent when the client closes the socket itself. */
const NORMAL_CLOSURE = 1000

export class WebSocketTransport implements DdpTransport {
  /** The live socket, or `null` once closed or replaced. */
  private socket: WebSocket | null = null

  get isOpen(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN
  }

  connect(url: string, handler: TransportHandler): void {
    this.release()

    let socket: WebSocket
    try {
      socket = new WebSocket(url)
    } catch (error) {
      throw new DdpTransportError(`Failed to open WebSocket to ${url}`, { cause: error, data: { url } })
    }
    this.socket = socket

    // Every listener checks that its socket is still the current one.
    socket.on('open', () => {
      if (this.socket === socket) {
        handler.onOpen()
      }
    })
    socket.on('message', (data: WebSocket.RawData) => {
      if (this.socket === socket) {
        handler.onMessage(toText(data))
      }
    })
    socket.on('error', (error: Error) => {
      if (this.socket === socket) {
        handler.onError(error)
      }
    })
    socket.on('close', (code: number, reason: Buffer) => {
      if (this.socket === socket) {
        this.socket = null
        handler.onClose(code, reason.toString('utf8'))
      }
    })
  }

  disconnect(): void {
    this.release()
  }

  send(payload: string): void {
    if (this.socket === null || this.socket.readyState !== WebSocket.OPEN) {
      throw DdpTransportError.notOpen()
    }
    this.socket.send(payload)
  }

  /**
   * Detaches the current socket and closes it.
   */
  private release(): void {
    const socket = this.socket
    this.socket = null
    if (socket === null) {
      return
    }

    if (socket.readyState === WebSocket.OPEN) {
      socket.close(NORMAL_CLOSURE, 'Client disconnect')
    } else if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate()
    }
  }
}

function toText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8')
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8')
  }
  return data.toString('utf8')
}
