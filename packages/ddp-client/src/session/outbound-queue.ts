/**
 * @file Outbound Queue
 *
 * Serialized frames waiting for the session to reach `connected`.
 *
 * @module ddp-client/session/outbound-queue
 */

export class OutboundQueue {
  private messages: string[] = []

  /** Number of frames waiting. */
  get size(): number {
    return this.messages.length
  }

  enqueue(message: string): void {
    this.messages.push(message)
  }

  /**
   * Hands every queued frame to `sink` in the order it was queued, exactly
   * once, and leaves the queue empty.
   *
   * Works on a snapshot: frames enqueued by `sink` stay for the next drain.
   * If `sink` throws, the frames not yet handed over are put back at the
   * front of the queue and the error propagates.
   *
   * @returns Number of frames handed to `sink`
   */
  drain(sink: (message: string) => void): number {
    const snapshot = this.messages
    this.messages = []

    let sent = 0
    try {
      for (const message of snapshot) {
        sink(message)
        sent++
      }
    } finally {
      if (sent < snapshot.length) {
        this.messages = [...snapshot.slice(sent), ...this.messages]
      }
    }
    return sent
  }
}
