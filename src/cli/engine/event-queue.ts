/**
 * Process-wide ordered event channel.
 * Any number of producers push; exactly one consumer iterates.
 */

import type { InitialSnapshot, RemoteUpdate } from '@/platforms/types'
import type { CharGrid } from './image-cache'

export type KeyName = 'tab' | 'up' | 'down' | 'enter' | 'escape' | 'quit' | 'other'

export type AppEvent =
  | { kind: 'input'; key: KeyName }
  | { kind: 'remote'; update: RemoteUpdate }
  | { kind: 'resize'; rows: number; cols: number }
  | { kind: 'tick'; now: number }
  | { kind: 'imageReady'; messageId: string; grid: CharGrid }
  | { kind: 'sessionFailure'; error: Error }
  | { kind: 'connected'; snapshot: InitialSnapshot }
  | { kind: 'connectFailed'; error: unknown }

export class EventQueue<T = AppEvent> implements AsyncIterable<T> {
  private readonly buffer: T[] = []
  private waiter: ((result: IteratorResult<T>) => void) | null = null
  private closed = false

  get size(): number {
    return this.buffer.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Enqueue an event. Pushing after close is ignored.
   */
  push(event: T): void {
    if (this.closed) return
    if (this.waiter) {
      const resolve = this.waiter
      this.waiter = null
      resolve({ value: event, done: false })
      return
    }
    this.buffer.push(event)
  }

  /**
   * Stop delivery. Buffered events are discarded.
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.buffer.length = 0
    if (this.waiter) {
      const resolve = this.waiter
      this.waiter = null
      resolve({ value: undefined, done: true })
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    const event = this.buffer.shift()
    if (event !== undefined) {
      return Promise.resolve({ value: event, done: false })
    }
    if (this.waiter) {
      return Promise.reject(new Error('EventQueue supports a single consumer'))
    }
    return new Promise((resolve) => {
      this.waiter = resolve
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() }
  }
}
