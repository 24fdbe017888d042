import { describe, expect, it } from 'vitest'
import { EventQueue } from './event-queue'

describe('EventQueue', () => {
  it('delivers buffered events in push order', async () => {
    const queue = new EventQueue<number>()
    queue.push(1)
    queue.push(2)
    expect(queue.size).toBe(2)
    expect(await queue.next()).toEqual({ value: 1, done: false })
    expect(await queue.next()).toEqual({ value: 2, done: false })
    expect(queue.size).toBe(0)
  })

  it('wakes a waiting consumer on push', async () => {
    const queue = new EventQueue<string>()
    const pending = queue.next()
    queue.push('a')
    expect(await pending).toEqual({ value: 'a', done: false })
  })

  it('ends iteration on close and ignores later pushes', async () => {
    const queue = new EventQueue<number>()
    queue.push(1)
    const seen: number[] = []
    const consumer = (async () => {
      for await (const value of queue) {
        seen.push(value)
        if (value === 2) queue.close()
      }
    })()
    queue.push(2)
    await consumer
    queue.push(3)
    expect(seen).toEqual([1, 2])
    expect(queue.isClosed).toBe(true)
    expect(queue.size).toBe(0)
  })

  it('resolves a waiting consumer with done when closed', async () => {
    const queue = new EventQueue<number>()
    const pending = queue.next()
    queue.close()
    expect(await pending).toEqual({ value: undefined, done: true })
  })

  it('rejects a second concurrent consumer', async () => {
    const queue = new EventQueue<number>()
    const first = queue.next()
    await expect(queue.next()).rejects.toThrow('EventQueue supports a single consumer')
    queue.push(7)
    expect(await first).toEqual({ value: 7, done: false })
  })
})
