/**
 * Render Scheduler
 * Turns the store into frames for the terminal and drives image conversion.
 * Runs on the central loop's turn; timers and image jobs only push events.
 */

import type { SessionAdapter } from '@/platforms/types'
import type { Logger } from '@/helpers/logger'
import { RenderBudgetExceeded, errorMessage } from './errors'
import type { AppEvent, EventQueue } from './event-queue'
import type { ImageConverter } from './image-converter'
import type { ImageRenderCache, CharGrid } from './image-cache'
import {
  type PendingImage,
  type RenderSnapshot,
  type TerminalRenderer,
  buildRenderSnapshot,
} from './render-snapshot'
import type { ViewStateStore } from './view-store'

export interface RenderSchedulerOptions {
  store: ViewStateStore
  queue: EventQueue<AppEvent>
  renderer: TerminalRenderer
  adapter: Pick<SessionAdapter, 'loadImage' | 'markRead'>
  cache: ImageRenderCache
  converter: ImageConverter
  logger: Logger
  tickMs: number
  imageBudgetMs: number
  title?: string
  clock?: () => number
}

/**
 * Resolves true if the job settles within `ms`, false otherwise
 */
function settlesWithin(job: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms)
    const done = () => {
      clearTimeout(timer)
      resolve(true)
    }
    job.then(done, done)
  })
}

export class RenderScheduler {
  private readonly options: RenderSchedulerOptions
  private readonly clock: () => number
  private readonly inFlight = new Set<string>()
  private timer: ReturnType<typeof setInterval> | null = null
  private stopped = false
  private lastSnapshot: RenderSnapshot | null = null

  constructor(options: RenderSchedulerOptions) {
    this.options = options
    this.clock = options.clock ?? Date.now
  }

  get snapshot(): RenderSnapshot | null {
    return this.lastSnapshot
  }

  get pendingImageJobs(): number {
    return this.inFlight.size
  }

  /**
   * Start the periodic tick. Ticks go through the queue like every other event.
   */
  start(): void {
    if (this.timer || this.stopped) return
    this.timer = setInterval(() => {
      this.options.queue.push({ kind: 'tick', now: this.clock() })
    }, this.options.tickMs)
  }

  stop(): void {
    this.stopped = true
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  /**
   * Draw a frame if the store changed since the last one
   */
  renderIfDirty(): RenderSnapshot | null {
    if (this.stopped || !this.options.store.isDirty()) return null
    return this.render()
  }

  render(): RenderSnapshot {
    let snapshot = this.build()
    // Marking visible messages read changes the store; show it in the same frame
    if (this.markVisibleRead(snapshot)) snapshot = this.build()
    this.present(snapshot)
    return snapshot
  }

  /**
   * Store a finished conversion. Called by the loop on `imageReady`.
   */
  acceptImage(messageId: string, grid: CharGrid): void {
    this.inFlight.delete(messageId)
    this.options.cache.set(messageId, grid)
  }

  private build(): RenderSnapshot {
    const { store, cache } = this.options
    return buildRenderSnapshot(store.getState(), {
      version: store.version,
      title: this.options.title,
      lookupImage: (messageId) => cache.get(messageId),
    })
  }

  private present(snapshot: RenderSnapshot): void {
    const { store, cache, renderer } = this.options
    store.clearDirty()
    renderer.draw(snapshot)
    this.lastSnapshot = snapshot
    cache.pinVisible(snapshot.visibleMessageIds)
    for (const pending of snapshot.pendingImages) this.requestImage(pending)
  }

  private requestImage(pending: PendingImage): void {
    if (this.inFlight.has(pending.messageId) || this.stopped) return
    const { adapter, converter, logger, queue, imageBudgetMs } = this.options
    this.inFlight.add(pending.messageId)

    const job: Promise<CharGrid> = adapter
      .loadImage(pending.ref)
      .then((bytes) => converter.convert(bytes))
      .catch((error: unknown) => {
        logger.warn(`Failed to load image for message ${pending.messageId}: ${errorMessage(error)}`)
        return [`[Error loading image: ${errorMessage(error)}]`]
      })

    settlesWithin(job, imageBudgetMs)
      .then((inTime) => {
        if (!inTime) {
          // Placeholder stays; the result still arrives as an imageReady event
          logger.warn(new RenderBudgetExceeded(pending.messageId, imageBudgetMs).message)
        }
      })
      .catch((error: unknown) => logger.error('Image budget check failed', error))

    job
      .then((grid) => queue.push({ kind: 'imageReady', messageId: pending.messageId, grid }))
      .catch((error: unknown) => logger.error(`Image job for ${pending.messageId} failed`, error))
  }

  private markVisibleRead(snapshot: RenderSnapshot): boolean {
    const { store, adapter, logger } = this.options
    const state = store.getState()
    const chatId = state.right.chatId
    if (state.focus !== 'right' || chatId === null) return false
    const byId = state.messages.get(chatId)
    const unread = snapshot.visibleMessageIds.filter((id) => {
      const message = byId?.get(id)
      return message !== undefined && !message.read && !message.deleted
    })
    const newest = unread[unread.length - 1]
    if (newest === undefined) return false

    store.markReadLocal(chatId, unread)
    adapter
      .markRead(chatId, newest)
      .catch((error: unknown) => logger.warn(`MarkRead failed for ${chatId}: ${errorMessage(error)}`))
    return true
  }
}
