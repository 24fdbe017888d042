/**
 * Central loop
 * The only writer of the view store. Pops one event at a time, routes it,
 * renders once the queue has drained, and owns shutdown.
 */

import type { SessionAdapter } from '@/platforms/types'
import type { Logger } from '@/helpers/logger'
import { InvalidCursorState, SessionFailure, errorMessage } from './errors'
import type { AppEvent, EventQueue } from './event-queue'
import { dispatchKey } from './input-dispatcher'
import { applyRemoteUpdate } from './reconciler'
import type { TerminalRenderer } from './render-snapshot'
import type { RenderScheduler } from './render-scheduler'
import type { ViewStateStore } from './view-store'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1

export interface MainLoopOptions {
  store: ViewStateStore
  queue: EventQueue<AppEvent>
  adapter: SessionAdapter
  renderer: TerminalRenderer
  scheduler: RenderScheduler
  logger: Logger
  shutdownGraceMs: number
}

type Outcome = { stop: false } | { stop: true; code: number }

const CONTINUE: Outcome = { stop: false }

// Events other than quit, resize and failures wait here until the snapshot
// is loaded, then apply in arrival order
interface SessionPhase {
  connected: boolean
  deferred: AppEvent[]
}

function handleEvent(event: AppEvent, options: MainLoopOptions, phase: SessionPhase): Outcome {
  const { store, adapter, scheduler, logger } = options
  switch (event.kind) {
    case 'connected': {
      store.dispatch({ type: 'LOAD_SNAPSHOT', snapshot: event.snapshot })
      store.setStatus(null)
      logger.info(
        `Connected to ${adapter.type}: ${event.snapshot.folders.length} folders, ${event.snapshot.chats.length} chats, ${event.snapshot.messages.length} messages`
      )
      phase.connected = true
      scheduler.start()
      for (const deferred of phase.deferred.splice(0)) {
        const outcome = handleEvent(deferred, options, phase)
        if (outcome.stop) return outcome
      }
      return CONTINUE
    }
    case 'connectFailed': {
      const failure = new SessionFailure(`Could not connect: ${errorMessage(event.error)}`, event.error)
      logger.error('Session failure', failure)
      store.setStatus(failure.message)
      scheduler.render()
      return { stop: true, code: EXIT_FAILURE }
    }
    case 'input': {
      if (!phase.connected) {
        if (event.key === 'quit') return { stop: true, code: EXIT_OK }
        phase.deferred.push(event)
        return CONTINUE
      }
      const result = dispatchKey(store, event.key)
      if (result.quit) return { stop: true, code: EXIT_OK }
      if (result.fetchMore) {
        const { chatId, beforeMessageId } = result.fetchMore
        logger.debug(`FetchMore ${chatId} before ${beforeMessageId}`)
        adapter.fetchMore(chatId, beforeMessageId).catch((error: unknown) => {
          logger.warn(`FetchMore failed for ${chatId}: ${errorMessage(error)}`)
          options.queue.push({
            kind: 'remote',
            update: { kind: 'HistoryBatch', chatId, messages: [], hasMoreBefore: true },
          })
        })
      }
      return CONTINUE
    }
    case 'remote':
      if (!phase.connected) {
        phase.deferred.push(event)
        return CONTINUE
      }
      applyRemoteUpdate(store, event.update, logger)
      store.compact()
      return CONTINUE
    case 'resize':
      store.setViewport(event.rows, event.cols)
      return CONTINUE
    case 'tick':
      store.tick(event.now)
      store.compact()
      return CONTINUE
    case 'imageReady':
      scheduler.acceptImage(event.messageId, event.grid)
      // The grid changes what the frame shows without changing the state
      if (store.getState().right.chatId !== null) scheduler.render()
      return CONTINUE
    case 'sessionFailure': {
      const failure =
        event.error instanceof SessionFailure ? event.error : new SessionFailure(event.error.message, event.error)
      logger.error('Session failure', failure)
      store.setStatus(`Session failed: ${failure.message}`)
      scheduler.render()
      return { stop: true, code: EXIT_FAILURE }
    }
  }
}

/**
 * Stop the scheduler and queue, then give the adapter and renderer a bounded
 * time to close
 */
async function shutdown(options: MainLoopOptions): Promise<void> {
  const { scheduler, queue, adapter, renderer, logger, shutdownGraceMs } = options
  scheduler.stop()
  queue.close()
  const closing = Promise.all([
    adapter.disconnect().catch((error: unknown) => logger.warn(`Disconnect failed: ${errorMessage(error)}`)),
    renderer.close().catch((error: unknown) => logger.warn(`Renderer close failed: ${errorMessage(error)}`)),
  ])
  let timer: ReturnType<typeof setTimeout> | undefined
  const grace = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), shutdownGraceMs)
  })
  const finished = await Promise.race([closing.then(() => true), grace])
  clearTimeout(timer)
  if (!finished) logger.warn(`Shutdown grace period of ${shutdownGraceMs}ms elapsed`)
  logger.info('Shut down')
}

/**
 * Route producers into the queue and start connecting. The connect result
 * arrives as an event, so keys and failures are handled while it is pending.
 */
function startSession(options: MainLoopOptions): void {
  const { store, queue, adapter, renderer, scheduler, logger } = options
  adapter.onUpdate((update) => queue.push({ kind: 'remote', update }))
  adapter.onFailure((error) => queue.push({ kind: 'sessionFailure', error }))
  renderer.onKey((key) => queue.push({ kind: 'input', key }))
  renderer.onResize((rows, cols) => queue.push({ kind: 'resize', rows, cols }))

  store.setStatus(`Connecting to ${adapter.type}...`)
  scheduler.render()
  adapter
    .connect()
    .then(
      (snapshot) => queue.push({ kind: 'connected', snapshot }),
      (error: unknown) => queue.push({ kind: 'connectFailed', error })
    )
    .catch((error: unknown) => logger.error('Connect result was not delivered', error))
}

/**
 * Consume events until quit or session failure. Resolves with the exit code.
 */
export async function runMainLoop(options: MainLoopOptions): Promise<number> {
  const { store, queue, scheduler, logger } = options
  const phase: SessionPhase = { connected: false, deferred: [] }
  let code = EXIT_OK

  startSession(options)

  for await (const event of queue) {
    let outcome: Outcome
    try {
      outcome = handleEvent(event, options, phase)
    } catch (error) {
      if (error instanceof InvalidCursorState) {
        logger.error('Fatal view state error', error)
        outcome = { stop: true, code: EXIT_FAILURE }
      } else {
        // The reducers are pure, so the store still holds the last valid state
        logger.error(`Dropped ${event.kind} event`, error)
        outcome = CONTINUE
      }
    }
    if (outcome.stop) {
      code = outcome.code
      break
    }
    if (queue.size === 0 && store.isDirty()) {
      try {
        scheduler.renderIfDirty()
      } catch (error) {
        logger.error('Render failed', error)
      }
    }
  }

  await shutdown(options)
  return code
}
