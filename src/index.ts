/**
 * duopane entry point
 * Wires config, logging, the session adapter, the view engine and the Ink
 * renderer, then exits with the loop's code
 */

import { readConfig } from '@/helpers/env'
import { FileLogger } from '@/helpers/logger'
import { createSessionAdapter } from '@/platforms/factory'
import { errorMessage } from '@/cli/engine/errors'
import { EventQueue, type AppEvent } from '@/cli/engine/event-queue'
import { ImageRenderCache } from '@/cli/engine/image-cache'
import { JimpAsciiConverter } from '@/cli/engine/image-converter'
import { EXIT_FAILURE, runMainLoop } from '@/cli/engine/main-loop'
import { RenderScheduler } from '@/cli/engine/render-scheduler'
import { ViewStateStore, createInitialState } from '@/cli/engine/view-store'
import { InkRenderer } from '@/cli/ui/InkRenderer'

async function main(): Promise<number> {
  const config = readConfig()
  const logger = new FileLogger(config.logFile, { truncate: true })
  logger.info(`Starting duopane (platform: ${config.platform})`)

  const adapter = await createSessionAdapter(config, logger)
  const renderer = new InkRenderer()
  const store = new ViewStateStore(createInitialState(renderer.size))
  const queue = new EventQueue<AppEvent>()
  const scheduler = new RenderScheduler({
    store,
    queue,
    renderer,
    adapter,
    cache: new ImageRenderCache(config.imageCacheSize),
    converter: new JimpAsciiConverter(config.imageWidth),
    logger,
    tickMs: config.renderTickMs,
    imageBudgetMs: config.imageBudgetMs,
    title: `duopane · ${config.platform}`,
  })

  return runMainLoop({
    store,
    queue,
    adapter,
    renderer,
    scheduler,
    logger,
    shutdownGraceMs: config.shutdownGraceMs,
  })
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`duopane failed to start: ${errorMessage(error)}`)
    process.exit(EXIT_FAILURE)
  })
