/**
 * Session adapter factory
 * Creates the appropriate adapter based on the configured platform
 */

import type { DuopaneConfig } from '@/helpers/env'
import type { Logger } from '@/helpers/logger'
import type { SessionAdapter } from './types'
import { DiscordSessionAdapter } from './discord/client'
import { MemorySessionAdapter } from './memory/client'

/**
 * Create a session adapter instance
 */
export async function createSessionAdapter(config: DuopaneConfig, logger: Logger): Promise<SessionAdapter> {
  switch (config.platform) {
    case 'discord':
      return new DiscordSessionAdapter({ token: config.discordToken, maxMessages: config.maxMessages, logger })

    case 'memory':
      return MemorySessionAdapter.fromFile(config.fixtureFile, { maxMessages: config.maxMessages })
  }
}
