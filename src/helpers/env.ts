import * as dotenv from 'dotenv'
import { cleanEnv, str, num } from 'envalid'
import { cwd } from 'process'
import { resolve } from 'path'
import type { PlatformType } from '@/platforms/types'
import { expandHome } from './logger'

export interface DuopaneConfig {
  platform: PlatformType
  discordToken: string
  fixtureFile: string
  renderTickMs: number
  imageBudgetMs: number
  imageWidth: number
  imageCacheSize: number
  maxMessages: number
  logFile: string
  shutdownGraceMs: number
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Validate an environment into the app configuration. Throws ConfigError
 * instead of exiting the process.
 */
export function loadConfig(env: NodeJS.ProcessEnv): DuopaneConfig {
  const parsed = cleanEnv(
    env,
    {
      DUOPANE_PLATFORM: str({ choices: ['discord', 'memory'] as const, default: 'memory' }),
      DISCORD_BOT_TOKEN: str({ default: '' }), // Required when DUOPANE_PLATFORM=discord
      DUOPANE_FIXTURE_FILE: str({ default: './fixtures/sample-session.json' }),
      DUOPANE_RENDER_TICK_MS: num({ default: 1000 }),
      DUOPANE_IMAGE_BUDGET_MS: num({ default: 50 }),
      DUOPANE_IMAGE_WIDTH: num({ default: 40 }),
      DUOPANE_IMAGE_CACHE_SIZE: num({ default: 32 }),
      DUOPANE_MAX_MESSAGES: num({ default: 50 }),
      DUOPANE_LOG_FILE: str({ default: '~/.duopane.log' }),
      DUOPANE_SHUTDOWN_GRACE_MS: num({ default: 250 }),
    },
    {
      reporter: ({ errors }) => {
        const invalid = Object.keys(errors)
        if (invalid.length > 0) throw new ConfigError(`Invalid environment: ${invalid.join(', ')}`)
      },
    }
  )

  if (parsed.DUOPANE_PLATFORM === 'discord' && !parsed.DISCORD_BOT_TOKEN) {
    throw new ConfigError('DISCORD_BOT_TOKEN is required when DUOPANE_PLATFORM=discord')
  }

  for (const [name, value] of [
    ['DUOPANE_RENDER_TICK_MS', parsed.DUOPANE_RENDER_TICK_MS],
    ['DUOPANE_IMAGE_WIDTH', parsed.DUOPANE_IMAGE_WIDTH],
    ['DUOPANE_IMAGE_CACHE_SIZE', parsed.DUOPANE_IMAGE_CACHE_SIZE],
    ['DUOPANE_MAX_MESSAGES', parsed.DUOPANE_MAX_MESSAGES],
  ] as const) {
    if (!Number.isInteger(value) || value <= 0) throw new ConfigError(`${name} must be a positive integer`)
  }

  return {
    platform: parsed.DUOPANE_PLATFORM,
    discordToken: parsed.DISCORD_BOT_TOKEN,
    fixtureFile: resolve(cwd(), expandHome(parsed.DUOPANE_FIXTURE_FILE)),
    renderTickMs: parsed.DUOPANE_RENDER_TICK_MS,
    imageBudgetMs: Math.max(0, parsed.DUOPANE_IMAGE_BUDGET_MS),
    imageWidth: parsed.DUOPANE_IMAGE_WIDTH,
    imageCacheSize: parsed.DUOPANE_IMAGE_CACHE_SIZE,
    maxMessages: parsed.DUOPANE_MAX_MESSAGES,
    logFile: expandHome(parsed.DUOPANE_LOG_FILE),
    shutdownGraceMs: Math.max(0, parsed.DUOPANE_SHUTDOWN_GRACE_MS),
  }
}

/**
 * Load `.env` from the working directory, then validate process.env
 */
export function readConfig(): DuopaneConfig {
  dotenv.config({ path: resolve(cwd(), '.env') })
  // eslint-disable-next-line node/no-process-env
  return loadConfig(process.env)
}
