import fs from 'fs'
import os from 'os'
import path from 'path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string, error?: unknown): void
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir()
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2))
  return filePath
}

/**
 * Timestamped lines appended to a log file. Never writes to stdout,
 * which belongs to the terminal UI.
 */
export class FileLogger implements Logger {
  private readonly file: string
  private readonly minLevel: LogLevel
  private writable = true

  constructor(file: string, options: { level?: LogLevel; truncate?: boolean } = {}) {
    this.file = expandHome(file)
    this.minLevel = options.level ?? 'info'
    if (options.truncate) this.write(() => fs.writeFileSync(this.file, ''))
  }

  debug(message: string): void {
    this.log('debug', message)
  }

  info(message: string): void {
    this.log('info', message)
  }

  warn(message: string): void {
    this.log('warn', message)
  }

  error(message: string, error?: unknown): void {
    this.log('error', error === undefined ? message : `${message}: ${error instanceof Error ? error.message : 'Unknown error'}`)
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return
    const timestamp = new Date().toISOString()
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}\n`
    this.write(() => fs.appendFileSync(this.file, line))
  }

  // A log file that cannot be written is given up on; the UI keeps running
  private write(operation: () => void): void {
    if (!this.writable) return
    try {
      operation()
    } catch {
      this.writable = false
    }
  }
}

export interface LogEntry {
  level: LogLevel
  message: string
}

/**
 * Keeps entries in memory, for tests
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = []

  debug(message: string): void {
    this.entries.push({ level: 'debug', message })
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message })
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message })
  }

  error(message: string, error?: unknown): void {
    this.entries.push({
      level: 'error',
      message: error === undefined ? message : `${message}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    })
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message)
  }
}
