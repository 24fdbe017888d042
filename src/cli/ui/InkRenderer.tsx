/**
 * Terminal renderer backed by Ink
 */

import React from 'react'
import { render, type Instance } from 'ink'
import type { KeyName } from '@/cli/engine/event-queue'
import type { RenderSnapshot, TerminalRenderer } from '@/cli/engine/render-snapshot'
import { Screen } from './App'

export interface InkRendererOptions {
  stdout?: NodeJS.WriteStream
  stdin?: NodeJS.ReadStream
}

export class InkRenderer implements TerminalRenderer {
  private instance: Instance | null = null
  private readonly stdout: NodeJS.WriteStream
  private readonly stdin: NodeJS.ReadStream
  private keyCallbacks: Array<(key: KeyName) => void> = []
  private resizeCallbacks: Array<(rows: number, cols: number) => void> = []
  private closed = false

  constructor(options: InkRendererOptions = {}) {
    this.stdout = options.stdout ?? process.stdout
    this.stdin = options.stdin ?? process.stdin
    this.stdout.on('resize', this.handleResize)
  }

  get size(): { rows: number; cols: number } {
    return { rows: this.stdout.rows || 24, cols: this.stdout.columns || 80 }
  }

  draw(snapshot: RenderSnapshot): void {
    if (this.closed) return
    const element = <Screen snapshot={snapshot} onKey={this.handleKey} />
    if (this.instance) {
      this.instance.rerender(element)
      return
    }
    this.instance = render(element, { stdout: this.stdout, stdin: this.stdin, exitOnCtrlC: false })
  }

  onKey(callback: (key: KeyName) => void): void {
    this.keyCallbacks.push(callback)
  }

  onResize(callback: (rows: number, cols: number) => void): void {
    this.resizeCallbacks.push(callback)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.stdout.off('resize', this.handleResize)
    if (this.instance) {
      this.instance.unmount()
      await this.instance.waitUntilExit()
      this.instance = null
    }
  }

  private readonly handleKey = (key: KeyName): void => {
    this.keyCallbacks.forEach((cb) => cb(key))
  }

  private readonly handleResize = (): void => {
    const { rows, cols } = this.size
    this.resizeCallbacks.forEach((cb) => cb(rows, cols))
  }
}
