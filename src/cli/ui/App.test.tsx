import React from 'react'
import { render } from 'ink-testing-library'
import { describe, expect, it } from 'vitest'
import type { KeyName } from '@/cli/engine/event-queue'
import { buildRenderSnapshot } from '@/cli/engine/render-snapshot'
import { openChat, sampleStore } from '@/testing/builders'
import { Screen } from './App'

const tick = () => new Promise((resolve) => setTimeout(resolve, 20))

describe('Screen', () => {
  it('draws status, both panes and the help line', () => {
    const store = sampleStore()
    openChat(store)
    const snapshot = buildRenderSnapshot(store.getState(), { version: 1 })
    const { lastFrame, unmount } = render(<Screen snapshot={snapshot} onKey={() => undefined} />)
    const frame = lastFrame() ?? ''

    expect(frame).toContain('duopane')
    expect(frame).toContain('Work')
    expect(frame).toContain('▶ chat c3')
    expect(frame).toContain('▶ ana [2024-06-10 09:01]')
    expect(frame).toContain('text of m3')
    expect(frame).toContain('Tab=switch pane · ↑↓=move · Enter=open · Esc=back · Ctrl+Q=quit')
    unmount()
  })

  it('decodes keys into dispatcher key names', async () => {
    const keys: KeyName[] = []
    const snapshot = buildRenderSnapshot(sampleStore().getState(), { version: 1 })
    const { stdin, unmount } = render(<Screen snapshot={snapshot} onKey={(key) => keys.push(key)} />)
    await tick()

    stdin.write('\t')
    stdin.write('\u001B[A')
    stdin.write('\u001B[B')
    stdin.write('\r')
    stdin.write('x')
    stdin.write('\u0011')
    await tick()

    expect(keys).toEqual(['tab', 'up', 'down', 'enter', 'other', 'quit'])
    unmount()
  })
})
