/**
 * Ink components for the dual-pane screen
 * Pure views of a RenderSnapshot; all state lives in the view store
 */

import React from 'react'
import { Box, Text, useInput } from 'ink'
import type { KeyName } from '@/cli/engine/event-queue'
import type { PaneDescriptor, RenderRow, RenderSnapshot, RowTone } from '@/cli/engine/render-snapshot'
import { decodeKey } from './keys'

// ==================== Status & Help ====================

interface StatusBarProps {
  text: string
  width: number
}

function StatusBar({ text, width }: StatusBarProps) {
  return (
    <Box width="100%" height={1}>
      <Text inverse color="blue">
        {text.padEnd(width)}
      </Text>
    </Box>
  )
}

interface HelpBarProps {
  text: string
}

function HelpBar({ text }: HelpBarProps) {
  return (
    <Box width="100%" height={1}>
      <Text color="gray">{text}</Text>
    </Box>
  )
}

// ==================== Panes ====================

const TONE_COLORS: Record<RowTone, string> = {
  normal: 'white',
  unread: 'yellow',
  muted: 'gray',
  image: 'white',
  header: 'cyan',
}

function rowColor(row: RenderRow, focused: boolean): string {
  if (row.selected) return focused ? 'green' : 'blue'
  return TONE_COLORS[row.tone]
}

interface PaneProps {
  pane: PaneDescriptor
  height: number
}

export function Pane({ pane, height }: PaneProps) {
  return (
    <Box
      flexDirection="column"
      width={pane.width}
      height={height + 3}
      borderStyle="round"
      borderColor={pane.focused ? 'green' : 'gray'}
    >
      <Text bold color={pane.focused ? 'green' : 'white'} wrap="truncate">
        {pane.title}
      </Text>
      {pane.rows.map((row, idx) => (
        <Text
          key={idx}
          color={rowColor(row, pane.focused)}
          inverse={row.selected && row.text.startsWith('▶')}
          dimColor={row.tone === 'muted'}
          wrap="truncate"
        >
          {row.text || ' '}
        </Text>
      ))}
    </Box>
  )
}

// ==================== Screen ====================

export interface ScreenProps {
  snapshot: RenderSnapshot
  onKey: (key: KeyName) => void
}

export function Screen({ snapshot, onKey }: ScreenProps) {
  useInput((input, key) => {
    onKey(decodeKey(input, key))
  })

  const [left, right] = snapshot.panes
  return (
    <Box flexDirection="column">
      <StatusBar text={snapshot.status} width={left.width + right.width} />
      <Box flexDirection="row">
        <Pane pane={left} height={snapshot.paneRows} />
        <Pane pane={right} height={snapshot.paneRows} />
      </Box>
      <HelpBar text={snapshot.help} />
    </Box>
  )
}
