/**
 * Shared text utilities for the terminal UI
 */

import { emojify as emojifyNode } from 'node-emoji'
import stringWidth from 'string-width'
import type { MessageBody } from '@/platforms/types'

// ==================== Emoji Utilities ====================

/**
 * Convert emoji shortcodes to Unicode emojis in text
 * Uses node-emoji library for comprehensive shortcode support
 */
export const emojify = (text: string): string => {
  return emojifyNode(text)
}

/**
 * Get the visual width of a string (handles emoji width correctly)
 */
export const getStringWidth = (text: string): number => {
  return stringWidth(text)
}

const ELLIPSIS = '…'
const ELLIPSIS_WIDTH = stringWidth(ELLIPSIS)

/**
 * Truncate text to fit within maxWidth (in terminal columns).
 * Emoji and other wide chars count as 2. Appends … when truncated.
 */
export function truncateToWidth(text: string, maxWidth: number): string {
  if (maxWidth < ELLIPSIS_WIDTH) return ''
  const w = stringWidth(text)
  if (w <= maxWidth) return text
  let prefix = ''
  for (const c of text) {
    if (stringWidth(prefix + c) + ELLIPSIS_WIDTH > maxWidth) break
    prefix += c
  }
  return prefix + ELLIPSIS
}

const PREVIEW_LENGTH = 60

/**
 * One-line preview of a message body for chat lists
 */
export function messagePreview(body: MessageBody): string {
  const firstLine = (body.text ?? '').split('\n')[0].trim()
  if (firstLine) return firstLine.length > PREVIEW_LENGTH ? `${firstLine.slice(0, PREVIEW_LENGTH)}…` : firstLine
  return body.image ? '[image]' : ''
}

// ==================== Date Formatting ====================

const pad = (value: number): string => value.toString().padStart(2, '0')

/**
 * Absolute local time, e.g. 2024-03-09 14:05
 */
export const formatTimestamp = (timestamp: number): string => {
  const date = new Date(timestamp)
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`
}

/**
 * Short relative age for recent messages; empty past one day
 */
export const formatRelative = (timestamp: number, now: number): string => {
  const seconds = Math.floor((now - timestamp) / 1000)
  if (seconds < 0) return ''
  if (seconds < 60) return 'just now'
  const minutes = Math.floor(seconds / 60)
  if (minutes < 60) return `${minutes}m ago`
  const hours = Math.floor(minutes / 60)
  if (hours < 24) return `${hours}h ago`
  return ''
}

// ==================== Pane Layout ====================

const MIN_PANE_COLS = 20
const LEFT_RATIO_NUMERATOR = 35
const LEFT_RATIO_DENOMINATOR = 100
// Left and right border of a pane box
const PANE_BORDER_COLS = 2

export interface PaneLayout {
  leftCols: number
  rightCols: number
  leftInner: number
  rightInner: number
}

/**
 * Split the terminal width between the two bordered panes
 */
export function computePaneLayout(cols: number): PaneLayout {
  const total = Math.max(2 * (PANE_BORDER_COLS + 1), cols)
  let leftCols = Math.floor((total * LEFT_RATIO_NUMERATOR) / LEFT_RATIO_DENOMINATOR)
  if (total >= MIN_PANE_COLS * 2) {
    leftCols = Math.min(Math.max(MIN_PANE_COLS, leftCols), total - MIN_PANE_COLS)
  }
  leftCols = Math.min(Math.max(PANE_BORDER_COLS + 1, leftCols), total - PANE_BORDER_COLS - 1)
  const rightCols = total - leftCols
  return {
    leftCols,
    rightCols,
    leftInner: leftCols - PANE_BORDER_COLS,
    rightInner: rightCols - PANE_BORDER_COLS,
  }
}
