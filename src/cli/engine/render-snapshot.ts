/**
 * Render Snapshot
 * Flattens one ViewState value into the rows the terminal draws. The
 * snapshot is built from a single immutable state and frozen, so later
 * mutations can never show up in a frame that is already being drawn.
 */

import type { ImageRef, MessageEntity } from '@/platforms/types'
import { emojify, formatRelative, formatTimestamp, computePaneLayout, truncateToWidth } from '@/cli/shared'
import type { KeyName } from './event-queue'
import type { CharGrid } from './image-cache'
import {
  CHROME_ROWS,
  type ChatState,
  type PaneId,
  type ViewState,
  leftSequenceFor,
} from './view-store'

// ==================== Types ====================

export type RowTone = 'normal' | 'unread' | 'muted' | 'image' | 'header'

export interface RenderRow {
  readonly text: string
  readonly selected: boolean
  readonly tone: RowTone
}

export interface PaneDescriptor {
  readonly id: PaneId
  readonly title: string
  readonly focused: boolean
  /** Outer width in columns, border included */
  readonly width: number
  readonly rows: readonly RenderRow[]
}

export interface PendingImage {
  readonly chatId: string
  readonly messageId: string
  readonly ref: ImageRef
}

export interface RenderSnapshot {
  readonly version: number
  readonly status: string
  readonly help: string
  /** Rows available to each pane's list */
  readonly paneRows: number
  readonly panes: readonly [PaneDescriptor, PaneDescriptor]
  readonly visibleMessageIds: readonly string[]
  readonly pendingImages: readonly PendingImage[]
}

export interface SnapshotOptions {
  version: number
  title?: string
  lookupImage?: (messageId: string) => CharGrid | undefined
}

// ==================== Constants ====================

export const HELP_BINDINGS: ReadonlyArray<{ key: string; label: string }> = [
  { key: 'Tab', label: 'switch pane' },
  { key: '↑↓', label: 'move' },
  { key: 'Enter', label: 'open' },
  { key: 'Esc', label: 'back' },
  { key: 'Ctrl+Q', label: 'quit' },
]
export const HELP_TEXT = HELP_BINDINGS.map((b) => `${b.key}=${b.label}`).join(' · ')
export const IMAGE_PLACEHOLDER = '[image: loading…]'
export const DELETED_PLACEHOLDER = '[message deleted]'

const SELECTED_PREFIX = '▶ '
const PLAIN_PREFIX = '  '
const DEFAULT_TITLE = 'duopane'

// ==================== Row Helpers ====================

function row(text: string, width: number, selected = false, tone: RowTone = 'normal'): RenderRow {
  return Object.freeze({ text: truncateToWidth(text, width), selected, tone })
}

function prefixed(label: string, selected: boolean): string {
  return `${selected ? SELECTED_PREFIX : PLAIN_PREFIX}${label}`
}

function freezePane(pane: PaneDescriptor): PaneDescriptor {
  return Object.freeze({ ...pane, rows: Object.freeze([...pane.rows]) })
}

export function paneRowCount(state: Pick<ViewState, 'screen'>): number {
  return Math.max(1, state.screen.rows - CHROME_ROWS)
}

// ==================== Left Pane ====================

// A cursor pushed past the stored scroll by an insert still gets drawn
function leftWindowStart(scroll: number, cursor: number | null, height: number): number {
  if (cursor === null) return scroll
  if (cursor >= scroll + height) return cursor - height + 1
  if (cursor < scroll) return cursor
  return scroll
}

function buildLeftPane(state: ViewState, outer: number, width: number, height: number): PaneDescriptor {
  const { level } = state.left
  const sequence = leftSequenceFor(state, level)
  const focused = state.focus === 'left'
  const rows: RenderRow[] = []

  const start = leftWindowStart(state.left.scroll, state.left.cursor, height)
  const window = sequence.slice(start, start + height)
  window.forEach((id, offset) => {
    const selected = start + offset === state.left.cursor
    if (level.kind === 'folders') {
      const folder = state.folders.get(id)
      if (!folder) return
      const label = `${folder.name} (${folder.chatIds.length})`
      const unread = folder.chatIds.some((chatId) => (state.chats.get(chatId)?.unreadCount ?? 0) > 0)
      rows.push(row(prefixed(label, selected), width, selected, unread ? 'unread' : 'normal'))
      return
    }
    const chat = state.chats.get(id)
    if (!chat) return
    const label = chat.unreadCount > 0 ? `(${chat.unreadCount}) ${chat.name}` : chat.name
    rows.push(row(prefixed(label, selected), width, selected, chat.unreadCount > 0 ? 'unread' : 'normal'))
  })

  if (sequence.length === 0) {
    rows.push(row(level.kind === 'folders' ? '(no folders)' : '(no chats)', width, false, 'muted'))
  }

  const title =
    level.kind === 'folders' ? 'Folders' : state.folders.get(level.folderId)?.name ?? level.folderId

  return freezePane({ id: 'left', title, focused, width: outer, rows })
}

// ==================== Right Pane ====================

interface MessageBlock {
  id: string
  rows: RenderRow[]
}

function messageHeader(message: MessageEntity, now: number): string {
  const relative = formatRelative(message.timestamp, now)
  let header = `${message.sender} [${formatTimestamp(message.timestamp)}]`
  if (relative) header += ` ${relative}`
  if (message.edited && !message.deleted) header += ' (edited)'
  return header
}

function buildMessageBlock(
  message: MessageEntity,
  selected: boolean,
  width: number,
  now: number,
  lookupImage: SnapshotOptions['lookupImage'],
  pending: PendingImage[]
): MessageBlock {
  const rows: RenderRow[] = [
    row(prefixed(messageHeader(message, now), selected), width, selected, message.read ? 'header' : 'unread'),
  ]

  if (message.deleted) {
    rows.push(row(`${PLAIN_PREFIX}${DELETED_PLACEHOLDER}`, width, selected, 'muted'))
  } else {
    const text = message.body.text ?? ''
    if (text) {
      for (const line of emojify(text).split('\n')) {
        rows.push(row(`${PLAIN_PREFIX}${line}`, width, selected))
      }
    }
    const image = message.body.image
    if (image) {
      const grid = lookupImage?.(message.id)
      if (grid) {
        for (const line of grid) rows.push(row(`${PLAIN_PREFIX}${line}`, width, selected, 'image'))
      } else {
        rows.push(row(`${PLAIN_PREFIX}${IMAGE_PLACEHOLDER}`, width, selected, 'muted'))
        pending.push(Object.freeze({ chatId: message.chatId, messageId: message.id, ref: image }))
      }
    }
  }

  rows.push(row('', width, false))
  return { id: message.id, rows }
}

function blockHeight(blocks: readonly MessageBlock[]): number {
  return blocks.reduce((total, block) => total + block.rows.length, 0)
}

function typingRow(state: ViewState, chatId: string, width: number): RenderRow | null {
  const indicator = state.typing.get(chatId)
  if (!indicator || indicator.until <= state.now) return null
  const dots = '.'.repeat((Math.floor(state.now / 1000) % 3) + 1)
  return row(`${PLAIN_PREFIX}${indicator.sender} is typing${dots}`, width, false, 'muted')
}

function buildRightPane(
  state: ViewState,
  outer: number,
  width: number,
  height: number,
  lookupImage: SnapshotOptions['lookupImage']
): { pane: PaneDescriptor; visible: string[]; pending: PendingImage[] } {
  const focused = state.focus === 'right'
  const { chatId, cursor, scroll } = state.right
  const chat: ChatState | undefined = chatId === null ? undefined : state.chats.get(chatId)
  const pending: PendingImage[] = []

  if (chatId === null || !chat) {
    const rows = [row('Select a chat to view messages', width, false, 'muted')]
    return { pane: freezePane({ id: 'right', title: 'Messages', focused, width: outer, rows }), visible: [], pending }
  }

  const byId = state.messages.get(chatId)
  const top: RenderRow[] = []
  const bottom: RenderRow[] = []
  if (scroll === 0 && chat.fetchPending) top.push(row('Loading older messages…', width, false, 'muted'))
  const typing = typingRow(state, chatId, width)
  if (typing) bottom.push(typing)

  const budget = Math.max(1, height - top.length - bottom.length)
  const build = (index: number): MessageBlock | null => {
    const message = byId?.get(chat.messageIds[index])
    if (!message) return null
    return buildMessageBlock(message, index === cursor, width, state.now, lookupImage, pending)
  }

  // Blocks from the scroll offset through the cursor; if the cursor's block
  // does not fit, leading blocks are dropped for this frame only
  const blocks: MessageBlock[] = []
  const last = cursor ?? scroll
  for (let index = scroll; index <= last && index < chat.messageIds.length; index++) {
    const block = build(index)
    if (block) blocks.push(block)
  }
  while (blocks.length > 1 && blockHeight(blocks) > budget) blocks.shift()
  for (let index = last + 1; index < chat.messageIds.length && blockHeight(blocks) < budget; index++) {
    const block = build(index)
    if (block) blocks.push(block)
  }

  // Images requested only for messages that made it on screen
  const visible = blocks.map((block) => block.id)
  const visibleSet = new Set(visible)
  const visiblePending = pending.filter((item) => visibleSet.has(item.messageId))

  const messageRows = blocks.flatMap((block) => block.rows).slice(0, budget)
  if (chat.messageIds.length === 0) messageRows.push(row('(no messages)', width, false, 'muted'))

  const rows = [...top, ...messageRows, ...bottom]
  return {
    pane: freezePane({ id: 'right', title: chat.name, focused, width: outer, rows }),
    visible,
    pending: visiblePending,
  }
}

// ==================== Snapshot ====================

export function buildRenderSnapshot(state: ViewState, options: SnapshotOptions): RenderSnapshot {
  const layout = computePaneLayout(state.screen.cols)
  const height = paneRowCount(state)
  const left = buildLeftPane(state, layout.leftCols, layout.leftInner, height)
  const right = buildRightPane(state, layout.rightCols, layout.rightInner, height, options.lookupImage)
  const title = options.title ?? DEFAULT_TITLE

  const panes: readonly [PaneDescriptor, PaneDescriptor] = Object.freeze([left, right.pane] as const)
  const snapshot: RenderSnapshot = {
    version: options.version,
    status: state.status ? `${title} | ${state.status}` : title,
    help: HELP_TEXT,
    paneRows: height,
    panes,
    visibleMessageIds: Object.freeze(right.visible),
    pendingImages: Object.freeze(right.pending),
  }
  return Object.freeze(snapshot)
}

// ==================== Renderer ====================

/**
 * Terminal output driver. Draws snapshots and reports keys and resizes.
 */
export interface TerminalRenderer {
  draw(snapshot: RenderSnapshot): void
  onKey(callback: (key: KeyName) => void): void
  onResize(callback: (rows: number, cols: number) => void): void
  close(): Promise<void>
}
