/**
 * View State Store
 * Immutable model of both panes. Every mutation is a reducer action that
 * returns a new ViewState; a ViewState value is never changed after it has
 * been handed out, so any reader holds a consistent point-in-time copy.
 */

import type {
  ChatEntity,
  FolderEntity,
  InitialSnapshot,
  MessageBody,
  MessageEntity,
} from '@/platforms/types'
import { messagePreview } from '@/cli/shared'
import { InvalidCursorState } from './errors'
import {
  type PanelAnchor,
  type PanelPosition,
  anchorOf,
  clampPosition,
  moveWithin,
  preservePosition,
  restorePosition,
} from './position'

// ==================== Types ====================

export type PaneId = 'left' | 'right'

export type LeftLevel = { kind: 'folders' } | { kind: 'chats'; folderId: string }

export interface LeftPanel extends PanelPosition {
  level: LeftLevel
}

export interface RightPanel extends PanelPosition {
  chatId: string | null
}

export interface ChatState extends ChatEntity {
  messageIds: readonly string[] // chronological
  hasMoreBefore: boolean
  fetchPending: boolean
}

export interface BackStackEntry {
  left: LeftPanel
  right: RightPanel
  focus: PaneId
  anchors: { left: PanelAnchor; right: PanelAnchor }
}

export interface TypingIndicator {
  sender: string
  until: number
}

export interface ScreenSize {
  rows: number
  cols: number
}

export interface ViewState {
  folders: ReadonlyMap<string, FolderEntity>
  folderOrder: readonly string[]
  chats: ReadonlyMap<string, ChatState>
  messages: ReadonlyMap<string, ReadonlyMap<string, MessageEntity>>
  left: LeftPanel
  right: RightPanel
  focus: PaneId
  backStack: readonly BackStackEntry[]
  typing: ReadonlyMap<string, TypingIndicator>
  screen: ScreenSize
  status: string | null
  now: number
}

export type ViewAction =
  | { type: 'LOAD_SNAPSHOT'; snapshot: InitialSnapshot }
  | { type: 'UPSERT_FOLDER'; folder: FolderEntity }
  | { type: 'REMOVE_FOLDER'; folderId: string }
  | { type: 'UPSERT_CHAT'; chat: ChatEntity }
  | { type: 'UPSERT_MESSAGE'; chatId: string; message: MessageEntity }
  | { type: 'MARK_DELETED'; chatId: string; messageId: string }
  | { type: 'APPLY_HISTORY'; chatId: string; messages: MessageEntity[]; hasMoreBefore: boolean }
  | { type: 'SET_TYPING'; chatId: string; sender: string; until: number }
  | { type: 'TICK'; now: number }
  | { type: 'MARK_READ_LOCAL'; chatId: string; messageIds: readonly string[] }
  | { type: 'SET_FETCH_PENDING'; chatId: string; pending: boolean }
  | { type: 'COMPACT' }
  | { type: 'SET_FOCUS'; pane: PaneId }
  | { type: 'MOVE_CURSOR'; pane: PaneId; delta: number }
  | { type: 'OPEN_SELECTED' }
  | { type: 'GO_BACK' }
  | { type: 'SET_SCREEN'; rows: number; cols: number }
  | { type: 'SET_STATUS'; text: string | null }

// ==================== Constants ====================

// Status bar, help bar, pane border (2) and pane title
export const CHROME_ROWS = 5
// Approximate rows a message takes (header, body, separator)
export const MESSAGE_ROW_ESTIMATE = 3

// ==================== Selectors ====================

export function createInitialState(screen: ScreenSize = { rows: 24, cols: 80 }, now = Date.now()): ViewState {
  return {
    folders: new Map(),
    folderOrder: [],
    chats: new Map(),
    messages: new Map(),
    left: { level: { kind: 'folders' }, cursor: null, scroll: 0 },
    right: { chatId: null, cursor: null, scroll: 0 },
    focus: 'left',
    backStack: [],
    typing: new Map(),
    screen,
    status: null,
    now,
  }
}

export function leftSequenceFor(
  state: Pick<ViewState, 'folders' | 'folderOrder'>,
  level: LeftLevel
): readonly string[] {
  if (level.kind === 'folders') return state.folderOrder
  return state.folders.get(level.folderId)?.chatIds ?? []
}

export function rightSequenceFor(state: Pick<ViewState, 'chats'>, chatId: string | null): readonly string[] {
  if (chatId === null) return []
  return state.chats.get(chatId)?.messageIds ?? []
}

export function paneSequence(state: ViewState, pane: PaneId): readonly string[] {
  return pane === 'left'
    ? leftSequenceFor(state, state.left.level)
    : rightSequenceFor(state, state.right.chatId)
}

/**
 * Number of entities the pane can show at once
 */
export function paneCapacity(state: Pick<ViewState, 'screen'>, pane: PaneId): number {
  const paneRows = Math.max(1, state.screen.rows - CHROME_ROWS)
  return pane === 'left' ? paneRows : Math.max(1, Math.floor(paneRows / MESSAGE_ROW_ESTIMATE))
}

export function selectedId(state: ViewState, pane: PaneId): string | null {
  const panel = pane === 'left' ? state.left : state.right
  if (panel.cursor === null) return null
  return paneSequence(state, pane)[panel.cursor] ?? null
}

/**
 * Throws InvalidCursorState when a pane's cursor or scroll is out of range
 */
export function assertPanelInvariant(state: ViewState): void {
  for (const pane of ['left', 'right'] as const) {
    const panel = pane === 'left' ? state.left : state.right
    const length = paneSequence(state, pane).length
    if (length === 0) {
      if (panel.cursor !== null) {
        throw new InvalidCursorState(`${pane} pane cursor ${panel.cursor} on empty sequence`)
      }
      continue
    }
    if (panel.cursor === null || panel.cursor < 0 || panel.cursor >= length) {
      throw new InvalidCursorState(`${pane} pane cursor ${panel.cursor} outside 0..${length - 1}`)
    }
    if (panel.scroll < 0 || panel.scroll >= length) {
      throw new InvalidCursorState(`${pane} pane scroll ${panel.scroll} outside 0..${length - 1}`)
    }
  }
}

// ==================== Content Drafts ====================

interface ContentDraft {
  folders: Map<string, FolderEntity>
  folderOrder: string[]
  chats: Map<string, ChatState>
  messages: Map<string, ReadonlyMap<string, MessageEntity>>
}

function createDraft(state: ViewState): ContentDraft {
  return {
    folders: new Map(state.folders),
    folderOrder: [...state.folderOrder],
    chats: new Map(state.chats),
    messages: new Map(state.messages),
  }
}

function placeholderChat(chatId: string): ChatState {
  return {
    id: chatId,
    name: chatId,
    lastMessagePreview: '',
    unreadCount: 0,
    messageIds: [],
    hasMoreBefore: true,
    fetchPending: false,
  }
}

function ensureChat(draft: ContentDraft, chatId: string): ChatState {
  const existing = draft.chats.get(chatId)
  if (existing) return existing
  const chat = placeholderChat(chatId)
  draft.chats.set(chatId, chat)
  return chat
}

function draftUpsertFolder(draft: ContentDraft, folder: FolderEntity): void {
  for (const chatId of folder.chatIds) ensureChat(draft, chatId)
  if (!draft.folders.has(folder.id)) draft.folderOrder.push(folder.id)
  draft.folders.set(folder.id, { ...folder, chatIds: [...folder.chatIds] })
}

function draftUpsertChat(draft: ContentDraft, chat: ChatEntity): void {
  const existing = ensureChat(draft, chat.id)
  draft.chats.set(chat.id, {
    ...existing,
    id: chat.id,
    name: chat.name,
    lastMessagePreview: chat.lastMessagePreview,
    unreadCount: chat.unreadCount,
  })
}

function compareMessages(a: MessageEntity, b: MessageEntity): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function sameBody(a: MessageBody, b: MessageBody): boolean {
  return (
    a.text === b.text &&
    a.image?.id === b.image?.id &&
    a.image?.url === b.image?.url &&
    a.image?.mimeType === b.image?.mimeType
  )
}

function sameMessage(a: MessageEntity, b: MessageEntity): boolean {
  return (
    a.id === b.id &&
    a.chatId === b.chatId &&
    a.sender === b.sender &&
    a.timestamp === b.timestamp &&
    a.read === b.read &&
    a.deleted === b.deleted &&
    a.edited === b.edited &&
    sameBody(a.body, b.body)
  )
}

// Insert position by (timestamp, id), scanning from the end since new
// messages almost always arrive last
function insertionIndex(
  ids: readonly string[],
  byId: ReadonlyMap<string, MessageEntity>,
  message: MessageEntity
): number {
  let index = ids.length
  while (index > 0) {
    const previous = byId.get(ids[index - 1])
    if (!previous || compareMessages(previous, message) <= 0) break
    index--
  }
  return index
}

/**
 * Insert or replace one message. Returns false when nothing changed.
 */
function draftUpsertMessage(
  draft: ContentDraft,
  chatId: string,
  message: MessageEntity,
  options: { countUnread: boolean }
): boolean {
  const chat = ensureChat(draft, chatId)
  const current = draft.messages.get(chatId) ?? new Map<string, MessageEntity>()
  const existing = current.get(message.id)
  const stored: MessageEntity = { ...message, chatId }

  if (existing) {
    // Edit in place: position and creation fields are kept
    const replaced: MessageEntity = {
      ...existing,
      body: stored.body,
      read: existing.read || stored.read,
      deleted: existing.deleted || stored.deleted,
      edited: existing.edited || stored.edited || !sameBody(existing.body, stored.body),
    }
    if (sameMessage(existing, replaced)) return false
    const byId = new Map(current)
    byId.set(message.id, replaced)
    draft.messages.set(chatId, byId)
    const isNewest = chat.messageIds[chat.messageIds.length - 1] === message.id
    const unreadDelta = !existing.read && replaced.read ? -1 : 0
    if (isNewest || unreadDelta !== 0) {
      draft.chats.set(chatId, {
        ...chat,
        lastMessagePreview: isNewest && !replaced.deleted ? messagePreview(replaced.body) : chat.lastMessagePreview,
        unreadCount: Math.max(0, chat.unreadCount + unreadDelta),
      })
    }
    return true
  }

  const byId = new Map(current)
  byId.set(message.id, stored)
  const index = insertionIndex(chat.messageIds, byId, stored)
  const messageIds = [...chat.messageIds.slice(0, index), message.id, ...chat.messageIds.slice(index)]
  const isNewest = index === chat.messageIds.length
  draft.messages.set(chatId, byId)
  draft.chats.set(chatId, {
    ...chat,
    messageIds,
    lastMessagePreview: isNewest && !stored.deleted ? messagePreview(stored.body) : chat.lastMessagePreview,
    unreadCount:
      options.countUnread && !stored.read && !stored.deleted ? chat.unreadCount + 1 : chat.unreadCount,
  })
  return true
}

function draftMarkDeleted(draft: ContentDraft, chatId: string, messageId: string): boolean {
  const current = draft.messages.get(chatId)
  const existing = current?.get(messageId)
  if (!current || !existing || existing.deleted) return false
  const byId = new Map(current)
  byId.set(messageId, { ...existing, deleted: true })
  draft.messages.set(chatId, byId)
  if (!existing.read) {
    const chat = ensureChat(draft, chatId)
    draft.chats.set(chatId, { ...chat, unreadCount: Math.max(0, chat.unreadCount - 1) })
  }
  return true
}

// ==================== Panel Reconciliation ====================

/**
 * Re-derive both panes' cursor/scroll after content changed
 */
function withPreservedPanels(prev: ViewState, next: ViewState): ViewState {
  const leftPosition = preservePosition(
    leftSequenceFor(prev, prev.left.level),
    leftSequenceFor(next, next.left.level),
    prev.left
  )
  const rightPosition = preservePosition(
    rightSequenceFor(prev, prev.right.chatId),
    rightSequenceFor(next, next.right.chatId),
    prev.right
  )
  const left = leftPosition === prev.left ? prev.left : { ...prev.left, ...leftPosition }
  const right = rightPosition === prev.right ? prev.right : { ...prev.right, ...rightPosition }
  return { ...next, left, right }
}

function applyDraft(state: ViewState, draft: ContentDraft): ViewState {
  return withPreservedPanels(state, {
    ...state,
    folders: draft.folders,
    folderOrder: draft.folderOrder,
    chats: draft.chats,
    messages: draft.messages,
  })
}

function captureBackStackEntry(state: ViewState): BackStackEntry {
  return {
    left: state.left,
    right: state.right,
    focus: state.focus,
    anchors: {
      left: anchorOf(paneSequence(state, 'left'), state.left),
      right: anchorOf(paneSequence(state, 'right'), state.right),
    },
  }
}

function restoreBackStackEntry(state: ViewState, entry: BackStackEntry): Pick<ViewState, 'left' | 'right' | 'focus'> {
  const leftPosition = restorePosition(leftSequenceFor(state, entry.left.level), entry.left, entry.anchors.left)
  const rightPosition = restorePosition(
    rightSequenceFor(state, entry.right.chatId),
    entry.right,
    entry.anchors.right
  )
  return {
    left: { ...entry.left, ...leftPosition },
    right: { ...entry.right, ...rightPosition },
    focus: entry.focus,
  }
}

function isInsideFolder(level: LeftLevel, folderId: string): boolean {
  return level.kind === 'chats' && level.folderId === folderId
}

function removeFolder(state: ViewState, folderId: string): ViewState {
  const folder = state.folders.get(folderId)
  if (!folder) return state
  const draft = createDraft(state)
  draft.folders.delete(folderId)
  draft.folderOrder = draft.folderOrder.filter((id) => id !== folderId)
  const next = applyDraft(state, draft)

  if (!isInsideFolder(state.left.level, folderId)) {
    return {
      ...next,
      backStack: next.backStack.filter((entry) => !isInsideFolder(entry.left.level, folderId)),
    }
  }

  // The open folder vanished: return the left pane to the folder list
  const enteredAt = next.backStack.map((entry) => entry.left.level.kind).lastIndexOf('folders')
  const entry = enteredAt >= 0 ? next.backStack[enteredAt] : null
  const saved: PanelPosition = entry ? entry.left : { cursor: 0, scroll: 0 }
  const anchor: PanelAnchor = entry ? entry.anchors.left : { selectedId: null, topId: null }
  const position = restorePosition(next.folderOrder, saved, anchor)
  return {
    ...next,
    left: { level: { kind: 'folders' }, ...position },
    backStack: enteredAt >= 0 ? next.backStack.slice(0, enteredAt) : [],
    status: `Folder "${folder.name}" was removed`,
  }
}

/**
 * Physically remove tombstoned messages that are neither selected nor inside
 * the visible window of the messages pane
 */
function compact(state: ViewState): ViewState {
  let draft: ContentDraft | null = null
  const openChatId = state.right.chatId
  const capacity = paneCapacity(state, 'right')

  for (const [chatId, chat] of state.chats) {
    const byId = state.messages.get(chatId)
    if (!byId) continue
    const keep = (id: string, index: number): boolean => {
      if (!byId.get(id)?.deleted) return true
      if (chatId !== openChatId) return false
      if (index === state.right.cursor) return true
      return index >= state.right.scroll && index < state.right.scroll + capacity
    }
    const messageIds = chat.messageIds.filter(keep)
    if (messageIds.length === chat.messageIds.length) continue

    draft ??= createDraft(state)
    const kept = new Set(messageIds)
    const remaining = new Map(byId)
    for (const id of chat.messageIds) {
      if (!kept.has(id)) remaining.delete(id)
    }
    draft.messages.set(chatId, remaining)
    draft.chats.set(chatId, { ...chat, messageIds })
  }

  return draft ? applyDraft(state, draft) : state
}

function tick(state: ViewState, now: number): ViewState {
  let typing: Map<string, TypingIndicator> | null = null
  for (const [chatId, indicator] of state.typing) {
    if (indicator.until <= now) {
      typing ??= new Map(state.typing)
      typing.delete(chatId)
    }
  }
  return { ...state, now, typing: typing ?? state.typing }
}

// ==================== Reducer ====================

export function viewReducer(state: ViewState, action: ViewAction): ViewState {
  switch (action.type) {
    case 'LOAD_SNAPSHOT': {
      const draft = createDraft(state)
      for (const folder of action.snapshot.folders) draftUpsertFolder(draft, folder)
      for (const chat of action.snapshot.chats) draftUpsertChat(draft, chat)
      for (const message of action.snapshot.messages) {
        draftUpsertMessage(draft, message.chatId, message, { countUnread: false })
      }
      for (const chatId of action.snapshot.exhaustedChatIds ?? []) {
        const chat = ensureChat(draft, chatId)
        draft.chats.set(chatId, { ...chat, hasMoreBefore: false })
      }
      return applyDraft(state, draft)
    }
    case 'UPSERT_FOLDER': {
      const draft = createDraft(state)
      draftUpsertFolder(draft, action.folder)
      return applyDraft(state, draft)
    }
    case 'REMOVE_FOLDER':
      return removeFolder(state, action.folderId)
    case 'UPSERT_CHAT': {
      const draft = createDraft(state)
      draftUpsertChat(draft, action.chat)
      return applyDraft(state, draft)
    }
    case 'UPSERT_MESSAGE': {
      const draft = createDraft(state)
      const changed = draftUpsertMessage(draft, action.chatId, action.message, { countUnread: true })
      if (!changed && state.chats.has(action.chatId)) return state
      return applyDraft(state, draft)
    }
    case 'MARK_DELETED': {
      const draft = createDraft(state)
      if (!draftMarkDeleted(draft, action.chatId, action.messageId)) return state
      return applyDraft(state, draft)
    }
    case 'APPLY_HISTORY': {
      const draft = createDraft(state)
      for (const message of action.messages) {
        draftUpsertMessage(draft, action.chatId, message, { countUnread: false })
      }
      const chat = ensureChat(draft, action.chatId)
      draft.chats.set(action.chatId, { ...chat, hasMoreBefore: action.hasMoreBefore, fetchPending: false })
      return applyDraft(state, draft)
    }
    case 'SET_TYPING': {
      const typing = new Map(state.typing)
      typing.set(action.chatId, { sender: action.sender, until: action.until })
      return { ...state, typing }
    }
    case 'TICK':
      return tick(state, action.now)
    case 'MARK_READ_LOCAL': {
      const current = state.messages.get(action.chatId)
      const chat = state.chats.get(action.chatId)
      if (!current || !chat) return state
      const byId = new Map(current)
      let marked = 0
      for (const id of action.messageIds) {
        const message = byId.get(id)
        if (message && !message.read) {
          byId.set(id, { ...message, read: true })
          marked++
        }
      }
      if (marked === 0) return state
      const messages = new Map(state.messages)
      messages.set(action.chatId, byId)
      const chats = new Map(state.chats)
      chats.set(action.chatId, { ...chat, unreadCount: Math.max(0, chat.unreadCount - marked) })
      return { ...state, messages, chats }
    }
    case 'SET_FETCH_PENDING': {
      const chat = state.chats.get(action.chatId)
      if (!chat || chat.fetchPending === action.pending) return state
      const chats = new Map(state.chats)
      chats.set(action.chatId, { ...chat, fetchPending: action.pending })
      return { ...state, chats }
    }
    case 'COMPACT':
      return compact(state)
    case 'SET_FOCUS':
      return state.focus === action.pane ? state : { ...state, focus: action.pane }
    case 'MOVE_CURSOR': {
      const panel = action.pane === 'left' ? state.left : state.right
      const length = paneSequence(state, action.pane).length
      const position = moveWithin(panel, length, action.delta, paneCapacity(state, action.pane))
      if (position === panel) return state
      return action.pane === 'left'
        ? { ...state, left: { ...state.left, ...position } }
        : { ...state, right: { ...state.right, ...position } }
    }
    case 'OPEN_SELECTED': {
      if (state.focus !== 'left') return state
      const id = selectedId(state, 'left')
      if (id === null) return state
      const entry = captureBackStackEntry(state)
      const backStack = [...state.backStack, entry]
      if (state.left.level.kind === 'folders') {
        const level: LeftLevel = { kind: 'chats', folderId: id }
        const position = clampPosition({ cursor: 0, scroll: 0 }, leftSequenceFor(state, level).length)
        return { ...state, left: { level, ...position }, backStack }
      }
      const position = clampPosition({ cursor: 0, scroll: 0 }, rightSequenceFor(state, id).length)
      return { ...state, right: { chatId: id, ...position }, focus: 'right', backStack }
    }
    case 'GO_BACK': {
      const entry = state.backStack[state.backStack.length - 1]
      if (!entry) return state
      return {
        ...state,
        ...restoreBackStackEntry(state, entry),
        backStack: state.backStack.slice(0, -1),
      }
    }
    case 'SET_SCREEN': {
      if (state.screen.rows === action.rows && state.screen.cols === action.cols) return state
      return { ...state, screen: { rows: action.rows, cols: action.cols } }
    }
    case 'SET_STATUS':
      return state.status === action.text ? state : { ...state, status: action.text }
    default:
      return state
  }
}

// ==================== Store ====================

type Listener = (state: ViewState, action: ViewAction) => void

/**
 * Single-owner container around the reducer. Only the central loop calls the
 * mutation methods; everything else reads `getState()`.
 */
export class ViewStateStore {
  private state: ViewState
  private _version = 0
  private dirty = true
  private readonly listeners = new Set<Listener>()
  private readonly checkInvariants: boolean

  constructor(initial: ViewState = createInitialState(), options: { checkInvariants?: boolean } = {}) {
    this.state = initial
    this.checkInvariants = options.checkInvariants ?? true
  }

  get version(): number {
    return this._version
  }

  getState(): ViewState {
    return this.state
  }

  isDirty(): boolean {
    return this.dirty
  }

  clearDirty(): void {
    this.dirty = false
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Apply an action. Returns true when the state changed.
   */
  dispatch(action: ViewAction): boolean {
    const next = viewReducer(this.state, action)
    if (next === this.state) return false
    if (this.checkInvariants) assertPanelInvariant(next)
    this.state = next
    this._version++
    this.dirty = true
    this.listeners.forEach((listener) => listener(next, action))
    return true
  }

  upsertFolder(folder: FolderEntity): boolean {
    return this.dispatch({ type: 'UPSERT_FOLDER', folder })
  }

  upsertChat(chat: ChatEntity): boolean {
    return this.dispatch({ type: 'UPSERT_CHAT', chat })
  }

  upsertMessage(chatId: string, message: MessageEntity): boolean {
    return this.dispatch({ type: 'UPSERT_MESSAGE', chatId, message })
  }

  markDeleted(chatId: string, messageId: string): boolean {
    return this.dispatch({ type: 'MARK_DELETED', chatId, messageId })
  }

  setFocus(pane: PaneId): boolean {
    return this.dispatch({ type: 'SET_FOCUS', pane })
  }

  moveCursor(pane: PaneId, delta: number): boolean {
    return this.dispatch({ type: 'MOVE_CURSOR', pane, delta })
  }

  openSelected(): boolean {
    return this.dispatch({ type: 'OPEN_SELECTED' })
  }

  goBack(): boolean {
    return this.dispatch({ type: 'GO_BACK' })
  }

  removeFolder(folderId: string): boolean {
    return this.dispatch({ type: 'REMOVE_FOLDER', folderId })
  }

  applyHistory(chatId: string, messages: MessageEntity[], hasMoreBefore: boolean): boolean {
    return this.dispatch({ type: 'APPLY_HISTORY', chatId, messages, hasMoreBefore })
  }

  setTyping(chatId: string, sender: string, until: number): boolean {
    return this.dispatch({ type: 'SET_TYPING', chatId, sender, until })
  }

  tick(now: number): boolean {
    return this.dispatch({ type: 'TICK', now })
  }

  markReadLocal(chatId: string, messageIds: readonly string[]): boolean {
    return this.dispatch({ type: 'MARK_READ_LOCAL', chatId, messageIds })
  }

  setFetchPending(chatId: string, pending: boolean): boolean {
    return this.dispatch({ type: 'SET_FETCH_PENDING', chatId, pending })
  }

  setViewport(rows: number, cols: number): boolean {
    return this.dispatch({ type: 'SET_SCREEN', rows, cols })
  }

  setStatus(text: string | null): boolean {
    return this.dispatch({ type: 'SET_STATUS', text })
  }

  compact(): boolean {
    return this.dispatch({ type: 'COMPACT' })
  }
}
