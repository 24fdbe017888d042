/**
 * In-process session adapter
 * Serves a fixture as if it were a live account: initial snapshot, paged
 * history, scripted live events and image files next to the fixture
 */

import fs from 'fs/promises'
import path from 'path'
import { messagePreview } from '@/cli/shared'
import type {
  ChatEntity,
  FolderEntity,
  ImageRef,
  InitialSnapshot,
  MessageEntity,
  RemoteUpdate,
  SessionAdapter,
} from '../types'
import { type FixtureMessage, type ScriptedEvent, type SessionFixture, parseSessionFixture } from './schema'

export const ALL_CHATS_FOLDER_ID = 'all-chats'

export interface MemorySessionOptions {
  /** Messages per chat in the snapshot and per history page */
  maxMessages?: number
  /** Directory image paths resolve against */
  baseDir?: string
  clock?: () => number
}

export interface FetchMoreCall {
  chatId: string
  beforeMessageId: string
}

export interface MarkReadCall {
  chatId: string
  messageId: string
}

function toMessageEntity(message: FixtureMessage): MessageEntity {
  return {
    id: message.id,
    chatId: message.chatId,
    sender: message.sender,
    timestamp: message.timestamp,
    body: { text: message.text, image: message.image },
    read: message.read,
    deleted: false,
    edited: message.edited,
  }
}

function compareMessages(a: MessageEntity, b: MessageEntity): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

export class MemorySessionAdapter implements SessionAdapter {
  readonly type = 'memory'
  readonly fetchMoreCalls: FetchMoreCall[] = []
  readonly markReadCalls: MarkReadCall[] = []

  private connected = false
  private readonly fixture: SessionFixture
  private readonly maxMessages: number
  private readonly baseDir: string
  private readonly clock: () => number
  // Chronological, per chat
  private readonly history = new Map<string, MessageEntity[]>()
  private readonly updateCallbacks: Array<(update: RemoteUpdate) => void> = []
  private readonly failureCallbacks: Array<(error: Error) => void> = []
  private readonly timers = new Set<ReturnType<typeof setTimeout>>()

  constructor(fixture: SessionFixture, options: MemorySessionOptions = {}) {
    this.fixture = fixture
    this.maxMessages = Math.max(1, options.maxMessages ?? 50)
    this.baseDir = options.baseDir ?? process.cwd()
    this.clock = options.clock ?? Date.now

    for (const chat of fixture.chats) this.history.set(chat.id, [])
    for (const message of fixture.messages) this.history.get(message.chatId)?.push(toMessageEntity(message))
    for (const messages of this.history.values()) messages.sort(compareMessages)
  }

  /**
   * Load and validate a fixture file. Image paths resolve next to it.
   */
  static async fromFile(file: string, options: MemorySessionOptions = {}): Promise<MemorySessionAdapter> {
    const raw = await fs.readFile(file, 'utf8')
    const fixture = parseSessionFixture(JSON.parse(raw))
    return new MemorySessionAdapter(fixture, { baseDir: path.dirname(file), ...options })
  }

  get isConnected(): boolean {
    return this.connected
  }

  async connect(): Promise<InitialSnapshot> {
    this.connected = true
    this.scheduleScript(this.fixture.scripted)
    return this.buildSnapshot()
  }

  async disconnect(): Promise<void> {
    this.connected = false
    for (const timer of this.timers) clearTimeout(timer)
    this.timers.clear()
  }

  onUpdate(callback: (update: RemoteUpdate) => void): void {
    this.updateCallbacks.push(callback)
  }

  onFailure(callback: (error: Error) => void): void {
    this.failureCallbacks.push(callback)
  }

  /**
   * Deliver an update to listeners as if the service had sent it
   */
  emit(update: RemoteUpdate): void {
    if (update.kind === 'MessageUpsert') this.record(update.message)
    if (update.kind === 'MessageDeleted') {
      const messages = this.history.get(update.chatId) ?? []
      const index = messages.findIndex((message) => message.id === update.messageId)
      if (index >= 0) messages[index] = { ...messages[index], deleted: true }
    }
    this.updateCallbacks.forEach((callback) => callback(update))
  }

  fail(error: Error): void {
    this.connected = false
    this.failureCallbacks.forEach((callback) => callback(error))
  }

  async fetchMore(chatId: string, beforeMessageId: string): Promise<void> {
    this.fetchMoreCalls.push({ chatId, beforeMessageId })
    const messages = this.history.get(chatId) ?? []
    const end = messages.findIndex((message) => message.id === beforeMessageId)
    const older = end < 0 ? [] : messages.slice(Math.max(0, end - this.maxMessages), end)
    const hasMoreBefore = end - older.length > 0
    // Answer on a later turn, like a network round trip
    await Promise.resolve()
    this.emit({ kind: 'HistoryBatch', chatId, messages: older, hasMoreBefore })
  }

  async markRead(chatId: string, messageId: string): Promise<void> {
    this.markReadCalls.push({ chatId, messageId })
    const messages = this.history.get(chatId) ?? []
    const upTo = messages.findIndex((message) => message.id === messageId)
    for (let i = 0; i <= upTo; i++) messages[i] = { ...messages[i], read: true }
  }

  async loadImage(ref: ImageRef): Promise<Uint8Array> {
    if (!ref.url) throw new Error(`Image ${ref.id} has no source`)
    const bytes = await fs.readFile(path.resolve(this.baseDir, ref.url))
    return new Uint8Array(bytes)
  }

  // ==================== Internals ====================

  private record(message: MessageEntity): void {
    const messages = this.history.get(message.chatId)
    if (!messages) {
      this.history.set(message.chatId, [message])
      return
    }
    const index = messages.findIndex((existing) => existing.id === message.id)
    if (index >= 0) {
      messages[index] = message
      return
    }
    messages.push(message)
    messages.sort(compareMessages)
  }

  private unreadCount(chatId: string): number {
    return (this.history.get(chatId) ?? []).filter((message) => !message.read && !message.deleted).length
  }

  private buildSnapshot(): InitialSnapshot {
    const chats: ChatEntity[] = this.fixture.chats.map((chat) => {
      const messages = this.history.get(chat.id) ?? []
      const newest = messages[messages.length - 1]
      return {
        id: chat.id,
        name: chat.name,
        lastMessagePreview: newest ? messagePreview(newest.body) : '',
        unreadCount: this.unreadCount(chat.id),
      }
    })

    const folderUnread = (chatIds: readonly string[]): number =>
      chatIds.reduce((total, chatId) => total + this.unreadCount(chatId), 0)

    const folders: FolderEntity[] = this.fixture.folders.map((folder) => ({
      id: folder.id,
      name: folder.name,
      chatIds: folder.chatIds,
      unreadCount: folderUnread(folder.chatIds),
    }))

    if (this.fixture.allChatsFolder) {
      // Most recently active first
      const newestAt = (chatId: string): number => this.history.get(chatId)?.at(-1)?.timestamp ?? 0
      const chatIds = chats.map((chat) => chat.id).sort((a, b) => newestAt(b) - newestAt(a))
      folders.unshift({ id: ALL_CHATS_FOLDER_ID, name: 'All Chats', chatIds, unreadCount: folderUnread(chatIds) })
    }

    const messages: MessageEntity[] = []
    const exhaustedChatIds: string[] = []
    for (const [chatId, history] of this.history) {
      messages.push(...history.slice(-this.maxMessages))
      if (history.length <= this.maxMessages) exhaustedChatIds.push(chatId)
    }

    return { folders, chats, messages, exhaustedChatIds }
  }

  private scheduleScript(events: readonly ScriptedEvent[]): void {
    for (const event of events) {
      const timer = setTimeout(() => {
        this.timers.delete(timer)
        if (this.connected) this.emit(this.scriptedUpdate(event))
      }, event.afterMs)
      this.timers.add(timer)
    }
  }

  private scriptedUpdate(event: ScriptedEvent): RemoteUpdate {
    switch (event.kind) {
      case 'message':
        return { kind: 'MessageUpsert', message: toMessageEntity(event.message) }
      case 'typing':
        return { kind: 'Typing', chatId: event.chatId, sender: event.sender, until: this.clock() + event.durationMs }
      case 'delete':
        return { kind: 'MessageDeleted', chatId: event.chatId, messageId: event.messageId }
    }
  }
}
