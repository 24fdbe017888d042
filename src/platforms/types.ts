/**
 * Platform abstraction types for the session layer
 * Every messaging backend is reduced to folders, chats and messages plus a
 * stream of remote updates, so the view engine never sees platform objects
 */

// ==================== Platform Types ====================

export type PlatformType = 'discord' | 'memory'

// ==================== Entities ====================

/**
 * Reference to an image payload. Opaque to the view engine; the session
 * adapter resolves it to bytes on demand.
 */
export interface ImageRef {
  id: string
  url?: string
  mimeType?: string
  width?: number
  height?: number
}

export interface MessageBody {
  text?: string
  image?: ImageRef
}

/**
 * Folder of chats. `chatIds` order is the display order.
 */
export interface FolderEntity {
  id: string
  name: string
  chatIds: readonly string[]
  unreadCount: number
}

/**
 * Chat metadata. Message ids live in the view store, in chronological order.
 */
export interface ChatEntity {
  id: string
  name: string
  lastMessagePreview: string
  unreadCount: number
}

export interface MessageEntity {
  id: string
  chatId: string
  sender: string
  timestamp: number // epoch ms
  body: MessageBody
  read: boolean
  deleted: boolean
  edited: boolean
}

// ==================== Remote Updates ====================

export interface InitialSnapshot {
  folders: FolderEntity[]
  chats: ChatEntity[]
  messages: MessageEntity[]
  /** Chats whose history is known to be complete */
  exhaustedChatIds?: string[]
}

export type RemoteUpdate =
  | { kind: 'InitialSnapshot'; snapshot: InitialSnapshot }
  | { kind: 'FolderChanged'; folder: FolderEntity }
  | { kind: 'FolderRemoved'; folderId: string }
  | { kind: 'ChatChanged'; chat: ChatEntity }
  | { kind: 'MessageUpsert'; message: MessageEntity }
  | { kind: 'MessageDeleted'; chatId: string; messageId: string }
  | { kind: 'HistoryBatch'; chatId: string; messages: MessageEntity[]; hasMoreBefore: boolean }
  | { kind: 'Typing'; chatId: string; sender: string; until: number }

export type RemoteUpdateKind = RemoteUpdate['kind']

// ==================== Session Adapter Interface ====================

/**
 * Connection to a messaging account.
 * Implementations only produce updates; they never touch view state.
 */
export interface SessionAdapter {
  readonly type: PlatformType
  readonly isConnected: boolean

  /**
   * Connect and deliver the initial snapshot (folders, chats, most recent messages)
   */
  connect(): Promise<InitialSnapshot>

  disconnect(): Promise<void>

  /**
   * Listen for steady-state updates. Updates for the same remote id are
   * delivered in the order the service emitted them.
   */
  onUpdate(callback: (update: RemoteUpdate) => void): void

  /**
   * Listen for unrecoverable failures (lost session, revoked token)
   */
  onFailure(callback: (error: Error) => void): void

  /**
   * Request messages older than `beforeMessageId`. The answer arrives as a
   * `HistoryBatch` update.
   */
  fetchMore(chatId: string, beforeMessageId: string): Promise<void>

  /**
   * Tell the service everything up to `messageId` has been seen
   */
  markRead(chatId: string, messageId: string): Promise<void>

  loadImage(ref: ImageRef): Promise<Uint8Array>
}
