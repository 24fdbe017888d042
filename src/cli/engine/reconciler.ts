/**
 * Reconciler
 * Merges RemoteUpdates into the store. Position preservation itself lives in
 * the reducer, so every update kind gets it for free; this layer maps update
 * kinds onto actions and records implicit upserts.
 */

import type { RemoteUpdate } from '@/platforms/types'
import type { Logger } from '@/helpers/logger'
import type { ViewStateStore } from './view-store'

function chatIdOf(update: RemoteUpdate): string | null {
  switch (update.kind) {
    case 'MessageUpsert':
      return update.message.chatId
    case 'MessageDeleted':
    case 'HistoryBatch':
    case 'Typing':
      return update.chatId
    default:
      return null
  }
}

function applyKnown(store: ViewStateStore, update: RemoteUpdate, logger: Logger): boolean {
  switch (update.kind) {
    case 'InitialSnapshot':
      return store.dispatch({ type: 'LOAD_SNAPSHOT', snapshot: update.snapshot })
    case 'FolderChanged':
      return store.upsertFolder(update.folder)
    case 'FolderRemoved':
      if (!store.getState().folders.has(update.folderId)) {
        logger.debug(`UnknownUpdateEntity: FolderRemoved for unknown folder ${update.folderId}`)
        return false
      }
      return store.removeFolder(update.folderId)
    case 'ChatChanged':
      return store.upsertChat(update.chat)
    case 'MessageUpsert':
      return store.upsertMessage(update.message.chatId, update.message)
    case 'MessageDeleted':
      if (!store.getState().messages.get(update.chatId)?.has(update.messageId)) {
        logger.debug(`UnknownUpdateEntity: MessageDeleted for unknown message ${update.messageId}`)
      }
      return store.markDeleted(update.chatId, update.messageId)
    case 'HistoryBatch':
      return store.applyHistory(update.chatId, update.messages, update.hasMoreBefore)
    case 'Typing':
      return store.setTyping(update.chatId, update.sender, update.until)
  }
}

/**
 * Apply one update. Returns true when the store changed.
 * An update naming a chat the store has not seen first creates a placeholder
 * chat for it.
 */
export function applyRemoteUpdate(store: ViewStateStore, update: RemoteUpdate, logger: Logger): boolean {
  const chatId = chatIdOf(update)
  let created = false
  if (chatId !== null && !store.getState().chats.has(chatId)) {
    logger.debug(`UnknownUpdateEntity: ${update.kind} for unknown chat ${chatId}`)
    created = store.upsertChat({ id: chatId, name: chatId, lastMessagePreview: '', unreadCount: 0 })
  }
  const changed = applyKnown(store, update, logger)
  return created || changed
}
