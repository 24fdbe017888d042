/**
 * Input Dispatcher
 * Maps a decoded key plus current state onto store actions and side requests
 */

import type { KeyName } from './event-queue'
import { type ViewStateStore, paneSequence } from './view-store'

// Rows from the top of the messages pane at which older history is requested
export const FETCH_MORE_THRESHOLD = 3

export interface FetchMoreRequest {
  chatId: string
  beforeMessageId: string
}

export interface DispatchResult {
  changed: boolean
  quit?: boolean
  fetchMore?: FetchMoreRequest
}

const NOTHING: DispatchResult = { changed: false }

/**
 * FetchMore is due when the messages-pane cursor sits near the top of the
 * loaded history, older history exists and no fetch is outstanding
 */
export function fetchMoreRequest(store: ViewStateStore): FetchMoreRequest | undefined {
  const state = store.getState()
  const { chatId, cursor } = state.right
  if (chatId === null || cursor === null || cursor >= FETCH_MORE_THRESHOLD) return undefined
  const chat = state.chats.get(chatId)
  if (!chat || !chat.hasMoreBefore || chat.fetchPending) return undefined
  const oldest = chat.messageIds[0]
  if (oldest === undefined) return undefined
  return { chatId, beforeMessageId: oldest }
}

function withFetchMore(store: ViewStateStore, changed: boolean): DispatchResult {
  const fetchMore = fetchMoreRequest(store)
  if (!fetchMore) return { changed }
  store.setFetchPending(fetchMore.chatId, true)
  return { changed: true, fetchMore }
}

export function dispatchKey(store: ViewStateStore, key: KeyName): DispatchResult {
  const state = store.getState()
  switch (key) {
    case 'quit':
      return { changed: false, quit: true }
    case 'tab':
      return { changed: store.setFocus(state.focus === 'left' ? 'right' : 'left') }
    case 'up':
    case 'down': {
      const pane = state.focus
      // EmptyPaneNavigation: nothing to move on
      if (paneSequence(state, pane).length === 0) return NOTHING
      const changed = store.moveCursor(pane, key === 'up' ? -1 : 1)
      // Up at the top boundary still asks for older history
      if (pane !== 'right' || key !== 'up') return { changed }
      return withFetchMore(store, changed)
    }
    case 'enter': {
      const openingChat = state.focus === 'left' && state.left.level.kind === 'chats'
      const changed = store.openSelected()
      return openingChat && changed ? withFetchMore(store, changed) : { changed }
    }
    case 'escape':
      return { changed: store.goBack() }
    case 'other':
      return NOTHING
  }
}
