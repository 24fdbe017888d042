import { describe, expect, it } from 'vitest'
import { openChat, sampleSnapshot, sampleStore } from '@/testing/builders'
import { dispatchKey, fetchMoreRequest } from './input-dispatcher'

function storeWithHistoryBehind() {
  return sampleStore({ ...sampleSnapshot(), exhaustedChatIds: ['c1', 'c2', 'c4'] })
}

describe('dispatchKey', () => {
  it('asks to quit without changing state', () => {
    const store = sampleStore()
    expect(dispatchKey(store, 'quit')).toEqual({ changed: false, quit: true })
  })

  it('toggles focus with tab', () => {
    const store = sampleStore()
    expect(dispatchKey(store, 'tab')).toEqual({ changed: true })
    expect(store.getState().focus).toBe('right')
    dispatchKey(store, 'tab')
    expect(store.getState().focus).toBe('left')
  })

  it('does nothing when moving in an empty pane', () => {
    const store = sampleStore()
    dispatchKey(store, 'tab')
    const version = store.version
    expect(dispatchKey(store, 'down')).toEqual({ changed: false })
    expect(store.version).toBe(version)
  })

  it('moves the cursor without wrapping', () => {
    const store = sampleStore()
    expect(dispatchKey(store, 'up')).toEqual({ changed: false })
    expect(dispatchKey(store, 'down')).toEqual({ changed: true })
    expect(dispatchKey(store, 'down')).toEqual({ changed: false })
    expect(store.getState().left.cursor).toBe(1)
  })

  it('opens folders and chats with enter and walks back with escape', () => {
    const store = sampleStore()
    expect(dispatchKey(store, 'enter')).toEqual({ changed: true })
    dispatchKey(store, 'down')
    dispatchKey(store, 'down')
    expect(dispatchKey(store, 'enter')).toEqual({ changed: true })
    expect(store.getState().right.chatId).toBe('c3')
    expect(dispatchKey(store, 'escape')).toEqual({ changed: true })
    expect(store.getState().right.chatId).toBeNull()
  })

  it('ignores keys without a binding', () => {
    expect(dispatchKey(sampleStore(), 'other')).toEqual({ changed: false })
  })

  it('requests older history when a chat with more history is opened', () => {
    const store = storeWithHistoryBehind()
    dispatchKey(store, 'enter')
    dispatchKey(store, 'down')
    dispatchKey(store, 'down')
    const result = dispatchKey(store, 'enter')
    expect(result).toEqual({ changed: true, fetchMore: { chatId: 'c3', beforeMessageId: 'm1' } })
    expect(store.getState().chats.get('c3')?.fetchPending).toBe(true)
  })

  it('does not request again while a fetch is outstanding', () => {
    const store = storeWithHistoryBehind()
    openChat(store)
    store.setFetchPending('c3', true)
    expect(dispatchKey(store, 'up')).toEqual({ changed: false })
  })

  it('requests on up at the top boundary once the previous fetch finished', () => {
    const store = storeWithHistoryBehind()
    openChat(store)
    expect(dispatchKey(store, 'up')).toEqual({ changed: true, fetchMore: { chatId: 'c3', beforeMessageId: 'm1' } })
  })

  it('never requests for a chat whose history is exhausted', () => {
    const store = sampleStore()
    openChat(store)
    expect(dispatchKey(store, 'up')).toEqual({ changed: false })
    expect(fetchMoreRequest(store)).toBeUndefined()
  })

  it('does not request when moving down', () => {
    const store = storeWithHistoryBehind()
    openChat(store)
    expect(dispatchKey(store, 'down')).toEqual({ changed: true })
  })
})
