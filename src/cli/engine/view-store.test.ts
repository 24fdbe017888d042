import { describe, expect, it } from 'vitest'
import { BASE_TIME, folder, message, openChat, sampleSnapshot, sampleStore } from '@/testing/builders'
import { InvalidCursorState } from './errors'
import { buildRenderSnapshot } from './render-snapshot'
import {
  type ViewState,
  ViewStateStore,
  assertPanelInvariant,
  createInitialState,
  paneCapacity,
  selectedId,
} from './view-store'

describe('ViewStateStore', () => {
  it('loads a snapshot with the cursor on the first folder', () => {
    const store = sampleStore()
    const state = store.getState()
    expect(state.folderOrder).toEqual(['F1', 'F2'])
    expect(state.left).toEqual({ level: { kind: 'folders' }, cursor: 0, scroll: 0 })
    expect(state.right).toEqual({ chatId: null, cursor: null, scroll: 0 })
    expect(state.focus).toBe('left')
    expect(state.chats.get('c3')?.messageIds).toEqual(['m1', 'm2', 'm3'])
  })

  it('counts versions only for effective mutations', () => {
    const store = sampleStore()
    const version = store.version
    expect(store.setFocus('left')).toBe(false)
    expect(store.version).toBe(version)
    expect(store.setFocus('right')).toBe(true)
    expect(store.version).toBe(version + 1)
    expect(store.isDirty()).toBe(true)
    store.clearDirty()
    expect(store.isDirty()).toBe(false)
  })

  it('notifies subscribers after each mutation', () => {
    const store = sampleStore()
    const seen: string[] = []
    const unsubscribe = store.subscribe((_state, action) => seen.push(action.type))
    store.setFocus('right')
    unsubscribe()
    store.setFocus('left')
    expect(seen).toEqual(['SET_FOCUS'])
  })

  describe('navigation', () => {
    it('restores every pane exactly when walking back up the stack', () => {
      const store = sampleStore()
      store.openSelected()
      store.moveCursor('left', 1)
      store.moveCursor('left', 1)
      expect(store.getState().left.cursor).toBe(2)

      store.openSelected()
      expect(store.getState().right).toEqual({ chatId: 'c3', cursor: 0, scroll: 0 })
      expect(store.getState().focus).toBe('right')

      store.goBack()
      let state = store.getState()
      expect(state.left).toEqual({ level: { kind: 'chats', folderId: 'F1' }, cursor: 2, scroll: 0 })
      expect(state.right).toEqual({ chatId: null, cursor: null, scroll: 0 })
      expect(state.focus).toBe('left')

      store.goBack()
      state = store.getState()
      expect(state.left).toEqual({ level: { kind: 'folders' }, cursor: 0, scroll: 0 })
      expect(state.backStack).toHaveLength(0)
      expect(store.goBack()).toBe(false)
    })

    it('re-derives a restored cursor from the saved id when the list changed meanwhile', () => {
      const store = sampleStore()
      store.openSelected()
      store.moveCursor('left', 2)
      store.openSelected()
      store.upsertFolder(folder('F1', ['c0', 'c1', 'c2', 'c3'], { name: 'Work' }))
      store.goBack()
      const state = store.getState()
      expect(state.left.cursor).toBe(3)
      expect(selectedId(state, 'left')).toBe('c3')
    })

    it('opens a chat with no messages with a null cursor', () => {
      const store = sampleStore()
      openChat(store, 0)
      expect(store.getState().right).toEqual({ chatId: 'c1', cursor: null, scroll: 0 })
    })

    it('ignores enter on the messages pane', () => {
      const store = sampleStore()
      openChat(store)
      expect(store.openSelected()).toBe(false)
    })
  })

  describe('position preservation', () => {
    it('keeps the selected chat selected when a chat is inserted above it', () => {
      const store = sampleStore()
      store.openSelected()
      store.moveCursor('left', 1)
      store.upsertFolder(folder('F1', ['c0', 'c1', 'c2', 'c3'], { name: 'Work' }))
      const state = store.getState()
      expect(state.left.cursor).toBe(2)
      expect(selectedId(state, 'left')).toBe('c2')
      expect(state.chats.has('c0')).toBe(true)
    })

    it('moves to the next chat below a removed selection', () => {
      const store = sampleStore()
      store.openSelected()
      store.moveCursor('left', 1)
      store.upsertFolder(folder('F1', ['c1', 'c3'], { name: 'Work' }))
      expect(store.getState().left.cursor).toBe(1)
      expect(selectedId(store.getState(), 'left')).toBe('c3')
    })

    it('clears the cursor when the only chat is removed', () => {
      const store = sampleStore()
      store.moveCursor('left', 1)
      store.openSelected()
      store.upsertFolder(folder('F2', [], { name: 'Home' }))
      expect(store.getState().left.cursor).toBeNull()
    })

    it('keeps the selected message when an older one is inserted', () => {
      const store = sampleStore()
      openChat(store)
      store.moveCursor('right', 1)
      store.upsertMessage('c3', message('m1b', 'c3', 1.5))
      const state = store.getState()
      expect(state.chats.get('c3')?.messageIds).toEqual(['m1', 'm1b', 'm2', 'm3'])
      expect(state.right.cursor).toBe(2)
      expect(selectedId(state, 'right')).toBe('m2')
    })

    it('leaves the open panes alone when a chat that is not shown changes', () => {
      const store = sampleStore()
      openChat(store)
      store.moveCursor('right', 2)
      const before = store.getState()
      store.upsertMessage('c4', message('n1', 'c4', 10, { read: false }))
      const after = store.getState()
      expect(after.left).toBe(before.left)
      expect(after.right).toBe(before.right)
      expect(after.chats.get('c4')?.unreadCount).toBe(1)
    })
  })

  describe('messages', () => {
    it('applies an edit without moving cursor, scroll or order', () => {
      const store = sampleStore()
      openChat(store)
      store.moveCursor('right', 1)
      const changed = store.upsertMessage('c3', message('m2', 'c3', 2, { body: { text: 'edited text' } }))
      expect(changed).toBe(true)
      const state = store.getState()
      const edited = state.messages.get('c3')?.get('m2')
      expect(edited?.body.text).toBe('edited text')
      expect(edited?.edited).toBe(true)
      expect(state.right).toEqual({ chatId: 'c3', cursor: 1, scroll: 0 })
      expect(state.chats.get('c3')?.messageIds).toEqual(['m1', 'm2', 'm3'])
    })

    it('treats a repeated upsert as a no-op', () => {
      const store = sampleStore()
      const update = message('m4', 'c3', 4, { read: false })
      expect(store.upsertMessage('c3', update)).toBe(true)
      const state = store.getState()
      const version = store.version
      expect(store.upsertMessage('c3', { ...update })).toBe(false)
      expect(store.getState()).toBe(state)
      expect(store.version).toBe(version)
      expect(state.chats.get('c3')?.unreadCount).toBe(1)
    })

    it('updates preview and unread count for a new newest message', () => {
      const store = sampleStore()
      store.upsertMessage('c1', message('n1', 'c1', 10, { read: false, body: { text: 'hello\nworld' } }))
      const chat = store.getState().chats.get('c1')
      expect(chat?.unreadCount).toBe(1)
      expect(chat?.lastMessagePreview).toBe('hello')
    })

    it('creates a placeholder chat for a message in an unknown chat', () => {
      const store = sampleStore()
      store.upsertMessage('zz', message('z1', 'zz', 5, { read: false }))
      const chat = store.getState().chats.get('zz')
      expect(chat?.name).toBe('zz')
      expect(chat?.messageIds).toEqual(['z1'])
      expect(chat?.unreadCount).toBe(1)
      expect(chat?.lastMessagePreview).toBe('text of z1')
    })

    it('keeps a tombstone addressable until compaction finds it off screen', () => {
      const store = sampleStore()
      openChat(store)
      expect(store.markDeleted('c3', 'm2')).toBe(true)
      expect(store.markDeleted('c3', 'm2')).toBe(false)
      store.compact()
      let state = store.getState()
      expect(state.chats.get('c3')?.messageIds).toEqual(['m1', 'm2', 'm3'])
      expect(state.messages.get('c3')?.get('m2')?.deleted).toBe(true)

      store.goBack()
      store.compact()
      state = store.getState()
      expect(state.chats.get('c3')?.messageIds).toEqual(['m1', 'm3'])
      expect(state.messages.get('c3')?.has('m2')).toBe(false)
    })

    it('marks visible messages read locally', () => {
      const store = sampleStore()
      store.upsertMessage('c3', message('m4', 'c3', 4, { read: false }))
      store.upsertMessage('c3', message('m5', 'c3', 5, { read: false }))
      expect(store.markReadLocal('c3', ['m4', 'm5'])).toBe(true)
      const state = store.getState()
      expect(state.chats.get('c3')?.unreadCount).toBe(0)
      expect(state.messages.get('c3')?.get('m5')?.read).toBe(true)
      expect(store.markReadLocal('c3', ['m4'])).toBe(false)
    })

    it('prepends history and clears the pending flag', () => {
      const store = sampleStore()
      openChat(store)
      store.moveCursor('right', 1)
      store.setFetchPending('c3', true)
      store.applyHistory('c3', [message('h1', 'c3', -2), message('h2', 'c3', -1)], true)
      const state = store.getState()
      expect(state.chats.get('c3')?.messageIds).toEqual(['h1', 'h2', 'm1', 'm2', 'm3'])
      expect(state.chats.get('c3')?.fetchPending).toBe(false)
      expect(state.chats.get('c3')?.hasMoreBefore).toBe(true)
      expect(selectedId(state, 'right')).toBe('m2')
      expect(state.chats.get('c3')?.unreadCount).toBe(0)
    })
  })

  describe('folders', () => {
    it('returns to the folder list when the open folder is removed', () => {
      const store = sampleStore()
      openChat(store)
      store.removeFolder('F1')
      const state = store.getState()
      expect(state.folderOrder).toEqual(['F2'])
      expect(state.left).toEqual({ level: { kind: 'folders' }, cursor: 0, scroll: 0 })
      expect(state.backStack).toHaveLength(0)
      expect(state.right.chatId).toBe('c3')
      expect(state.status).toBe('Folder "Work" was removed')
    })

    it('moves the folder cursor to a neighbour when another folder is removed', () => {
      const store = sampleStore()
      store.removeFolder('F1')
      const state = store.getState()
      expect(state.left.cursor).toBe(0)
      expect(selectedId(state, 'left')).toBe('F2')
      expect(state.status).toBeNull()
    })
  })

  it('drops typing indicators once they expire', () => {
    const store = sampleStore()
    const now = store.getState().now
    store.setTyping('c3', 'ana', now + 1000)
    store.tick(now + 500)
    expect(store.getState().typing.has('c3')).toBe(true)
    store.tick(now + 1000)
    expect(store.getState().typing.has('c3')).toBe(false)
  })

  it('never hands out a changed copy of an earlier state', () => {
    const store = sampleStore()
    openChat(store)
    const before = store.getState()
    const snapshot = buildRenderSnapshot(before, { version: store.version })
    store.upsertMessage('c3', message('m4', 'c3', 4, { read: false }))
    store.markDeleted('c3', 'm1')

    expect(before.chats.get('c3')?.messageIds).toEqual(['m1', 'm2', 'm3'])
    expect(before.messages.get('c3')?.get('m1')?.deleted).toBe(false)
    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.isFrozen(snapshot.panes[1].rows)).toBe(true)
    expect(Object.isFrozen(snapshot.panes[1].rows[0])).toBe(true)
  })

  it('keeps every cursor valid through a long run of mixed updates and keys', () => {
    let seed = 42
    const random = (n: number): number => {
      seed = (seed * 16807) % 2147483647
      return seed % n
    }
    const chatIds = ['c1', 'c2', 'c3', 'c4', 'c5', 'c6']
    const subset = (): string[] => chatIds.filter(() => random(2) === 0)

    const store = sampleStore()
    for (let step = 0; step < 500; step++) {
      const chatId = chatIds[random(chatIds.length)]
      switch (random(10)) {
        case 0:
          store.upsertFolder(folder(random(2) === 0 ? 'F1' : 'F3', subset()))
          break
        case 1:
          store.removeFolder(random(2) === 0 ? 'F2' : 'F3')
          break
        case 2:
          store.upsertMessage(chatId, message(`r${random(30)}`, chatId, random(100), { read: random(2) === 0 }))
          break
        case 3:
          store.markDeleted(chatId, `r${random(30)}`)
          break
        case 4:
          store.compact()
          break
        case 5:
          store.moveCursor(store.getState().focus, random(2) === 0 ? -1 : 1)
          break
        case 6:
          store.openSelected()
          break
        case 7:
          store.goBack()
          break
        case 8:
          store.setFocus(random(2) === 0 ? 'left' : 'right')
          break
        default:
          store.setViewport(8 + random(30), 80)
      }
      expect(() => assertPanelInvariant(store.getState())).not.toThrow()
    }
  })
})

describe('assertPanelInvariant', () => {
  it('throws InvalidCursorState for a dangling cursor', () => {
    const state: ViewState = { ...createInitialState(), left: { level: { kind: 'folders' }, cursor: 0, scroll: 0 } }
    expect(() => assertPanelInvariant(state)).toThrow(InvalidCursorState)
  })
})

describe('paneCapacity', () => {
  it('fits one message per three rows of the pane', () => {
    const state = createInitialState({ rows: 24, cols: 80 }, BASE_TIME)
    expect(paneCapacity(state, 'left')).toBe(19)
    expect(paneCapacity(state, 'right')).toBe(6)
  })

  it('loads the same snapshot into an unchecked store', () => {
    const store = new ViewStateStore(createInitialState(), { checkInvariants: false })
    store.dispatch({ type: 'LOAD_SNAPSHOT', snapshot: sampleSnapshot() })
    expect(store.getState().folderOrder).toEqual(['F1', 'F2'])
  })
})
