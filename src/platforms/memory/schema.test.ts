import { describe, expect, it } from 'vitest'
import { parseSessionFixture } from './schema'

describe('parseSessionFixture', () => {
  it('fills defaults and converts ISO timestamps', () => {
    const fixture = parseSessionFixture({
      folders: [],
      chats: [{ id: 'c1', name: 'one' }],
      messages: [{ id: 'm1', chatId: 'c1', sender: 'ana', timestamp: '2024-06-10T09:00:00Z', text: 'hi' }],
    })
    expect(fixture.allChatsFolder).toBe(true)
    expect(fixture.scripted).toEqual([])
    expect(fixture.messages[0]).toEqual({
      id: 'm1',
      chatId: 'c1',
      sender: 'ana',
      timestamp: 1718010000000,
      text: 'hi',
      read: true,
      edited: false,
    })
  })

  it('defaults the typing duration', () => {
    const fixture = parseSessionFixture({
      folders: [],
      chats: [{ id: 'c1', name: 'one' }],
      messages: [],
      scripted: [{ kind: 'typing', afterMs: 0, chatId: 'c1', sender: 'ana' }],
    })
    expect(fixture.scripted[0]).toEqual({ kind: 'typing', afterMs: 0, chatId: 'c1', sender: 'ana', durationMs: 5000 })
  })

  it('rejects folders and messages that point at unknown chats', () => {
    const parse = () =>
      parseSessionFixture({
        folders: [{ id: 'f1', name: 'F', chatIds: ['ghost'] }],
        chats: [],
        messages: [{ id: 'm1', chatId: 'nowhere', sender: 'ana', timestamp: 0 }],
      })
    expect(parse).toThrow('Unknown chat ghost')
    expect(parse).toThrow('Unknown chat nowhere')
  })

  it('rejects unknown keys', () => {
    expect(() => parseSessionFixture({ folders: [], chats: [], messages: [], extra: 1 })).toThrow()
  })
})
