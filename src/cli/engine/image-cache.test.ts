import { describe, expect, it } from 'vitest'
import { ImageRenderCache } from './image-cache'

describe('ImageRenderCache', () => {
  it('evicts the least recently used entry past capacity', () => {
    const cache = new ImageRenderCache(2)
    cache.set('a', ['a'])
    cache.set('b', ['b'])
    cache.get('a')
    cache.set('c', ['c'])
    expect(cache.keys()).toEqual(['a', 'c'])
  })

  it('never evicts entries pinned as visible', () => {
    const cache = new ImageRenderCache(2)
    cache.set('a', ['a'])
    cache.set('b', ['b'])
    cache.pinVisible(['a', 'b'])
    cache.set('c', ['c'])
    expect(cache.keys()).toEqual(['a', 'b'])
    expect(cache.has('c')).toBe(false)
  })

  it('may exceed capacity while every entry is pinned', () => {
    const cache = new ImageRenderCache(1)
    cache.pinVisible(['a', 'b'])
    cache.set('a', ['a'])
    cache.set('b', ['b'])
    expect(cache.size).toBe(2)
    cache.pinVisible(['b'])
    expect(cache.keys()).toEqual(['b'])
    expect(cache.isPinned('a')).toBe(false)
  })

  it('returns undefined for a missing grid', () => {
    expect(new ImageRenderCache().get('missing')).toBeUndefined()
  })

  it('keeps at least one slot', () => {
    expect(new ImageRenderCache(0).capacity).toBe(1)
  })
})
