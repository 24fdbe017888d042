import { describe, expect, it } from 'vitest'
import {
  computePaneLayout,
  emojify,
  formatRelative,
  formatTimestamp,
  getStringWidth,
  messagePreview,
  truncateToWidth,
} from './shared'

describe('truncateToWidth', () => {
  it('leaves text that fits alone', () => {
    expect(truncateToWidth('hello', 10)).toBe('hello')
  })

  it('cuts at the column limit and appends an ellipsis', () => {
    expect(truncateToWidth('hello world', 6)).toBe('hello…')
    expect(truncateToWidth('日本語テキスト', 7)).toBe('日本語…')
  })

  it('returns nothing when not even the ellipsis fits', () => {
    expect(truncateToWidth('abc', 0)).toBe('')
  })
})

describe('messagePreview', () => {
  it('uses the first line of text', () => {
    expect(messagePreview({ text: '  first\nsecond' })).toBe('first')
    expect(messagePreview({ text: 'a'.repeat(70) })).toBe(`${'a'.repeat(60)}…`)
  })

  it('falls back to an image marker', () => {
    expect(messagePreview({ image: { id: 'i1' } })).toBe('[image]')
    expect(messagePreview({})).toBe('')
  })
})

describe('formatTimestamp', () => {
  it('prints local date and time', () => {
    expect(formatTimestamp(new Date(2024, 5, 10, 9, 1).getTime())).toBe('2024-06-10 09:01')
  })
})

describe('formatRelative', () => {
  const now = new Date(2024, 5, 10, 12, 0).getTime()

  it('describes recent ages', () => {
    expect(formatRelative(now - 30_000, now)).toBe('just now')
    expect(formatRelative(now - 5 * 60_000, now)).toBe('5m ago')
    expect(formatRelative(now - 3 * 3_600_000, now)).toBe('3h ago')
  })

  it('is empty for old or future timestamps', () => {
    expect(formatRelative(now - 25 * 3_600_000, now)).toBe('')
    expect(formatRelative(now + 60_000, now)).toBe('')
  })
})

describe('computePaneLayout', () => {
  it('gives the left pane about a third of the width', () => {
    expect(computePaneLayout(80)).toEqual({ leftCols: 28, rightCols: 52, leftInner: 26, rightInner: 50 })
  })

  it('keeps both panes at a minimum width when there is room', () => {
    expect(computePaneLayout(40)).toEqual({ leftCols: 20, rightCols: 20, leftInner: 18, rightInner: 18 })
  })

  it('splits by ratio on very narrow terminals', () => {
    expect(computePaneLayout(30)).toEqual({ leftCols: 10, rightCols: 20, leftInner: 8, rightInner: 18 })
  })
})

describe('emojify', () => {
  it('replaces shortcodes with emoji', () => {
    expect(emojify('hi :wave:')).toBe('hi 👋')
    expect(getStringWidth('👋')).toBe(2)
  })
})
