import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { describe, expect, it } from 'vitest'
import { JimpAsciiConverter, lumaToGrid, pixelToAscii, scaledHeight } from './image-converter'

const fixture = (name: string): string => fileURLToPath(new URL(`../../../fixtures/${name}`, import.meta.url))

describe('pixelToAscii', () => {
  it('maps black to the densest and white to the lightest character', () => {
    expect(pixelToAscii(0)).toBe('@')
    expect(pixelToAscii(255)).toBe(' ')
    expect(pixelToAscii(128)).toBe('+')
  })

  it('clamps out-of-range values', () => {
    expect(pixelToAscii(-10)).toBe('@')
    expect(pixelToAscii(999)).toBe(' ')
  })
})

describe('lumaToGrid', () => {
  it('builds one string per row', () => {
    expect(lumaToGrid([0, 255, 255, 0], 2, 2)).toEqual(['@ ', ' @'])
  })
})

describe('scaledHeight', () => {
  it('halves the height for terminal cell aspect', () => {
    expect(scaledHeight(40, 100, 100)).toBe(20)
    expect(scaledHeight(40, 200, 10)).toBe(1)
    expect(scaledHeight(40, 0, 10)).toBe(1)
  })
})

describe('JimpAsciiConverter', () => {
  it('converts a PNG to a grid of the configured width', async () => {
    const bytes = await readFile(fixture('gradient.png'))
    const grid = await new JimpAsciiConverter(4).convert(bytes)
    expect(grid).toHaveLength(2)
    expect(grid.every((row) => row.length === 4)).toBe(true)
  })

  it('reports bytes that are not an image', async () => {
    const bytes = await readFile(fixture('not-an-image.bin'))
    const grid = await new JimpAsciiConverter(4).convert(bytes)
    expect(grid).toEqual(['[Image format not supported]'])
  })
})
