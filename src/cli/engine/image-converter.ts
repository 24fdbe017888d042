/**
 * Image to ASCII conversion
 * Decodes with jimp, maps greyscale brightness onto a character ramp
 */

import { Jimp } from 'jimp'
import { errorMessage } from './errors'
import type { CharGrid } from './image-cache'

export interface ImageConverter {
  convert(bytes: Uint8Array): Promise<CharGrid>
}

// Dark to light
export const ASCII_RAMP = '@%#*+=-:. '

// Terminal cells are roughly twice as tall as they are wide
const CELL_ASPECT = 0.5

export function pixelToAscii(value: number): string {
  const index = Math.floor((Math.max(0, Math.min(255, value)) * (ASCII_RAMP.length - 1)) / 255)
  return ASCII_RAMP[index]
}

/**
 * Rows of characters from a row-major buffer of greyscale values
 */
export function lumaToGrid(luma: ArrayLike<number>, width: number, height: number): CharGrid {
  const rows: string[] = []
  for (let y = 0; y < height; y++) {
    let row = ''
    for (let x = 0; x < width; x++) {
      row += pixelToAscii(luma[y * width + x] ?? 255)
    }
    rows.push(row)
  }
  return rows
}

export function scaledHeight(width: number, sourceWidth: number, sourceHeight: number): number {
  if (sourceWidth <= 0) return 1
  return Math.max(1, Math.floor(width * (sourceHeight / sourceWidth) * CELL_ASPECT))
}

export class JimpAsciiConverter implements ImageConverter {
  constructor(private readonly width: number = 40) {}

  async convert(bytes: Uint8Array): Promise<CharGrid> {
    try {
      const image = await Jimp.read(Buffer.from(bytes))
      const height = scaledHeight(this.width, image.bitmap.width, image.bitmap.height)
      image.greyscale().resize({ w: this.width, h: height })

      const { data, width: outWidth, height: outHeight } = image.bitmap
      const luma = new Uint8Array(outWidth * outHeight)
      for (let i = 0; i < luma.length; i++) {
        // RGBA, channels are equal after greyscale
        luma[i] = data[i * 4]
      }
      return lumaToGrid(luma, outWidth, outHeight)
    } catch (error) {
      const message = errorMessage(error)
      if (/mime/i.test(message)) return ['[Image format not supported]']
      return [`[Error converting image: ${message}]`]
    }
  }
}
