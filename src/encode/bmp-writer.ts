// Uncompressed BMP output (BITMAPFILEHEADER + BITMAPINFOHEADER)

import { ByteWriter } from './byte-writer'

export const FILE_HEADER_SIZE = 14
export const INFO_HEADER_SIZE = 40
export const BI_RGB = 0

export interface BmpImage {
  bitsPerPixel: number
  width: number
  height: number
  // B, G, R, 0 per entry
  palette: Uint8Array | null
  // Rows bottom-up, each padded to a multiple of 4 bytes
  pixels: Uint8Array
}

// 4 bpp tables hold 16 entries, 8 bpp tables 256; no table without a palette
export function colorTableEntries(image: Pick<BmpImage, 'bitsPerPixel' | 'palette'>): number {
  if (image.palette === null) {
    return 0
  }
  return image.bitsPerPixel === 4 ? 16 : 256
}

export function encodeBmp(image: BmpImage): Uint8Array {
  const { bitsPerPixel, width, height, palette, pixels } = image
  const stride = (Math.ceil((width * bitsPerPixel) / 32) * 32) / 8
  const imageSize = stride * height
  if (pixels.length !== imageSize) {
    throw new Error(`Pixel array is ${pixels.length} bytes, expected ${imageSize}`)
  }

  const entries = colorTableEntries(image)
  const dataOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE + entries * 4
  const w = new ByteWriter(dataOffset + imageSize)

  // File header
  w.writeU8(0x42) // 'B'
  w.writeU8(0x4d) // 'M'
  w.writeU32(dataOffset + imageSize)
  w.writeU16(0)
  w.writeU16(0)
  w.writeU32(dataOffset)

  // Info header; positive height means bottom-up rows
  w.writeU32(INFO_HEADER_SIZE)
  w.writeU32(width)
  w.writeU32(height)
  w.writeU16(1) // planes
  w.writeU16(bitsPerPixel)
  w.writeU32(BI_RGB)
  w.writeU32(imageSize)
  w.writeU32(0) // horizontal pixels per metre
  w.writeU32(0) // vertical pixels per metre
  w.writeU32(entries) // colours used
  w.writeU32(entries) // important colours

  if (palette !== null) {
    const used = Math.min(palette.length, entries * 4)
    w.writeBytes(palette.subarray(0, used))
    w.skip(entries * 4 - used)
  }

  w.writeBytes(pixels)
  return w.finish()
}
