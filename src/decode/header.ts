// Custom bitmap header and palette

import { BitmapDecodeError } from './errors'
import type { ByteInput } from './streams'

export const HEADER_SIZE = 6
export const DEPTH_MASK = 0x3c
export const FLAG_NO_PALETTE = 0x80
export const PALETTE_MAX_ENTRIES = 256

export type BitsPerPixel = 4 | 8 | 24 | 32

export interface CustomBitmapHeader {
  bitsPerPixel: BitsPerPixel
  width: number
  height: number
  // B, G, R, 0 per entry; null for true-colour images or when the flag says so
  palette: Uint8Array | null
  packedRowWidth: number
  stride: number
  imageSize: number
}

export function isSupportedDepth(bits: number): bits is BitsPerPixel {
  return bits === 4 || bits === 8 || bits === 24 || bits === 32
}

export function align(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment
}

// Row width without padding
export function packedRowWidth(width: number, bitsPerPixel: number): number {
  return align(width * bitsPerPixel, 8) / 8
}

// Row width padded to 32 bits
export function rowStride(width: number, bitsPerPixel: number): number {
  return align(width * bitsPerPixel, 32) / 8
}

export function readCustomHeader(input: ByteInput): CustomBitmapHeader {
  if (input.remaining < HEADER_SIZE) {
    throw new BitmapDecodeError(
      'TruncatedStream',
      `Header needs ${HEADER_SIZE} bytes, input has ${input.remaining}`
    )
  }
  const flags = input.readU8()
  const paletteCount = input.readU8()
  const width = input.readU16()
  const height = input.readU16()

  const bitsPerPixel = flags & DEPTH_MASK
  if (!isSupportedDepth(bitsPerPixel)) {
    throw new BitmapDecodeError('UnsupportedDepth', `Invalid bits per pixel: ${bitsPerPixel}`)
  }

  const hasPalette = bitsPerPixel <= 8 && (flags & FLAG_NO_PALETTE) === 0
  const palette = hasPalette ? readPalette(input, paletteCount + 1) : null
  const stride = rowStride(width, bitsPerPixel)

  return {
    bitsPerPixel,
    width,
    height,
    palette,
    packedRowWidth: packedRowWidth(width, bitsPerPixel),
    stride,
    imageSize: stride * height,
  }
}

// Entries are stored as 3 bytes (B, G, R) and widened to 4
function readPalette(input: ByteInput, entries: number): Uint8Array {
  const packed = input.readBytes(entries * 3, 'palette')
  const palette = new Uint8Array(entries * 4)
  for (let i = 0; i < entries; i++) {
    palette[i * 4] = packed[i * 3]
    palette[i * 4 + 1] = packed[i * 3 + 1]
    palette[i * 4 + 2] = packed[i * 3 + 2]
  }
  return palette
}
