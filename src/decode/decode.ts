// Custom bitmap decoding

import { ByteInput } from './streams'
import { BitmapDecodeError } from './errors'
import { readCustomHeader, type BitsPerPixel } from './header'
import { ScanlineAssembler } from './scanlines'
import { SCRATCH_CAPACITY, type ScratchBuffer } from './scratch'
import type { ChunkTokenListener } from './chunk'
import type { ChunkInfo } from './chunk-reader'

export interface CustomBitmapDecodeOptions {
  // Called per decoded token; tracing is off unless set
  onToken?: ChunkTokenListener
  onChunk?: (chunk: ChunkInfo) => void
  // Reused between sessions; reset before use
  scratch?: ScratchBuffer
  maxImageSize?: number
}

export interface DecodedBitmap {
  bitsPerPixel: BitsPerPixel
  width: number
  height: number
  palette: Uint8Array | null
  stride: number
  // stride * height bytes, rows bottom-up
  pixels: Uint8Array
}

const BMP_MAGIC_0 = 0x42 // 'B'
const BMP_MAGIC_1 = 0x4d // 'M'

// Descriptor plus at least one payload byte for any chunk that yields output
const MIN_CHUNK_INPUT = 5

// Upper bound on the pixel bytes `remaining` input bytes can decode to
export function maxDecodableBytes(remaining: number): number {
  return Math.floor(remaining / MIN_CHUNK_INPUT) * SCRATCH_CAPACITY
}

// Standard bitmaps need no decoding
export function isStandardBitmap(buffer: Uint8Array): boolean {
  return buffer.length >= 2 && buffer[0] === BMP_MAGIC_0 && buffer[1] === BMP_MAGIC_1
}

// Reads the header only, allows pre-allocation without a full decode
export function customBitmapDecodedSize(buffer: Uint8Array): number {
  return readCustomHeader(new ByteInput(buffer)).imageSize
}

export function decodeCustomBitmap(
  buffer: Uint8Array,
  options?: CustomBitmapDecodeOptions
): DecodedBitmap {
  const input = new ByteInput(buffer)
  const header = readCustomHeader(input)

  const maxImageSize = options?.maxImageSize
  if (maxImageSize !== undefined && header.imageSize > maxImageSize) {
    throw new BitmapDecodeError(
      'BufferOverflow',
      `Decoded size ${header.imageSize} exceeds limit ${maxImageSize}`
    )
  }

  const needed = header.packedRowWidth * header.height
  const available = maxDecodableBytes(input.remaining)
  if (needed > available) {
    throw new BitmapDecodeError(
      'BufferOverflow',
      `Image needs ${needed} bytes, ${input.remaining} bytes of input yield at most ${available}`
    )
  }

  const assembler = new ScanlineAssembler(input, header, {
    scratch: options?.scratch,
    onToken: options?.onToken,
    onChunk: options?.onChunk,
  })
  const pixels = assembler.assemble()

  return {
    bitsPerPixel: header.bitsPerPixel,
    width: header.width,
    height: header.height,
    palette: header.palette,
    stride: header.stride,
    pixels,
  }
}
