// Chunk descriptors and dispatch to raw copy or expansion

import { BitmapDecodeError } from './errors'
import type { ScratchBuffer } from './scratch'
import type { ByteInput } from './streams'
import { decompressChunk, type ChunkTokenListener } from './chunk'

export interface ChunkDescriptor {
  decompressedSize: number
  compressedSize: number
}

export interface ChunkInfo extends ChunkDescriptor {
  raw: boolean
  // Bytes the expansion actually wrote; equals decompressedSize for raw chunks
  produced: number
}

export function readChunkDescriptor(input: ByteInput): ChunkDescriptor {
  if (input.remaining < 4) {
    throw new BitmapDecodeError(
      'TruncatedStream',
      `Unexpected end of input: chunk descriptor needs 4 bytes, ${input.remaining} left`
    )
  }
  const decompressedSize = input.readU16()
  const compressedSize = input.readU16()
  return { decompressedSize, compressedSize }
}

/**
 * Loads the next chunk into `scratch` and rewinds its read cursor.
 * `scratch.size` always follows the declared size; bytes the expansion did
 * not reach are zeroed.
 */
export function readNextChunk(
  input: ByteInput,
  scratch: ScratchBuffer,
  onToken?: ChunkTokenListener
): ChunkInfo {
  const descriptor = readChunkDescriptor(input)
  const { decompressedSize, compressedSize } = descriptor

  if (decompressedSize > scratch.buffer.length) {
    throw new BitmapDecodeError(
      'BufferOverflow',
      `Chunk declares ${decompressedSize} bytes, scratch holds ${scratch.buffer.length}`
    )
  }

  const raw = decompressedSize <= compressedSize
  let produced: number

  if (raw) {
    scratch.buffer.set(input.readBytes(decompressedSize, 'raw chunk'), 0)
    produced = decompressedSize
  } else {
    const payload = input.readBytes(compressedSize, 'compressed chunk')
    produced = decompressChunk(payload, scratch, onToken)
    if (produced < decompressedSize) {
      scratch.buffer.fill(0, produced, decompressedSize)
    }
  }

  scratch.size = decompressedSize
  scratch.position = 0
  return { ...descriptor, raw, produced }
}
