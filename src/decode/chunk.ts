// Back-reference expansion of one compressed chunk
//
// Payload layout:
//   first byte            literal
//   command byte          8 flags, read MSB first
//     flag 0              one literal byte
//     flag 1              back-reference, 2 or 3 bytes:
//                         +--------+--------+--------+
//                         |   b1   |   b2   |  (b3)  |
//                         +--------+--------+--------+
//                         offset = (b1 & 0xF0) << 4 | b2, 12 bits
//                         length = 18 - (b1 & 0x0F), or b3 + 18 when that is 0
//                         offset 0 terminates the chunk
//
// Copies run byte by byte so that an offset shorter than the length repeats
// the bytes it has just written.

import { BitmapDecodeError } from './errors'
import { ScratchBuffer } from './scratch'

export const LONG_COPY_BASE = 18

export type ChunkToken =
  | { type: 'literal'; position: number; value: number }
  | { type: 'copy'; position: number; offset: number; length: number }
  | { type: 'end'; position: number }

export type ChunkTokenListener = (token: ChunkToken) => void

/**
 * Expands `payload` into `scratch.buffer` starting at index 0.
 * Returns the number of bytes written. Cursors of `scratch` are left to the
 * caller.
 */
export function decompressChunk(
  payload: Uint8Array,
  scratch: ScratchBuffer,
  onToken?: ChunkTokenListener
): number {
  const out = scratch.buffer
  const capacity = out.length
  const end = payload.length

  if (end === 0) {
    throw new BitmapDecodeError('TruncatedStream', 'Compressed chunk has no payload')
  }

  let src = 0
  let dst = 0

  out[dst] = payload[src++]
  onToken?.({ type: 'literal', position: dst, value: out[dst] })
  dst++

  outer: while (src < end) {
    let command = payload[src++]

    for (let bit = 0; bit < 8; bit++, command <<= 1) {
      if (src >= end) {
        break outer
      }

      if ((command & 0x80) === 0) {
        if (dst >= capacity) {
          throw overflow(dst + 1)
        }
        out[dst] = payload[src++]
        onToken?.({ type: 'literal', position: dst, value: out[dst] })
        dst++
        continue
      }

      if (src + 2 > end) {
        throw new BitmapDecodeError('TruncatedStream', 'Back-reference cut off by end of chunk')
      }
      const b1 = payload[src++]
      const b2 = payload[src++]
      const offset = ((b1 & 0xf0) << 4) | b2

      if (offset === 0) {
        onToken?.({ type: 'end', position: dst })
        break outer
      }
      if (offset > dst) {
        throw new BitmapDecodeError(
          'InvalidOffset',
          `Back-reference offset ${offset} exceeds ${dst} decoded bytes`
        )
      }

      const low = b1 & 0x0f
      let length: number
      if (low !== 0) {
        length = LONG_COPY_BASE - low
      } else {
        if (src >= end) {
          throw new BitmapDecodeError('TruncatedStream', 'Back-reference length byte missing')
        }
        length = payload[src++] + LONG_COPY_BASE
      }

      if (dst + length > capacity) {
        throw overflow(dst + length)
      }
      onToken?.({ type: 'copy', position: dst, offset, length })
      for (let i = 0; i < length; i++) {
        out[dst] = out[dst - offset]
        dst++
      }
    }
  }

  return dst
}

function overflow(needed: number): BitmapDecodeError {
  return new BitmapDecodeError(
    'BufferOverflow',
    `Decompressed chunk needs ${needed} bytes, scratch holds ${ScratchBuffer.CAPACITY}`
  )
}
