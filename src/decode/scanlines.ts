// Scanline reconstruction from the chunk stream

import { ScratchBuffer } from './scratch'
import type { ByteInput } from './streams'
import { readNextChunk, type ChunkInfo } from './chunk-reader'
import type { ChunkTokenListener } from './chunk'
import { packedRowWidth, rowStride } from './header'

export interface ScanlineLayout {
  width: number
  height: number
  bitsPerPixel: number
}

export interface ScanlineAssemblerOptions {
  scratch?: ScratchBuffer
  onToken?: ChunkTokenListener
  onChunk?: (chunk: ChunkInfo) => void
}

/**
 * Pulls chunks on demand and lays source rows out bottom-up.
 * Source rows arrive top to bottom; row `i` lands at
 * `(height - 1 - i) * pitch`, where pitch is `packedRowWidth` for `fill`
 * and `stride` for `assemble`.
 */
export class ScanlineAssembler {
  readonly width: number
  readonly height: number
  readonly packedRowWidth: number
  readonly stride: number
  readonly scratch: ScratchBuffer

  private readonly input: ByteInput
  private readonly onToken: ChunkTokenListener | undefined
  private readonly onChunk: ((chunk: ChunkInfo) => void) | undefined
  private nextRow: number = 0
  chunksRead: number = 0

  constructor(input: ByteInput, layout: ScanlineLayout, options?: ScanlineAssemblerOptions) {
    this.input = input
    this.width = layout.width
    this.height = layout.height
    this.packedRowWidth = packedRowWidth(layout.width, layout.bitsPerPixel)
    this.stride = rowStride(layout.width, layout.bitsPerPixel)
    this.onToken = options?.onToken
    this.onChunk = options?.onChunk

    // A reused scratch must not leak the previous session's bytes
    this.scratch = options?.scratch ?? new ScratchBuffer()
    this.scratch.reset()
  }

  get rowsFilled(): number {
    return this.nextRow
  }

  /**
   * Fills source row `row` into its bottom-up slot of `staging`.
   * Rows must be filled in order since the stream is read once.
   */
  fill(row: number, staging: Uint8Array): void {
    this.fillAt(row, staging, this.packedRowWidth)
  }

  // Whole image, rows bottom-up, each padded with zeros to `stride`
  assemble(): Uint8Array {
    const out = new Uint8Array(this.stride * this.height)
    for (let row = 0; row < this.height; row++) {
      this.fillAt(row, out, this.stride)
    }
    return out
  }

  private fillAt(row: number, dest: Uint8Array, pitch: number): void {
    if (row !== this.nextRow) {
      throw new Error(`Rows must be filled in order: expected ${this.nextRow}, got ${row}`)
    }
    if (row >= this.height) {
      throw new Error(`Row ${row} outside image of height ${this.height}`)
    }
    const rowLen = this.packedRowWidth
    let dst = (this.height - 1 - row) * pitch
    if (dst + rowLen > dest.length) {
      throw new Error('Staging buffer is not large enough')
    }

    const scratch = this.scratch
    let remaining = rowLen
    while (remaining > 0) {
      if (scratch.exhausted) {
        const chunk = readNextChunk(this.input, scratch, this.onToken)
        this.chunksRead++
        this.onChunk?.(chunk)
        continue
      }
      const count = Math.min(remaining, scratch.available)
      dest.set(scratch.buffer.subarray(scratch.position, scratch.position + count), dst)
      scratch.position += count
      dst += count
      remaining -= count
    }
    this.nextRow++
  }
}
