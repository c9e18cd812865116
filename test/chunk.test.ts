import { describe, it, expect } from 'vitest'
import { decompressChunk, type ChunkToken } from '../src/decode/chunk'
import { ScratchBuffer } from '../src/decode/scratch'
import { BitmapDecodeError } from '../src/decode/errors'

function expand(payload: number[], onToken?: (token: ChunkToken) => void): Uint8Array {
  const scratch = new ScratchBuffer()
  const written = decompressChunk(new Uint8Array(payload), scratch, onToken)
  return scratch.buffer.slice(0, written)
}

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof BitmapDecodeError) return err.kind
    throw err
  }
  return undefined
}

describe('decompressChunk', () => {
  it('copies literal-only payloads after the leading literal', () => {
    const out = expand([0x10, 0x00, 1, 2, 3, 4, 5, 6, 7, 8])
    expect(Array.from(out)).toEqual([0x10, 1, 2, 3, 4, 5, 6, 7, 8])
  })

  it('repeats a single byte through an overlapping copy', () => {
    // offset 1, length 18 - 13 = 5
    const out = expand([0x41, 0x80, 0x0D, 0x01])
    expect(Array.from(out)).toEqual([0x41, 0x41, 0x41, 0x41, 0x41, 0x41])
  })

  it('repeats a multi-byte pattern when offset is shorter than length', () => {
    // literals 1, 2 then offset 2, length 18 - 12 = 6
    const out = expand([1, 0x40, 2, 0x0C, 0x02])
    expect(Array.from(out)).toEqual([1, 2, 1, 2, 1, 2, 1, 2])
  })

  it('reads a third byte for long copies', () => {
    // low nibble 0: length = 2 + 18
    const out = expand([7, 0x80, 0x00, 0x01, 0x02])
    expect(out.length).toBe(21)
    expect(out.every((b) => b === 7)).toBe(true)
  })

  it('uses the high nibble as bits 8..11 of the offset', () => {
    // [1, 2] then 273 x 2 (offset 1, length 255 + 18), then offset 0x113 = 275, length 3
    const out = expand([0x01, 0x60, 0x02, 0x00, 0x01, 0xFF, 0x1F, 0x13])
    expect(out.length).toBe(278)
    expect(out[274]).toBe(2)
    expect(Array.from(out.subarray(275))).toEqual([1, 2, 2])
  })

  it('stops at the end-of-chunk token', () => {
    const out = expand([5, 0x20, 6, 7, 0x00, 0x00, 8, 9])
    expect(Array.from(out)).toEqual([5, 6, 7])
  })

  it('ends normally when the payload runs out between tokens', () => {
    const out = expand([1, 0x00, 2])
    expect(Array.from(out)).toEqual([1, 2])
  })

  it('rejects offsets reaching before the decoded data', () => {
    expect(kindOf(() => expand([5, 0x80, 0x0D, 0x02]))).toBe('InvalidOffset')
  })

  it('accepts an offset equal to the cursor', () => {
    expect(Array.from(expand([9, 0x40, 8, 0x0F, 0x02]))).toEqual([9, 8, 9, 8, 9])
  })

  it('fails when output would pass the scratch capacity', () => {
    const payload = [1, 0xFC]
    for (let i = 0; i < 6; i++) payload.push(0x00, 0x01, 0xFF)
    expect(kindOf(() => expand(payload))).toBe('BufferOverflow')
  })

  it('fills the scratch exactly to capacity', () => {
    // 1 + 5 * 273 + 134 = 1500
    const payload = [1, 0xFC]
    for (let i = 0; i < 5; i++) payload.push(0x00, 0x01, 0xFF)
    payload.push(0x00, 0x01, 134 - 18)
    expect(expand(payload).length).toBe(1500)
  })

  it('fails on a back-reference cut off by the end of the payload', () => {
    expect(kindOf(() => expand([1, 0x80, 0x0D]))).toBe('TruncatedStream')
    expect(kindOf(() => expand([1, 0x80, 0x00, 0x01]))).toBe('TruncatedStream')
  })

  it('fails on an empty payload', () => {
    expect(kindOf(() => expand([]))).toBe('TruncatedStream')
  })

  it('reports tokens to the trace hook', () => {
    const tokens: ChunkToken[] = []
    expand([0x41, 0x40, 0x42, 0x0D, 0x01], (t) => tokens.push(t))
    expect(tokens).toEqual([
      { type: 'literal', position: 0, value: 0x41 },
      { type: 'literal', position: 1, value: 0x42 },
      { type: 'copy', position: 2, offset: 1, length: 5 },
    ])
  })

  it('reports the end token', () => {
    const tokens: ChunkToken[] = []
    expand([0x41, 0x80, 0x00, 0x00], (t) => tokens.push(t))
    expect(tokens[tokens.length - 1]).toEqual({ type: 'end', position: 1 })
  })
})
