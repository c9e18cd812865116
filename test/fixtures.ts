// In-memory builders for custom bitmap streams

export function concat(...parts: ArrayLike<number>[]): Uint8Array {
  let total = 0
  for (const p of parts) total += p.length
  const out = new Uint8Array(total)
  let o = 0
  for (const p of parts) {
    out.set(p, o)
    o += p.length
  }
  return out
}

export function u16(value: number): number[] {
  return [value & 0xFF, (value >>> 8) & 0xFF]
}

export function u32(value: number): number[] {
  return [value & 0xFF, (value >>> 8) & 0xFF, (value >>> 16) & 0xFF, (value >>> 24) & 0xFF]
}

// Descriptor followed by its bytes, sizes as given
export function chunk(decompressedSize: number, compressedSize: number, payload: ArrayLike<number>): Uint8Array {
  return concat(u16(decompressedSize), u16(compressedSize), payload)
}

export function rawChunk(bytes: ArrayLike<number>): Uint8Array {
  return chunk(bytes.length, bytes.length, bytes)
}

export function compressedChunk(decompressedSize: number, payload: ArrayLike<number>): Uint8Array {
  return chunk(decompressedSize, payload.length, payload)
}

// flags carry the depth in bits 2..5 and 0x80 for "no palette"
export function header(flags: number, paletteCount: number, width: number, height: number): number[] {
  return [flags, paletteCount, ...u16(width), ...u16(height)]
}

export const JAM_MAGIC_BYTES = [0x4c, 0x4a, 0x41, 0x4d]

export function jamName(text: string): number[] {
  const out = new Array<number>(12).fill(0)
  for (let i = 0; i < text.length; i++) out[i] = text.charCodeAt(i)
  return out
}

// LJAM | root: 1 file, 1 folder | SUB at 48: 1 file, 0 folders | data at 76
export function sampleJamArchive(): Uint8Array {
  return concat(
    JAM_MAGIC_BYTES,
    u32(1), jamName('A.BMP'), u32(76), u32(3),
    u32(1), jamName('SUB'), u32(48),
    u32(1), jamName('B.TXT'), u32(79), u32(2),
    u32(0),
    [1, 2, 3],
    [4, 5],
  )
}
