// Decode benchmark over synthetic images
// Usage: npm run bench
import { bench, describe } from 'vitest'
import { decodeCustomBitmap } from '../src/decode/decode'
import { ScratchBuffer } from '../src/decode/scratch'

function makeXorshift32(seed: number): () => number {
  let x = seed | 0
  return () => {
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    return x >>> 0
  }
}

interface Fixture {
  name: string
  data: Uint8Array
}

// One byte repeated: a literal, then back-references of offset 1
function runPayload(size: number, fill: number): number[] {
  const payload = [fill]
  let left = size - 1
  while (left > 0) {
    const flags = payload.length
    payload.push(0)
    for (let bit = 0; bit < 8 && left > 0; bit++) {
      if (left < 3) {
        payload.push(fill)
        left--
        continue
      }
      const len = Math.min(left, 273)
      if (len >= 18) {
        payload.push(0x00, 0x01, len - 18)
      } else {
        payload.push(18 - len, 0x01)
      }
      payload[flags] |= 0x80 >> bit
      left -= len
    }
  }
  return payload
}

function buildImage(width: number, height: number, mode: 'runs' | 'noise', chunkSize: number): Uint8Array {
  const parts: number[] = [0x18, 0, width & 0xFF, width >>> 8, height & 0xFF, height >>> 8]
  const next = makeXorshift32(0xC0FFEE)
  let total = width * 3 * height

  while (total > 0) {
    const size = Math.min(chunkSize, total)
    total -= size
    let payload: number[] = []
    if (mode === 'runs') {
      payload = runPayload(size, next() & 0xFF)
    }
    if (payload.length === 0 || payload.length >= size) {
      payload = []
      for (let i = 0; i < size; i++) payload.push(next() & 0xFF)
    }
    parts.push(size & 0xFF, size >>> 8, payload.length & 0xFF, payload.length >>> 8)
    for (const b of payload) parts.push(b)
  }
  return new Uint8Array(parts)
}

const fixtures: Fixture[] = [
  { name: 'runs 320x200', data: buildImage(320, 200, 'runs', 1024) },
  { name: 'noise 320x200', data: buildImage(320, 200, 'noise', 1024) },
  { name: 'runs 640x480', data: buildImage(640, 480, 'runs', 1500) },
]

describe('decodeCustomBitmap', () => {
  const scratch = new ScratchBuffer()
  for (const fixture of fixtures) {
    bench(fixture.name, () => {
      decodeCustomBitmap(fixture.data)
    })
    bench(`${fixture.name} (shared scratch)`, () => {
      decodeCustomBitmap(fixture.data, { scratch })
    })
  }
})
