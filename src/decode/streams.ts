// Sequential input over the compressed container

import { BitmapDecodeError } from './errors'

export class ByteInput {
  buffer: Uint8Array
  pos: number

  constructor(buffer: Uint8Array, pos: number = 0) {
    this.buffer = buffer
    this.pos = pos
  }

  get remaining(): number {
    return this.buffer.length - this.pos
  }

  private require(count: number, what: string): void {
    if (count > this.remaining) {
      throw new BitmapDecodeError(
        'TruncatedStream',
        `Unexpected end of input reading ${what}: need ${count} bytes, ${this.remaining} left`
      )
    }
  }

  readU8(what: string = 'byte'): number {
    this.require(1, what)
    return this.buffer[this.pos++]
  }

  // Little-endian
  readU16(what: string = 'u16'): number {
    this.require(2, what)
    const value = this.buffer[this.pos] | (this.buffer[this.pos + 1] << 8)
    this.pos += 2
    return value
  }

  readU32(what: string = 'u32'): number {
    this.require(4, what)
    const b = this.buffer
    const p = this.pos
    const value = (b[p] | (b[p + 1] << 8) | (b[p + 2] << 16) | (b[p + 3] << 24)) >>> 0
    this.pos += 4
    return value
  }

  // Returns a view, not a copy
  readBytes(count: number, what: string = 'bytes'): Uint8Array {
    this.require(count, what)
    const out = this.buffer.subarray(this.pos, this.pos + count)
    this.pos += count
    return out
  }

  seek(pos: number): void {
    if (pos < 0 || pos > this.buffer.length) {
      throw new BitmapDecodeError(
        'TruncatedStream',
        `Seek to ${pos} outside input of ${this.buffer.length} bytes`
      )
    }
    this.pos = pos
  }
}
