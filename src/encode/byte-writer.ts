// Little-endian byte writing for the bitmap container
//
// Fixed size: the writer knows the whole file length before it starts, so
// running past the end is a sizing bug, not something to grow around.
export class ByteWriter {
  buffer: Uint8Array
  pos: number

  constructor(size: number) {
    this.buffer = new Uint8Array(size)
    this.pos = 0
  }

  private ensureCapacity(bytes: number): void {
    if (this.pos + bytes > this.buffer.length) {
      throw new Error('Output buffer is not large enough')
    }
  }

  writeU8(value: number): void {
    this.ensureCapacity(1)
    this.buffer[this.pos++] = value & 0xFF
  }

  writeU16(value: number): void {
    this.ensureCapacity(2)
    this.buffer[this.pos++] = value & 0xFF
    this.buffer[this.pos++] = (value >>> 8) & 0xFF
  }

  writeU32(value: number): void {
    this.ensureCapacity(4)
    this.buffer[this.pos++] = value & 0xFF
    this.buffer[this.pos++] = (value >>> 8) & 0xFF
    this.buffer[this.pos++] = (value >>> 16) & 0xFF
    this.buffer[this.pos++] = (value >>> 24) & 0xFF
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length)
    this.buffer.set(bytes, this.pos)
    this.pos += bytes.length
  }

  // Zero bytes; the buffer starts zeroed
  skip(count: number): void {
    this.ensureCapacity(count)
    this.pos += count
  }

  finish(): Uint8Array {
    if (this.pos !== this.buffer.length) {
      throw new Error(`Wrote ${this.pos} of ${this.buffer.length} bytes`)
    }
    return this.buffer
  }
}
