// Working window holding one chunk of decompressed bytes

export const SCRATCH_CAPACITY = 1500

export class ScratchBuffer {
  static readonly CAPACITY = SCRATCH_CAPACITY

  readonly buffer: Uint8Array
  position: number = 0 // next byte handed to the assembler
  size: number = 0 // valid bytes of the current chunk

  constructor() {
    this.buffer = new Uint8Array(SCRATCH_CAPACITY)
  }

  get available(): number {
    return this.size - this.position
  }

  get exhausted(): boolean {
    return this.position >= this.size
  }

  reset(): void {
    this.buffer.fill(0)
    this.position = 0
    this.size = 0
  }
}
