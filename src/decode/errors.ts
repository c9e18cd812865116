// Error type shared by the decoder, the writer and the archive reader

export type BitmapErrorKind =
  | 'TruncatedStream'
  | 'InvalidOffset'
  | 'BufferOverflow'
  | 'UnsupportedDepth'
  | 'InvalidArchive'

export class BitmapDecodeError extends Error {
  readonly kind: BitmapErrorKind

  constructor(kind: BitmapErrorKind, message: string) {
    super(message)
    this.name = 'BitmapDecodeError'
    this.kind = kind
  }
}

export function isBitmapDecodeError(err: unknown): err is BitmapDecodeError {
  return err instanceof BitmapDecodeError
}
