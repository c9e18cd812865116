// Decode
export { decodeCustomBitmap, customBitmapDecodedSize, isStandardBitmap } from './decode/decode'
export type { CustomBitmapDecodeOptions, DecodedBitmap } from './decode/decode'
export { readCustomHeader } from './decode/header'
export type { BitsPerPixel, CustomBitmapHeader } from './decode/header'
export { ScanlineAssembler } from './decode/scanlines'
export { ScratchBuffer, SCRATCH_CAPACITY } from './decode/scratch'
export { ByteInput } from './decode/streams'
export { readNextChunk } from './decode/chunk-reader'
export type { ChunkDescriptor, ChunkInfo } from './decode/chunk-reader'
export { decompressChunk } from './decode/chunk'
export type { ChunkToken, ChunkTokenListener } from './decode/chunk'
export { BitmapDecodeError, isBitmapDecodeError } from './decode/errors'
export type { BitmapErrorKind } from './decode/errors'

// Encode
export { encodeBmp } from './encode/bmp-writer'
export type { BmpImage } from './encode/bmp-writer'
export { convertToBmp } from './convert'
export type { ConvertResult } from './convert'

// Archives
export { readJamArchive, isJamArchive } from './archive/jam'
export type { JamArchive, JamFile } from './archive/jam'
