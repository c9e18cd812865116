// Custom bitmap to standard BMP

import { decodeCustomBitmap, isStandardBitmap, type CustomBitmapDecodeOptions } from './decode/decode'
import { encodeBmp } from './encode/bmp-writer'

export interface ConvertResult {
  // True when the input already was a standard bitmap and was passed through
  passthrough: boolean
  bmp: Uint8Array
}

export function convertToBmp(buffer: Uint8Array, options?: CustomBitmapDecodeOptions): ConvertResult {
  if (isStandardBitmap(buffer)) {
    return { passthrough: true, bmp: buffer }
  }
  const decoded = decodeCustomBitmap(buffer, options)
  return { passthrough: false, bmp: encodeBmp(decoded) }
}
