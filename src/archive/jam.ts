// JAM asset archives
//
// Layout (all integers little-endian):
//   "LJAM"
//   folder:
//     u32 fileCount
//     fileCount x { name[12], u32 offset, u32 size }
//     u32 folderCount
//     folderCount x { name[12], u32 offset }   offset points at another folder
//
// Names are NUL padded. File offsets are absolute.

import { ByteInput } from '../decode/streams'
import { BitmapDecodeError } from '../decode/errors'

export const JAM_MAGIC = 'LJAM'
const NAME_SIZE = 12

export interface JamFile {
  path: string
  data: Uint8Array
}

export interface JamArchive {
  // Every folder, parents before children, paths joined with '/'
  folders: string[]
  files: JamFile[]
}

export function isJamArchive(buffer: Uint8Array): boolean {
  if (buffer.length < 4) return false
  for (let i = 0; i < 4; i++) {
    if (buffer[i] !== JAM_MAGIC.charCodeAt(i)) return false
  }
  return true
}

export function readJamArchive(buffer: Uint8Array): JamArchive {
  if (!isJamArchive(buffer)) {
    throw new BitmapDecodeError('InvalidArchive', `Archive does not start with ${JAM_MAGIC}`)
  }
  const archive: JamArchive = { folders: [], files: [] }
  const input = new ByteInput(buffer, 4)
  readFolder(input, '', new Set([4]), archive)
  return archive
}

function readFolder(input: ByteInput, prefix: string, visiting: Set<number>, archive: JamArchive): void {
  const fileCount = input.readU32('file count')
  for (let i = 0; i < fileCount; i++) {
    const name = readName(input)
    const offset = input.readU32('file offset')
    const size = input.readU32('file size')
    if (offset + size > input.buffer.length) {
      throw new BitmapDecodeError(
        'TruncatedStream',
        `File ${prefix}${name} spans ${offset}..${offset + size}, archive has ${input.buffer.length} bytes`
      )
    }
    archive.files.push({ path: prefix + name, data: input.buffer.subarray(offset, offset + size) })
  }

  const folderCount = input.readU32('folder count')
  for (let i = 0; i < folderCount; i++) {
    const name = readName(input)
    const offset = input.readU32('folder offset')
    if (visiting.has(offset)) {
      throw new BitmapDecodeError('InvalidArchive', `Folder ${prefix}${name} refers back to its parent`)
    }
    const path = prefix + name
    archive.folders.push(path)

    const resume = input.pos
    visiting.add(offset)
    input.seek(offset)
    readFolder(input, path + '/', visiting, archive)
    visiting.delete(offset)
    input.seek(resume)
  }
}

function readName(input: ByteInput): string {
  const raw = input.readBytes(NAME_SIZE, 'entry name')
  let end = raw.indexOf(0)
  if (end < 0) end = NAME_SIZE
  let name = ''
  for (let i = 0; i < end; i++) {
    name += String.fromCharCode(raw[i])
  }
  if (name === '' || name === '.' || name === '..' || /[/\\]/.test(name)) {
    throw new BitmapDecodeError('InvalidArchive', `Invalid entry name "${name}"`)
  }
  return name
}
