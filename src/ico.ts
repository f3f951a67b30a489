// ICO container: ICONDIR header (6 bytes), one ICONDIRENTRY (16 bytes) per frame, then PNG payloads
import { IcoFormatError } from './errors.js'

export type IcoFrame = { size: number; data: Buffer }
export type IcoEntry = IcoFrame & { offset: number; bitsPerPixel: number }

const HEADER_SIZE = 6
const ENTRY_SIZE = 16
const TYPE_ICON = 1

export function encodeIco(frames: IcoFrame[]): Buffer {
  if (frames.length === 0) throw new RangeError('icon container needs at least one frame')
  if (frames.length > 0xffff) throw new RangeError(`too many frames: ${frames.length}`)
  for (const f of frames) {
    if (!Number.isInteger(f.size) || f.size < 1 || f.size > 256) throw new RangeError(`frame size out of range: ${f.size}`)
  }

  const header = Buffer.alloc(HEADER_SIZE)
  header.writeUInt16LE(0, 0) // reserved
  header.writeUInt16LE(TYPE_ICON, 2)
  header.writeUInt16LE(frames.length, 4)

  let dataOffset = HEADER_SIZE + ENTRY_SIZE * frames.length
  const entries = frames.map((f) => {
    const entry = Buffer.alloc(ENTRY_SIZE)
    const dim = f.size >= 256 ? 0 : f.size // 0 means 256
    entry.writeUInt8(dim, 0)
    entry.writeUInt8(dim, 1)
    entry.writeUInt8(0, 2) // no palette
    entry.writeUInt8(0, 3)
    entry.writeUInt16LE(1, 4) // planes
    entry.writeUInt16LE(32, 6) // bits per pixel
    entry.writeUInt32LE(f.data.length, 8)
    entry.writeUInt32LE(dataOffset, 12)
    dataOffset += f.data.length
    return entry
  })

  return Buffer.concat([header, ...entries, ...frames.map((f) => f.data)])
}

export function decodeIcoDirectory(buf: Buffer): IcoEntry[] {
  if (buf.length < HEADER_SIZE) throw new IcoFormatError(`truncated header: ${buf.length} bytes`)
  const type = buf.readUInt16LE(2)
  if (buf.readUInt16LE(0) !== 0 || type !== TYPE_ICON) throw new IcoFormatError(`not an icon container (type ${type})`)
  const count = buf.readUInt16LE(4)
  if (buf.length < HEADER_SIZE + ENTRY_SIZE * count) throw new IcoFormatError(`truncated directory: ${count} entries`)

  const out: IcoEntry[] = []
  for (let i = 0; i < count; i++) {
    const at = HEADER_SIZE + i * ENTRY_SIZE
    const width = buf.readUInt8(at) || 256
    const length = buf.readUInt32LE(at + 8)
    const offset = buf.readUInt32LE(at + 12)
    if (offset + length > buf.length) throw new IcoFormatError(`entry ${i} points outside the file (offset ${offset}, ${length} bytes)`)
    out.push({ size: width, data: buf.subarray(offset, offset + length), offset, bitsPerPixel: buf.readUInt16LE(at + 6) })
  }
  return out
}
