import { describe, it, expect } from 'vitest'
import { IcoFormatError } from '../src/errors.js'
import { decodeIcoDirectory, encodeIco } from '../src/ico.js'

const frames = [
  { size: 16, data: Buffer.from([1, 2, 3]) },
  { size: 256, data: Buffer.from([4, 5]) }
]

describe('encodeIco', () => {
  it('writes header, directory and payloads', () => {
    const buf = encodeIco(frames)
    expect(buf.length).toBe(6 + 2 * 16 + 5)
    expect([...buf.subarray(0, 6)]).toEqual([0, 0, 1, 0, 2, 0])
    expect([...buf.subarray(6, 22)]).toEqual([16, 16, 0, 0, 1, 0, 32, 0, 3, 0, 0, 0, 38, 0, 0, 0])
    expect([...buf.subarray(22, 38)]).toEqual([0, 0, 0, 0, 1, 0, 32, 0, 2, 0, 0, 0, 41, 0, 0, 0])
    expect([...buf.subarray(38)]).toEqual([1, 2, 3, 4, 5])
  })

  it('rejects empty and oversized frame lists', () => {
    expect(() => encodeIco([])).toThrow(RangeError)
    expect(() => encodeIco([{ size: 300, data: Buffer.alloc(1) }])).toThrow(RangeError)
    expect(() => encodeIco([{ size: 0, data: Buffer.alloc(1) }])).toThrow(RangeError)
  })
})

describe('decodeIcoDirectory', () => {
  it('reads back sizes, offsets and payloads', () => {
    const entries = decodeIcoDirectory(encodeIco(frames))
    expect(entries.map((e) => e.size)).toEqual([16, 256])
    expect(entries.map((e) => e.offset)).toEqual([38, 41])
    expect(entries.map((e) => e.bitsPerPixel)).toEqual([32, 32])
    expect([...(entries[1]?.data ?? [])]).toEqual([4, 5])
  })

  it('rejects a truncated header', () => {
    expect(() => decodeIcoDirectory(Buffer.alloc(4))).toThrow(IcoFormatError)
  })

  it('rejects cursor files', () => {
    const buf = encodeIco(frames)
    buf.writeUInt16LE(2, 2)
    expect(() => decodeIcoDirectory(buf)).toThrow(/not an icon container \(type 2\)/)
  })

  it('rejects a directory longer than the file', () => {
    const buf = encodeIco(frames).subarray(0, 20)
    expect(() => decodeIcoDirectory(buf)).toThrow(/truncated directory/)
  })

  it('rejects entries pointing past the end', () => {
    const buf = encodeIco(frames)
    buf.writeUInt32LE(1000, 22 + 12)
    expect(() => decodeIcoDirectory(buf)).toThrow(IcoFormatError)
  })
})
