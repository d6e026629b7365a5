import { describe, it, expect } from 'vitest'
import { BYTES_PER_ELEMENT, decodeVector, encodeVector } from '../src/memory/vector-codec.js'

describe('vector codec', () => {
  it('writes little-endian float32 elements', () => {
    const buffer = encodeVector([1, -2.5, 0.25])

    expect(buffer.byteLength).toBe(3 * BYTES_PER_ELEMENT)
    expect(buffer.readFloatLE(0)).toBe(1)
    expect(buffer.readFloatLE(4)).toBe(-2.5)
    expect([...buffer.subarray(0, 4)]).toEqual([0x00, 0x00, 0x80, 0x3f])
  })

  it('decodes what it encodes', () => {
    expect(decodeVector(encodeVector([1, -2.5, 0.25, 0]))).toEqual([1, -2.5, 0.25, 0])
  })

  it('decodes a view that starts inside a larger buffer', () => {
    const padded = Buffer.concat([Buffer.from([0xff]), encodeVector([0.5, 2])])

    expect(decodeVector(padded.subarray(1))).toEqual([0.5, 2])
  })

  it('rejects empty, truncated and non-finite blobs', () => {
    expect(decodeVector(Buffer.alloc(0))).toBeNull()
    expect(decodeVector(Buffer.alloc(6))).toBeNull()
    expect(decodeVector(encodeVector([1, Number.NaN]))).toBeNull()
    expect(decodeVector(encodeVector([Number.POSITIVE_INFINITY]))).toBeNull()
  })
})
