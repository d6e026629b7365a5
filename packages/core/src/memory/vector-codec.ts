/**
 * Binary vector encoding shared by the embedding cache and the vec0 table.
 *
 * Layout: 4 × n bytes, element i at byte offset 4i, IEEE-754 binary32,
 * little-endian. This is the format sqlite-vec reads for `float[n]` columns.
 * Precision beyond float32 is not preserved.
 *
 * @module memory/vector-codec
 */

export const BYTES_PER_ELEMENT = 4

export function encodeVector(vector: readonly number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * BYTES_PER_ELEMENT)
  vector.forEach((value, i) => {
    buffer.writeFloatLE(value, i * BYTES_PER_ELEMENT)
  })
  return buffer
}

/**
 * Decode a stored blob. Returns null when the blob is not a valid vector
 * (empty, truncated, or containing NaN/Infinity).
 */
export function decodeVector(blob: Uint8Array): number[] | null {
  if (blob.byteLength === 0 || blob.byteLength % BYTES_PER_ELEMENT !== 0) {
    return null
  }

  const buffer = Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength)
  const vector: number[] = []
  for (let offset = 0; offset < buffer.byteLength; offset += BYTES_PER_ELEMENT) {
    const value = buffer.readFloatLE(offset)
    if (!Number.isFinite(value)) return null
    vector.push(value)
  }
  return vector
}
