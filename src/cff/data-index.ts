// CFF INDEX: a counted array of variable-length objects
// https://adobe-type-tools.github.io/font-tech-notes/pdfs/5176.CFF.pdf (section 5)

import { Reader } from '../shared/reader'

export class DataIndex {
  private constructor(
    private readonly data: Uint8Array,
    private readonly offsets: number[],
    // Byte position just past the INDEX in the enclosing buffer
    readonly end: number
  ) {}

  /** Parse the INDEX at `offset` inside `data`; null when it overruns */
  static parse(data: Uint8Array, offset: number): DataIndex | null {
    const buf = new Reader(data)
    if (!buf.seek(offset)) return null

    const count = buf.readU16()
    if (count === null) return null
    if (count === 0) return new DataIndex(new Uint8Array(0), [], offset + 2)

    const offSize = buf.readU8()
    if (offSize === null || offSize < 1 || offSize > 4) return null

    const offsets: number[] = []
    for (let i = 0; i <= count; i++) {
      let value = 0
      for (let j = 0; j < offSize; j++) {
        const byte = buf.readU8()
        if (byte === null) return null
        value = value * 256 + byte
      }
      // Offsets are 1-based from the byte preceding the object data
      if (value < 1 || (i > 0 && value < offsets[i - 1] + 1)) return null
      offsets.push(value - 1)
    }

    const dataSize = offsets[count]
    const objects = buf.readBytes(dataSize)
    if (!objects) return null

    return new DataIndex(objects, offsets, buf.offset)
  }

  get count(): number {
    return Math.max(0, this.offsets.length - 1)
  }

  get(index: number): Uint8Array | null {
    if (index < 0 || index >= this.count) return null
    return this.data.subarray(this.offsets[index], this.offsets[index + 1])
  }
}
