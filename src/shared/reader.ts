// Big-endian binary reader with bounds checking
// Reads past the end return null and leave the position unchanged

export class Reader {
  private u8: Uint8Array
  private pos: number = 0

  constructor(data: Uint8Array, offset: number = 0, length?: number) {
    const len = length ?? data.byteLength - offset
    this.u8 = data.subarray(offset, offset + len)
  }

  get offset(): number {
    return this.pos
  }

  get length(): number {
    return this.u8.byteLength
  }

  get remaining(): number {
    return this.u8.byteLength - this.pos
  }

  get atEnd(): boolean {
    return this.pos >= this.u8.byteLength
  }

  skip(n: number): boolean {
    if (this.pos + n > this.u8.byteLength || this.pos + n < this.pos) {
      return false
    }
    this.pos += n
    return true
  }

  seek(offset: number): boolean {
    if (offset > this.u8.byteLength || offset < 0) {
      return false
    }
    this.pos = offset
    return true
  }

  readU8(): number | null {
    if (this.pos + 1 > this.u8.byteLength) return null
    return this.u8[this.pos++]
  }

  readI8(): number | null {
    if (this.pos + 1 > this.u8.byteLength) return null
    const val = this.u8[this.pos++]
    return (val & 0x80) !== 0 ? val - 0x100 : val
  }

  readU16(): number | null {
    if (this.pos + 2 > this.u8.byteLength) return null
    const idx = this.pos
    this.pos = idx + 2
    return (this.u8[idx] << 8) | this.u8[idx + 1]
  }

  readS16(): number | null {
    if (this.pos + 2 > this.u8.byteLength) return null
    const idx = this.pos
    this.pos = idx + 2
    const val = (this.u8[idx] << 8) | this.u8[idx + 1]
    return (val & 0x8000) !== 0 ? val - 0x10000 : val
  }

  readU32(): number | null {
    if (this.pos + 4 > this.u8.byteLength) return null
    const idx = this.pos
    this.pos = idx + 4
    return (
      (this.u8[idx] * 0x1000000 +
        ((this.u8[idx + 1] << 16) | (this.u8[idx + 2] << 8) | this.u8[idx + 3])) >>>
      0
    )
  }

  readS32(): number | null {
    if (this.pos + 4 > this.u8.byteLength) return null
    const idx = this.pos
    this.pos = idx + 4
    return (
      (this.u8[idx] << 24) |
      (this.u8[idx + 1] << 16) |
      (this.u8[idx + 2] << 8) |
      this.u8[idx + 3]
    )
  }

  // 2.14 signed fixed point, as a float
  readF2Dot14(): number | null {
    const raw = this.readS16()
    return raw === null ? null : raw / 16384
  }

  // 16.16 signed fixed point, as a float
  readFixed(): number | null {
    const raw = this.readS32()
    return raw === null ? null : raw / 65536
  }

  readBytes(n: number): Uint8Array | null {
    if (this.pos + n > this.u8.byteLength || n < 0) return null
    const result = this.u8.subarray(this.pos, this.pos + n)
    this.pos += n
    return result
  }
}

// Random-access reads for tables indexed by glyph id
export function readS16At(data: Uint8Array, offset: number): number | null {
  if (offset < 0 || offset + 2 > data.byteLength) return null
  const val = (data[offset] << 8) | data[offset + 1]
  return (val & 0x8000) !== 0 ? val - 0x10000 : val
}

export function readU16At(data: Uint8Array, offset: number): number | null {
  if (offset < 0 || offset + 2 > data.byteLength) return null
  return (data[offset] << 8) | data[offset + 1]
}

export function readU32At(data: Uint8Array, offset: number): number | null {
  if (offset < 0 || offset + 4 > data.byteLength) return null
  return (
    (data[offset] * 0x1000000 +
      ((data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3])) >>>
    0
  )
}
