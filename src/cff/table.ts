// Compact Font Format (CFF version 1) glyph outlines
// https://learn.microsoft.com/en-us/typography/opentype/spec/cff

import { Reader } from '../shared/reader'
import { PathSink } from '../shared/path-sink'
import type { OutlineBuilder, Rect } from '../types'
import { interpretCharstring } from './charstring'
import { DataIndex } from './data-index'
import {
  OP_CHARSTRINGS,
  OP_CHARSTRING_TYPE,
  OP_FD_ARRAY,
  OP_FD_SELECT,
  OP_PRIVATE,
  OP_ROS,
  OP_SUBRS,
  dictNumber,
  parseDict,
} from './dict'

/** Maps a glyph to its font dict in a CID-keyed font */
type FdSelect = (glyphId: number) => number | null

export class CompactFontTable {
  private constructor(
    private readonly charStrings: DataIndex,
    private readonly globalSubrs: DataIndex,
    // One entry per font dict; a single entry for name-keyed fonts
    private readonly localSubrs: (DataIndex | null)[],
    private readonly fdSelect: FdSelect | null
  ) {}

  /**
   * Parse the first font of a CFF table. Returns null when the table is not
   * a usable CFF version 1 font with Type 2 charstrings.
   */
  static parse(data: Uint8Array, numGlyphs: number): CompactFontTable | null {
    const header = new Reader(data)
    const major = header.readU8()
    header.skip(1) // minor
    const headerSize = header.readU8()
    if (major !== 1 || headerSize === null) return null

    const names = DataIndex.parse(data, headerSize)
    const topDicts = names && DataIndex.parse(data, names.end)
    const strings = topDicts && DataIndex.parse(data, topDicts.end)
    const globalSubrs = strings && DataIndex.parse(data, strings.end)
    if (!topDicts || !globalSubrs) return null

    const topDictData = topDicts.get(0)
    const topDict = topDictData && parseDict(topDictData)
    if (!topDict) return null

    const charstringType = dictNumber(topDict, OP_CHARSTRING_TYPE) ?? 2
    const charStringsOffset = dictNumber(topDict, OP_CHARSTRINGS)
    if (charstringType !== 2 || charStringsOffset === null) return null

    const charStrings = DataIndex.parse(data, charStringsOffset)
    if (!charStrings) return null

    if (!topDict.has(OP_ROS)) {
      const localSubrs = parsePrivateSubrs(data, topDict.get(OP_PRIVATE))
      return new CompactFontTable(charStrings, globalSubrs, [localSubrs], null)
    }

    // CID-keyed: each font dict carries its own private dict
    const fdArrayOffset = dictNumber(topDict, OP_FD_ARRAY)
    const fdSelectOffset = dictNumber(topDict, OP_FD_SELECT)
    if (fdArrayOffset === null || fdSelectOffset === null) return null

    const fdArray = DataIndex.parse(data, fdArrayOffset)
    const fdSelect = parseFdSelect(data, fdSelectOffset, numGlyphs)
    if (!fdArray || !fdSelect) return null

    const localSubrs: (DataIndex | null)[] = []
    for (let i = 0; i < fdArray.count; i++) {
      const fontDictData = fdArray.get(i)
      const fontDict = fontDictData && parseDict(fontDictData)
      localSubrs.push(fontDict ? parsePrivateSubrs(data, fontDict.get(OP_PRIVATE)) : null)
    }

    return new CompactFontTable(charStrings, globalSubrs, localSubrs, fdSelect)
  }

  get numberOfCharStrings(): number {
    return this.charStrings.count
  }

  /**
   * Outline one glyph. Returns the bbox of everything emitted, or null for an
   * empty glyph. Malformed programs throw MalformedGlyphError after closing
   * whatever path they had opened, so the builder may hold a partial outline.
   */
  outline(glyphId: number, builder: OutlineBuilder): Rect | null {
    const charString = this.charStrings.get(glyphId)
    if (!charString) return null

    let localSubrs: DataIndex | null = this.localSubrs[0] ?? null
    if (this.fdSelect) {
      const fd = this.fdSelect(glyphId)
      localSubrs = fd === null ? null : this.localSubrs[fd] ?? null
    }

    const sink = new PathSink(builder)
    try {
      interpretCharstring({ glyphId, globalSubrs: this.globalSubrs, localSubrs }, charString, sink)
    } finally {
      sink.close()
    }
    return sink.finish()
  }
}

// Private DICT [size, offset] operands to its local subroutines
function parsePrivateSubrs(data: Uint8Array, operands: number[] | undefined): DataIndex | null {
  if (!operands || operands.length < 2) return null
  const [size, offset] = operands
  if (offset < 0 || size < 0 || offset + size > data.byteLength) return null

  const privateDict = parseDict(data.subarray(offset, offset + size))
  if (!privateDict) return null

  // Subrs offset is relative to the private dict
  const subrsOffset = dictNumber(privateDict, OP_SUBRS)
  if (subrsOffset === null) return null
  return DataIndex.parse(data, offset + subrsOffset)
}

function parseFdSelect(data: Uint8Array, offset: number, numGlyphs: number): FdSelect | null {
  const buf = new Reader(data)
  if (!buf.seek(offset)) return null

  const format = buf.readU8()
  if (format === 0) {
    const fds = buf.readBytes(numGlyphs)
    if (!fds) return null
    return (glyphId) => (glyphId < fds.length ? fds[glyphId] : null)
  }

  if (format === 3) {
    const nRanges = buf.readU16()
    if (nRanges === null) return null
    const firsts: number[] = []
    const fds: number[] = []
    for (let i = 0; i < nRanges; i++) {
      const first = buf.readU16()
      const fd = buf.readU8()
      if (first === null || fd === null) return null
      firsts.push(first)
      fds.push(fd)
    }
    const sentinel = buf.readU16()
    if (sentinel === null) return null

    return (glyphId) => {
      if (glyphId >= sentinel) return null
      for (let i = nRanges - 1; i >= 0; i--) {
        if (glyphId >= firsts[i]) return fds[i]
      }
      return null
    }
  }

  return null
}
