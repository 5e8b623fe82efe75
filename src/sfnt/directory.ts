// sfnt table directory and font collection header
// https://learn.microsoft.com/en-us/typography/opentype/spec/otff

import { Reader } from '../shared/reader'
import { FontIndexOutOfBoundsError, MalformedFontError } from '../shared/errors'
import {
  SFNT_APPLE,
  SFNT_CFF,
  SFNT_TTF,
  TTC_TAG,
  tagToString,
} from '../shared/known-tags'
import type { Logger } from '../types'

const SFNT_HEADER_SIZE = 12
const SFNT_ENTRY_SIZE = 16
const TTC_HEADER_SIZE = 12

export interface TableRecord {
  tag: number
  checksum: number
  offset: number
  length: number
}

export interface TableDirectory {
  flavor: number
  tables: Map<number, TableRecord>
  // The whole file; record offsets are relative to it even inside a collection
  data: Uint8Array
}

// Number of fonts in a 'ttcf' collection, or null for anything else
export function fontsInCollection(data: Uint8Array): number | null {
  const buf = new Reader(data)
  if (buf.readU32() !== TTC_TAG) return null
  if (!buf.skip(4)) return null // majorVersion, minorVersion
  return buf.readU32()
}

// Locate the offset table of the selected font
function resolveFontOffset(data: Uint8Array, index: number): number {
  const numFonts = fontsInCollection(data)

  if (numFonts === null) {
    if (data.byteLength >= 4 && new Reader(data).readU32() === TTC_TAG) {
      throw new MalformedFontError('Font collection header truncated')
    }
    if (index !== 0) {
      throw new FontIndexOutOfBoundsError(index, 1)
    }
    return 0
  }

  if (index < 0 || index >= numFonts) {
    throw new FontIndexOutOfBoundsError(index, numFonts)
  }

  const buf = new Reader(data)
  if (!buf.seek(TTC_HEADER_SIZE + 4 * index)) {
    throw new MalformedFontError('Font collection offset table truncated')
  }
  const fontOffset = buf.readU32()
  if (fontOffset === null) {
    throw new MalformedFontError('Font collection offset table truncated')
  }
  return fontOffset
}

// Parse the directory of font `index` (0 for a single font)
export function parseDirectory(data: Uint8Array, index: number, logger: Logger): TableDirectory {
  const fontOffset = resolveFontOffset(data, index)

  if (fontOffset + SFNT_HEADER_SIZE > data.byteLength) {
    throw new MalformedFontError('Buffer too small for sfnt header')
  }

  const buf = new Reader(data, fontOffset)
  const flavor = buf.readU32() ?? 0

  if (flavor !== SFNT_TTF && flavor !== SFNT_CFF && flavor !== SFNT_APPLE) {
    throw new MalformedFontError(`Unknown sfnt signature: 0x${flavor.toString(16)}`)
  }

  const numTables = buf.readU16() ?? 0
  buf.skip(6) // searchRange, entrySelector, rangeShift

  if (fontOffset + SFNT_HEADER_SIZE + numTables * SFNT_ENTRY_SIZE > data.byteLength) {
    throw new MalformedFontError('Table directory truncated')
  }

  const tables = new Map<number, TableRecord>()

  for (let i = 0; i < numTables; i++) {
    const tag = buf.readU32() ?? 0
    const checksum = buf.readU32() ?? 0
    const offset = buf.readU32() ?? 0
    const length = buf.readU32() ?? 0

    if (offset + length > data.byteLength) {
      throw new MalformedFontError(
        `Table '${tagToString(tag)}' (offset ${offset}, length ${length}) overflows the ${data.byteLength} byte buffer`
      )
    }

    // First occurrence wins
    if (tables.has(tag)) {
      logger.warn(`Duplicate '${tagToString(tag)}' table record ignored`)
      continue
    }

    tables.set(tag, { tag, checksum, offset, length })
  }

  return { flavor, tables, data }
}

// Get table data as Uint8Array slice (zero-copy)
export function getTableData(dir: TableDirectory, tag: number): Uint8Array | null {
  const entry = dir.tables.get(tag)
  if (!entry) return null
  return dir.data.subarray(entry.offset, entry.offset + entry.length)
}
