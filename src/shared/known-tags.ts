// Table tags and sfnt signatures

export const TAG_HEAD = 0x68656164 // 'head'
export const TAG_HHEA = 0x68686561 // 'hhea'
export const TAG_MAXP = 0x6d617870 // 'maxp'
export const TAG_HMTX = 0x686d7478 // 'hmtx'
export const TAG_OS2 = 0x4f532f32 // 'OS/2'
export const TAG_GLYF = 0x676c7966 // 'glyf'
export const TAG_LOCA = 0x6c6f6361 // 'loca'
export const TAG_CFF = 0x43464620 // 'CFF '
export const TAG_FVAR = 0x66766172 // 'fvar'
export const TAG_AVAR = 0x61766172 // 'avar'
export const TAG_GVAR = 0x67766172 // 'gvar'
export const TAG_HVAR = 0x48564152 // 'HVAR'
export const TAG_VHEA = 0x76686561 // 'vhea'
export const TAG_VMTX = 0x766d7478 // 'vmtx'
export const TAG_VVAR = 0x56564152 // 'VVAR'
export const TAG_MVAR = 0x4d564152 // 'MVAR'
export const TAG_POST = 0x706f7374 // 'post'

// Collection header tag
export const TTC_TAG = 0x74746366 // 'ttcf'

// sfnt versions
export const SFNT_TTF = 0x00010000
export const SFNT_CFF = 0x4f54544f // 'OTTO'
export const SFNT_APPLE = 0x74727565 // 'true'

// Convert 4-byte tag to string
export function tagToString(tag: number): string {
  return String.fromCharCode(
    (tag >> 24) & 0xff,
    (tag >> 16) & 0xff,
    (tag >> 8) & 0xff,
    tag & 0xff
  )
}

// Convert string to 4-byte tag, space-padded like the format requires
export function stringToTag(s: string): number {
  const padded = s.padEnd(4, ' ')
  return (
    (padded.charCodeAt(0) << 24) |
    (padded.charCodeAt(1) << 16) |
    (padded.charCodeAt(2) << 8) |
    padded.charCodeAt(3)
  ) >>> 0
}
