// sfnt table tags and container signatures

export const TAG_CMAP = 'cmap'
export const TAG_GLYF = 'glyf'
export const TAG_HEAD = 'head'
export const TAG_KERN = 'kern'
export const TAG_LOCA = 'loca'
export const TAG_MAXP = 'maxp'

// Tables without which no font object is usable
export const REQUIRED_TAGS: readonly string[] = [
  TAG_HEAD,
  TAG_MAXP,
  TAG_CMAP,
  TAG_LOCA,
  TAG_GLYF,
] as const

// Container signatures
export const SFNT_TTF = 0x00010000
export const TTC_FLAVOR = 0x74746366 // 'ttcf'
export const WOFF_SIGNATURE = 0x774f4646 // 'wOFF'
export const WOFF2_SIGNATURE = 0x774f4632 // 'wOF2'

// head.magicNumber
export const HEAD_MAGIC = 0x5f0f3cf5
