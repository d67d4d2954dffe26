// Font loading
export { parseFont, loadFont, type Font, type DecodedTables } from './sfnt/font'
export type { ParseOptions, Logger } from './sfnt/context'
export {
  getGlyphIdForCode,
  getCodeForGlyphId,
  getGlyphForCode,
  getKerningValue,
  splitContours,
} from './sfnt/lookup'

// Low-level decoders
export { ByteReader } from './sfnt/byte-reader'
export { readTableDirectory, type TableDirectory, type TableRecord } from './sfnt/directory'
export { decodeHead, type HeadTable } from './tables/head'
export { decodeMaxp, type MaxpTable, type MaxpProfile } from './tables/maxp'
export {
  decodeKern,
  decodeCoverage,
  mergeKerning,
  KerningPairMap,
  type KernTable,
  type KerningSubtable,
  type KerningPair,
  type CoverageFlags,
} from './tables/kern'
export {
  decodeCmap,
  type CmapTable,
  type CmapSubtable,
  type CmapFormat4,
  type CmapFormat12,
  type CmapEncodingRecord,
} from './tables/cmap'
export {
  decodeLoca,
  decodeGlyf,
  decodeGlyph,
  glyphOffset,
  type LocaTable,
  type GlyfTable,
  type Glyph,
  type SimpleGlyph,
  type CompositeGlyph,
  type EmptyGlyph,
  type ContourData,
  type ContourPoint,
  type BoundingBox,
} from './tables/glyf'

// WOFF
export { isWoff, unwrapWoff } from './woff/unwrap'

// Errors
export * from './shared/errors'
