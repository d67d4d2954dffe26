// Font entry points: decode from buffer or from path

import { readFile } from 'node:fs/promises'
import { ByteReader } from './byte-reader'
import { createContext, reportIssue, type DecodeContext, type ParseOptions } from './context'
import { readTableDirectory, type TableDirectory, type TableRecord } from './directory'
import { tableChecksum } from '../shared/checksum'
import { ChecksumMismatchError, InvalidSignatureError, MissingTableError } from '../shared/errors'
import {
  REQUIRED_TAGS,
  TAG_CMAP,
  TAG_GLYF,
  TAG_HEAD,
  TAG_KERN,
  TAG_LOCA,
  TAG_MAXP,
  TTC_FLAVOR,
} from '../shared/known-tags'
import { decodeCmap, type CmapTable } from '../tables/cmap'
import { decodeGlyf, decodeLoca, type GlyfTable, type Glyph, type LocaTable } from '../tables/glyf'
import { decodeHead, type HeadTable } from '../tables/head'
import { decodeKern, mergeKerning, type KernTable, type KerningPairMap } from '../tables/kern'
import { decodeMaxp, type MaxpTable } from '../tables/maxp'
import { isWoff, unwrapWoff } from '../woff/unwrap'
import type { FontDecodeError } from '../shared/errors'

export interface DecodedTables {
  head: HeadTable
  maxp: MaxpTable
  cmap: CmapTable
  loca: LocaTable
  glyf: GlyfTable
  kern?: KernTable
}

export interface Font {
  directory: TableDirectory
  records: Map<string, TableRecord>
  tables: DecodedTables
  numGlyphs: number
  // numGlyphs + 1 entries, indexed by glyph id
  glyphs: Glyph[]
  // glyph index -> character code
  characterMap: Map<number, number>
  // character code -> glyph index
  glyphIndexMap: Map<number, number>
  // Merged horizontal kerning, present when the font has a kern table
  kerning?: KerningPairMap
  // Recoverable errors met while decoding
  issues: FontDecodeError[]
}

function requireRecord(ctx: DecodeContext, tag: string): TableRecord {
  const record = ctx.records.get(tag)
  if (!record) {
    throw new MissingTableError(tag)
  }
  return record
}

function verifyChecksums(ctx: DecodeContext): void {
  for (const record of ctx.records.values()) {
    const actual = tableChecksum(ctx.reader, record)
    if (actual !== record.checksum) {
      reportIssue(ctx, new ChecksumMismatchError(record.tag, record.checksum, actual))
    }
  }
}

/**
 * Decode an sfnt (TrueType) or WOFF font already held in memory.
 *
 * Structural errors (truncated data, missing required tables) throw.
 * Errors confined to one kern or cmap subtable are collected in
 * `issues`, or thrown when `strict` is set.
 */
export function parseFont(data: ArrayBuffer | Uint8Array, options?: ParseOptions): Font {
  let input = data instanceof Uint8Array ? data : new Uint8Array(data)
  if (isWoff(input)) {
    input = unwrapWoff(input)
  }

  const reader = new ByteReader(input)
  const { directory, records } = readTableDirectory(reader)
  if (directory.sfntVersion === TTC_FLAVOR) {
    throw new InvalidSignatureError('Font collections are not supported')
  }

  const ctx = createContext(reader, records, options)

  for (const tag of REQUIRED_TAGS) {
    requireRecord(ctx, tag)
  }

  if (ctx.verifyChecksums) {
    verifyChecksums(ctx)
  }

  // head supplies indexToLocFormat and maxp the glyph count for loca/glyf
  const head = decodeHead(reader, requireRecord(ctx, TAG_HEAD))
  const maxp = decodeMaxp(reader, requireRecord(ctx, TAG_MAXP))

  const kernRecord = records.get(TAG_KERN)
  const kern = kernRecord ? decodeKern(reader, kernRecord, ctx) : undefined

  const cmap = decodeCmap(reader, requireRecord(ctx, TAG_CMAP), ctx)

  const loca = decodeLoca(reader, requireRecord(ctx, TAG_LOCA), head.indexToLocFormat, maxp.numGlyphs)
  const glyf = decodeGlyf(reader, requireRecord(ctx, TAG_GLYF), loca, maxp.numGlyphs)

  return {
    directory,
    records,
    tables: { head, maxp, cmap, loca, glyf, kern },
    numGlyphs: maxp.numGlyphs,
    glyphs: glyf.glyphs,
    characterMap: cmap.characterMap,
    glyphIndexMap: cmap.glyphIndexMap,
    kerning: kern ? mergeKerning(kern) : undefined,
    issues: ctx.issues,
  }
}

/**
 * Read a font file and decode it.
 */
export async function loadFont(path: string, options?: ParseOptions): Promise<Font> {
  const data = await readFile(path)
  return parseFont(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), options)
}
