// 'cmap' table: character codes to glyph indices
// Decodes Windows Unicode subtables in format 4 (BMP segments) and
// format 12 (full-range groups)

import type { ByteReader } from '../sfnt/byte-reader'
import type { TableRecord } from '../sfnt/directory'
import { type DecodeContext, reportIssue } from '../sfnt/context'
import { MalformedCmapError, UnsupportedFontError } from '../shared/errors'

const PLATFORM_WINDOWS = 3
// Symbol, Unicode BMP, Unicode full repertoire
const WINDOWS_UNICODE_ENCODINGS: readonly number[] = [0, 1, 10]

const ENCODING_RECORD_SIZE = 8
const FORMAT4_HEADER_SIZE = 14
const FORMAT12_HEADER_SIZE = 16
const GROUP_SIZE = 12
const MAX_CODE_POINT = 0x10ffff

export interface CmapEncodingRecord {
  platformID: number
  encodingID: number
  offset: number // relative to the cmap table
}

export interface CmapSegment {
  startCode: number
  endCode: number
  idDelta: number
  idRangeOffset: number
}

export interface CmapFormat4 {
  format: 4
  length: number
  language: number
  segCount: number
  searchRange: number
  entrySelector: number
  rangeShift: number
  segments: CmapSegment[]
}

export interface CmapGroup {
  startCharCode: number
  endCharCode: number
  startGlyphId: number
}

export interface CmapFormat12 {
  format: 12
  length: number
  language: number
  groups: CmapGroup[]
}

export type CmapSubtable = CmapFormat4 | CmapFormat12

export interface CmapTable {
  kind: 'cmap'
  version: number
  encodingRecords: CmapEncodingRecord[]
  subtables: CmapSubtable[]
  // glyph index -> character code; a glyph reached by several codes keeps
  // the last one decoded
  characterMap: Map<number, number>
  // character code -> glyph index
  glyphIndexMap: Map<number, number>
}

// Sink for every resolved (glyph, code) pair
interface Mapping {
  characterMap: Map<number, number>
  glyphIndexMap: Map<number, number>
}

function record(mapping: Mapping, glyphId: number, code: number): void {
  mapping.characterMap.set(glyphId, code)
  mapping.glyphIndexMap.set(code, glyphId)
}

export function isUnicodeEncoding(rec: CmapEncodingRecord): boolean {
  return (
    rec.platformID === PLATFORM_WINDOWS &&
    WINDOWS_UNICODE_ENCODINGS.includes(rec.encodingID)
  )
}

export function decodeCmap(
  reader: ByteReader,
  tableRecord: TableRecord,
  ctx: DecodeContext
): CmapTable {
  const start = tableRecord.offset
  const version = reader.u16(start)
  const numTables = reader.u16(start + 2)

  const encodingRecords: CmapEncodingRecord[] = []
  for (let i = 0; i < numTables; i++) {
    const pos = start + 4 + i * ENCODING_RECORD_SIZE
    encodingRecords.push({
      platformID: reader.u16(pos),
      encodingID: reader.u16(pos + 2),
      offset: reader.u32(pos + 4),
    })
  }

  const mapping: Mapping = {
    characterMap: new Map(),
    glyphIndexMap: new Map(),
  }
  const subtables: CmapSubtable[] = []
  const skippedFormats: number[] = []
  // Several encoding records may share one subtable
  const visited = new Set<number>()

  for (const rec of encodingRecords) {
    if (!isUnicodeEncoding(rec) || visited.has(rec.offset)) continue
    visited.add(rec.offset)

    const offset = start + rec.offset
    const format = reader.u16(offset)

    try {
      if (format === 4) {
        subtables.push(decodeFormat4(reader, offset, mapping))
      } else if (format === 12) {
        subtables.push(decodeFormat12(reader, offset, mapping))
      } else {
        skippedFormats.push(format)
      }
    } catch (err) {
      // Confined to this subtable; bounds errors still abort the decode
      if (!(err instanceof MalformedCmapError)) throw err
      reportIssue(ctx, err)
    }
  }

  if (subtables.length === 0) {
    let detail = 'no Windows Unicode encoding record'
    if (skippedFormats.length > 0) {
      detail = `unsupported subtable formats ${skippedFormats.join(', ')}`
    } else if (visited.size > 0) {
      detail = 'every Windows Unicode subtable is malformed'
    }
    reportIssue(ctx, new UnsupportedFontError(`No usable cmap subtable: ${detail}`))
  }

  return {
    kind: 'cmap',
    version,
    encodingRecords,
    subtables,
    characterMap: mapping.characterMap,
    glyphIndexMap: mapping.glyphIndexMap,
  }
}

// Format 4 layout after the format field: length, language, segCountX2,
// searchRange, entrySelector, rangeShift, endCode[], reservedPad,
// startCode[], idDelta[], idRangeOffset[], glyphIdArray[]
function decodeFormat4(reader: ByteReader, start: number, mapping: Mapping): CmapFormat4 {
  const length = reader.u16(start + 2)
  const language = reader.u16(start + 4)
  const segCount = reader.u16(start + 6) >> 1
  const searchRange = reader.u16(start + 8)
  const entrySelector = reader.u16(start + 10)
  const rangeShift = reader.u16(start + 12)

  const endCodeStart = start + FORMAT4_HEADER_SIZE
  const reservedPadOffset = endCodeStart + segCount * 2
  const startCodeStart = reservedPadOffset + 2
  const idDeltaStart = startCodeStart + segCount * 2
  const idRangeOffsetStart = idDeltaStart + segCount * 2
  reader.ensure(endCodeStart, segCount * 8 + 2)

  const lastEndCode = segCount > 0 ? reader.u16(reservedPadOffset - 2) : 0
  const reservedPad = reader.u16(reservedPadOffset)
  if (reservedPad !== 0 && lastEndCode !== 0xffff) {
    throw new MalformedCmapError(
      `Format 4 reservedPad is ${reservedPad} and last endCode is 0x${lastEndCode.toString(16)}`
    )
  }

  const segments: CmapSegment[] = []
  for (let i = 0; i < segCount; i++) {
    const segment: CmapSegment = {
      endCode: reader.u16(endCodeStart + i * 2),
      startCode: reader.u16(startCodeStart + i * 2),
      idDelta: reader.s16(idDeltaStart + i * 2),
      idRangeOffset: reader.u16(idRangeOffsetStart + i * 2),
    }
    segments.push(segment)

    // idRangeOffset counts bytes from its own storage address
    const rangeOffsetAddress = idRangeOffsetStart + i * 2
    const { startCode, endCode, idDelta, idRangeOffset } = segment

    for (let code = startCode; code <= endCode; code++) {
      let glyphId: number
      if (idRangeOffset === 0) {
        glyphId = (code + idDelta) & 0xffff
      } else {
        glyphId = reader.u16(rangeOffsetAddress + idRangeOffset + 2 * (code - startCode))
      }
      record(mapping, glyphId, code)
    }
  }

  return {
    format: 4,
    length,
    language,
    segCount,
    searchRange,
    entrySelector,
    rangeShift,
    segments,
  }
}

// Format 12 layout: format, reserved, length (u32), language (u32),
// numGroups (u32), then (startCharCode, endCharCode, startGlyphId) groups
function decodeFormat12(reader: ByteReader, start: number, mapping: Mapping): CmapFormat12 {
  const length = reader.u32(start + 4)
  const language = reader.u32(start + 8)
  const numGroups = reader.u32(start + 12)

  const groupsStart = start + FORMAT12_HEADER_SIZE
  reader.ensure(groupsStart, numGroups * GROUP_SIZE)

  const groups: CmapGroup[] = []
  for (let i = 0; i < numGroups; i++) {
    const pos = groupsStart + i * GROUP_SIZE
    const group: CmapGroup = {
      startCharCode: reader.u32(pos),
      endCharCode: reader.u32(pos + 4),
      startGlyphId: reader.u32(pos + 8),
    }
    if (group.startCharCode > group.endCharCode || group.endCharCode > MAX_CODE_POINT) {
      throw new MalformedCmapError(
        `Format 12 group ${i} spans 0x${group.startCharCode.toString(16)}..0x${group.endCharCode.toString(16)}`
      )
    }
    groups.push(group)

    let glyphId = group.startGlyphId
    for (let code = group.startCharCode; code <= group.endCharCode; code++) {
      record(mapping, glyphId, code)
      glyphId++
    }
  }

  return { format: 12, length, language, groups }
}
