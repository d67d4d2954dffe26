// 'head' table: global font metadata

import type { ByteReader } from '../sfnt/byte-reader'
import type { TableRecord } from '../sfnt/directory'

export const HEAD_TABLE_SIZE = 54

export interface HeadTable {
  kind: 'head'
  majorVersion: number
  minorVersion: number
  fontRevision: number
  checksumAdjustment: number
  magicNumber: number
  flags: number
  unitsPerEm: number
  created: Date
  modified: Date
  xMin: number
  yMin: number
  xMax: number
  yMax: number
  macStyle: number
  lowestRecPPEM: number
  fontDirectionHint: number
  indexToLocFormat: number // 0 = short (uint16 / 2), 1 = long (uint32)
  glyphDataFormat: number
}

export function decodeHead(reader: ByteReader, record: TableRecord): HeadTable {
  const start = record.offset
  reader.ensure(start, HEAD_TABLE_SIZE)

  return {
    kind: 'head',
    majorVersion: reader.u16(start),
    minorVersion: reader.u16(start + 2),
    fontRevision: reader.fixed(start + 4),
    checksumAdjustment: reader.u32(start + 8),
    magicNumber: reader.u32(start + 12),
    flags: reader.u16(start + 16),
    unitsPerEm: reader.u16(start + 18),
    created: reader.longDateTime(start + 20),
    modified: reader.longDateTime(start + 28),
    xMin: reader.s16(start + 36),
    yMin: reader.s16(start + 38),
    xMax: reader.s16(start + 40),
    yMax: reader.s16(start + 42),
    macStyle: reader.u16(start + 44),
    lowestRecPPEM: reader.u16(start + 46),
    fontDirectionHint: reader.s16(start + 48),
    indexToLocFormat: reader.s16(start + 50),
    glyphDataFormat: reader.s16(start + 52),
  }
}
