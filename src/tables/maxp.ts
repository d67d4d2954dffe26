// 'maxp' table: glyph count and memory profile

import type { ByteReader } from '../sfnt/byte-reader'
import type { TableRecord } from '../sfnt/directory'

export const MAXP_VERSION_1 = 0x00010000

// Version 1.0 profile, TrueType outlines only
export interface MaxpProfile {
  maxPoints: number
  maxContours: number
  maxCompositePoints: number
  maxCompositeContours: number
  maxZones: number
  maxTwilightPoints: number
  maxStorage: number
  maxFunctionDefs: number
  maxInstructionDefs: number
  maxStackElements: number
  maxSizeOfInstructions: number
  maxComponentElements: number
  maxComponentDepth: number
}

export interface MaxpTable {
  kind: 'maxp'
  version: number
  numGlyphs: number
  profile?: MaxpProfile
}

export function decodeMaxp(reader: ByteReader, record: TableRecord): MaxpTable {
  const start = record.offset
  const version = reader.u32(start)
  const numGlyphs = reader.u16(start + 4)

  if (version !== MAXP_VERSION_1) {
    return { kind: 'maxp', version, numGlyphs }
  }

  const profile: MaxpProfile = {
    maxPoints: reader.u16(start + 6),
    maxContours: reader.u16(start + 8),
    maxCompositePoints: reader.u16(start + 10),
    maxCompositeContours: reader.u16(start + 12),
    maxZones: reader.u16(start + 14),
    maxTwilightPoints: reader.u16(start + 16),
    maxStorage: reader.u16(start + 18),
    maxFunctionDefs: reader.u16(start + 20),
    maxInstructionDefs: reader.u16(start + 22),
    maxStackElements: reader.u16(start + 24),
    maxSizeOfInstructions: reader.u16(start + 26),
    maxComponentElements: reader.u16(start + 28),
    maxComponentDepth: reader.u16(start + 30),
  }

  return { kind: 'maxp', version, numGlyphs, profile }
}
