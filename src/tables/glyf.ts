// 'loca' + 'glyf' tables: glyph locations and outlines
// Simple glyphs are fully decoded; composite glyphs keep their header only

import type { ByteReader } from '../sfnt/byte-reader'
import type { TableRecord } from '../sfnt/directory'
import { MalformedGlyphError } from '../shared/errors'

const GLYPH_HEADER_SIZE = 10

// TrueType glyph flags
export const FLAG_ON_CURVE = 0x01
export const FLAG_X_SHORT = 0x02
export const FLAG_Y_SHORT = 0x04
export const FLAG_REPEAT = 0x08
export const FLAG_X_SAME_OR_POSITIVE = 0x10
export const FLAG_Y_SAME_OR_POSITIVE = 0x20

export interface LocaTable {
  kind: 'loca'
  format: number // head.indexToLocFormat
  offsets: Uint32Array // numGlyphs + 1 entries, relative to glyf
}

export interface BoundingBox {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

export interface ContourPoint {
  flag: number
  onCurve: boolean
  x: number
  y: number
}

export interface ContourData {
  endIndices: number[]
  instructionLength: number
  instructions: Uint8Array
  points: ContourPoint[]
}

export interface SimpleGlyph {
  kind: 'simple'
  id: number
  nContours: number
  bbox: BoundingBox
  contours: ContourData
}

export interface CompositeGlyph {
  kind: 'composite'
  id: number
  nContours: number
  bbox: BoundingBox
}

// No outline: zero contours, zero-length loca entry or the trailing sentinel
export interface EmptyGlyph {
  kind: 'empty'
  id: number
  nContours: 0
  bbox: BoundingBox
}

export type Glyph = SimpleGlyph | CompositeGlyph | EmptyGlyph

export interface GlyfTable {
  kind: 'glyf'
  glyphs: Glyph[]
}

// Parse loca table to get glyph offsets
export function decodeLoca(
  reader: ByteReader,
  record: TableRecord,
  indexToLocFormat: number,
  numGlyphs: number
): LocaTable {
  const offsets = new Uint32Array(numGlyphs + 1)
  const locaOffset = record.offset

  if (indexToLocFormat === 0) {
    // Short format: uint16, multiply by 2
    for (let i = 0; i <= numGlyphs; i++) {
      offsets[i] = reader.u16(locaOffset + i * 2) * 2
    }
  } else {
    // Long format: uint32
    for (let i = 0; i <= numGlyphs; i++) {
      offsets[i] = reader.u32(locaOffset + i * 4)
    }
  }

  return { kind: 'loca', format: indexToLocFormat, offsets }
}

// Absolute byte offset of a glyph's record
export function glyphOffset(glyf: TableRecord, loca: LocaTable, glyphId: number): number {
  return glyf.offset + loca.offsets[glyphId]
}

export function decodeGlyf(
  reader: ByteReader,
  glyf: TableRecord,
  loca: LocaTable,
  numGlyphs: number
): GlyfTable {
  const glyphs: Glyph[] = []

  // numGlyphs + 1 entries: the last loca offset marks the end of glyf and
  // produces a trailing sentinel glyph
  for (let id = 0; id <= numGlyphs; id++) {
    const length = id < numGlyphs ? loca.offsets[id + 1] - loca.offsets[id] : 0

    if (length <= 0) {
      glyphs.push(emptyGlyph(id))
      continue
    }

    glyphs.push(decodeGlyph(reader, glyphOffset(glyf, loca, id), id))
  }

  return { kind: 'glyf', glyphs }
}

function emptyGlyph(id: number, bbox?: BoundingBox): EmptyGlyph {
  return {
    kind: 'empty',
    id,
    nContours: 0,
    bbox: bbox ?? { xMin: 0, yMin: 0, xMax: 0, yMax: 0 },
  }
}

export function decodeGlyph(reader: ByteReader, start: number, id: number): Glyph {
  reader.ensure(start, GLYPH_HEADER_SIZE)

  const nContours = reader.s16(start)
  const bbox: BoundingBox = {
    xMin: reader.s16(start + 2),
    yMin: reader.s16(start + 4),
    xMax: reader.s16(start + 6),
    yMax: reader.s16(start + 8),
  }

  if (nContours > 0) {
    return {
      kind: 'simple',
      id,
      nContours,
      bbox,
      contours: decodeContours(reader, start + GLYPH_HEADER_SIZE, nContours, id),
    }
  }

  if (nContours < 0) {
    // Component records are not decoded
    return { kind: 'composite', id, nContours, bbox }
  }

  return emptyGlyph(id, bbox)
}

function decodeContours(
  reader: ByteReader,
  start: number,
  nContours: number,
  id: number
): ContourData {
  let pos = start

  // Read endPtsOfContours
  const endIndices: number[] = []
  for (let i = 0; i < nContours; i++) {
    const end = reader.u16(pos)
    pos += 2
    if (i > 0 && end < endIndices[i - 1]) {
      throw new MalformedGlyphError(
        id,
        `contour end index ${end} is below the previous ${endIndices[i - 1]}`
      )
    }
    endIndices.push(end)
  }

  const numPoints = endIndices.length > 0 ? endIndices[endIndices.length - 1] + 1 : 0

  // Instructions are kept opaque
  const instructionLength = reader.u16(pos)
  pos += 2
  const instructions = reader.bytes(pos, instructionLength)
  pos += instructionLength

  // Flags are run-length encoded, so the loop runs until enough flags were
  // produced rather than for a fixed number of bytes
  const flags = new Uint8Array(numPoints)
  let flagIndex = 0
  while (flagIndex < numPoints) {
    const flag = reader.u8(pos++)
    flags[flagIndex++] = flag

    if (flag & FLAG_REPEAT) {
      const repeatCount = reader.u8(pos++)
      for (let j = 0; j < repeatCount && flagIndex < numPoints; j++) {
        flags[flagIndex++] = flag
      }
    }
  }

  // X deltas, then Y deltas starting right after the X stream
  const xs = new Array<number>(numPoints)
  let x = 0
  for (let i = 0; i < numPoints; i++) {
    const flag = flags[i]
    if (flag & FLAG_X_SHORT) {
      const dx = reader.u8(pos++)
      x += (flag & FLAG_X_SAME_OR_POSITIVE) ? dx : -dx
    } else if (!(flag & FLAG_X_SAME_OR_POSITIVE)) {
      x += reader.s16(pos)
      pos += 2
    }
    xs[i] = x
  }

  const points: ContourPoint[] = []
  let y = 0
  for (let i = 0; i < numPoints; i++) {
    const flag = flags[i]
    if (flag & FLAG_Y_SHORT) {
      const dy = reader.u8(pos++)
      y += (flag & FLAG_Y_SAME_OR_POSITIVE) ? dy : -dy
    } else if (!(flag & FLAG_Y_SAME_OR_POSITIVE)) {
      y += reader.s16(pos)
      pos += 2
    }
    points.push({ flag, onCurve: (flag & FLAG_ON_CURVE) !== 0, x: xs[i], y })
  }

  return { endIndices, instructionLength, instructions, points }
}
