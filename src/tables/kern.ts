// 'kern' table: pairwise glyph spacing adjustments
// Only the 16-bit versioned table with format 0 subtables is decoded

import type { ByteReader } from '../sfnt/byte-reader'
import type { TableRecord } from '../sfnt/directory'
import { type DecodeContext, reportIssue } from '../sfnt/context'
import { UnsupportedKerningFormatError } from '../shared/errors'

const KERN_HEADER_SIZE = 4
const SUBTABLE_HEADER_SIZE = 6
const FORMAT0_HEADER_SIZE = 8
const PAIR_SIZE = 6

// Coverage low-byte bits
const COVERAGE_HORIZONTAL = 0x01
const COVERAGE_MINIMUM = 0x02
const COVERAGE_CROSS_STREAM = 0x04
const COVERAGE_OVERRIDE = 0x08
const COVERAGE_RESERVED = 0xf0

export interface CoverageFlags {
  horizontal: boolean
  minimum: boolean
  crossStream: boolean
  override: boolean
  reserved: number // bits 4-7, kept in place
  format: number // high byte
}

// Left and right are glyph indices; (a, b) and (b, a) are distinct
export interface KerningPair {
  left: number
  right: number
}

// Map keyed by value-equal glyph pairs
export class KerningPairMap {
  private readonly values = new Map<number, number>()

  private static key(left: number, right: number): number {
    return left * 0x10000 + right
  }

  get size(): number {
    return this.values.size
  }

  get(left: number, right: number): number | undefined {
    return this.values.get(KerningPairMap.key(left, right))
  }

  has(left: number, right: number): boolean {
    return this.values.has(KerningPairMap.key(left, right))
  }

  set(left: number, right: number, value: number): this {
    this.values.set(KerningPairMap.key(left, right), value)
    return this
  }

  *entries(): Generator<[KerningPair, number]> {
    for (const [key, value] of this.values) {
      yield [{ left: Math.floor(key / 0x10000), right: key % 0x10000 }, value]
    }
  }

  [Symbol.iterator](): Generator<[KerningPair, number]> {
    return this.entries()
  }
}

export interface KerningSubtable {
  version: number
  length: number
  coverage: CoverageFlags
  nPairs: number
  // Binary search hints, carried through but not used for the linear decode
  searchRange: number
  entrySelector: number
  rangeShift: number
  pairs: KerningPairMap
}

export interface KernTable {
  kind: 'kern'
  version: number
  nTables: number
  subtables: KerningSubtable[]
}

export function decodeCoverage(value: number): CoverageFlags {
  const low = value & 0xff
  return {
    horizontal: (low & COVERAGE_HORIZONTAL) !== 0,
    minimum: (low & COVERAGE_MINIMUM) !== 0,
    crossStream: (low & COVERAGE_CROSS_STREAM) !== 0,
    override: (low & COVERAGE_OVERRIDE) !== 0,
    reserved: low & COVERAGE_RESERVED,
    format: (value >> 8) & 0xff,
  }
}

export function decodeKern(
  reader: ByteReader,
  record: TableRecord,
  ctx: DecodeContext
): KernTable {
  const start = record.offset
  const version = reader.u16(start)

  // A leading 1 is the 32-bit versioned table (1.0 as 16.16 fixed), whose
  // subtable headers have a different layout
  if (version === 1) {
    reportIssue(
      ctx,
      new UnsupportedKerningFormatError(
        version,
        `kern table version 0x${reader.u32(start).toString(16)} is not supported`
      )
    )
    return { kind: 'kern', version, nTables: 0, subtables: [] }
  }

  const nTables = reader.u16(start + 2)
  const subtables: KerningSubtable[] = []
  let offset = start + KERN_HEADER_SIZE

  for (let i = 0; i < nTables; i++) {
    const subVersion = reader.u16(offset)
    const length = reader.u16(offset + 2)
    const coverage = decodeCoverage(reader.u16(offset + 4))

    if (coverage.format !== 0) {
      reportIssue(
        ctx,
        new UnsupportedKerningFormatError(
          coverage.format,
          `Kerning subtable ${i} uses unsupported format ${coverage.format}`
        )
      )
      // Without a usable length the next subtable cannot be located
      if (length < SUBTABLE_HEADER_SIZE) break
      offset += length
      continue
    }

    const subtable = decodeFormat0(
      reader,
      offset + SUBTABLE_HEADER_SIZE,
      subVersion,
      length,
      coverage
    )
    subtables.push(subtable)

    // The 16-bit length overflows on large pair lists, so the body size is
    // taken from nPairs instead
    offset += SUBTABLE_HEADER_SIZE + FORMAT0_HEADER_SIZE + subtable.nPairs * PAIR_SIZE
  }

  return { kind: 'kern', version, nTables, subtables }
}

function decodeFormat0(
  reader: ByteReader,
  start: number,
  version: number,
  length: number,
  coverage: CoverageFlags
): KerningSubtable {
  const nPairs = reader.u16(start)
  const searchRange = reader.u16(start + 2)
  const entrySelector = reader.u16(start + 4)
  const rangeShift = reader.u16(start + 6)

  let pos = start + FORMAT0_HEADER_SIZE
  reader.ensure(pos, nPairs * PAIR_SIZE)

  const pairs = new KerningPairMap()
  for (let i = 0; i < nPairs; i++) {
    pairs.set(reader.u16(pos), reader.u16(pos + 2), reader.s16(pos + 4))
    pos += PAIR_SIZE
  }

  return {
    version,
    length,
    coverage,
    nPairs,
    searchRange,
    entrySelector,
    rangeShift,
    pairs,
  }
}

// Fold the horizontal, along-stream subtables into one map. Override
// subtables replace accumulated values, others add to them. Minimum
// subtables hold limits rather than adjustments and are left out.
export function mergeKerning(table: KernTable): KerningPairMap {
  const merged = new KerningPairMap()

  for (const subtable of table.subtables) {
    const { horizontal, crossStream, minimum, override } = subtable.coverage
    if (!horizontal || crossStream || minimum) continue

    for (const [pair, value] of subtable.pairs) {
      const current = override ? 0 : merged.get(pair.left, pair.right) ?? 0
      merged.set(pair.left, pair.right, current + value)
    }
  }

  return merged
}
