import { describe, it, expect } from 'vitest'
import { ByteReader } from '../src/sfnt/byte-reader'
import { createContext, type ParseOptions } from '../src/sfnt/context'
import { readTableDirectory, type TableRecord } from '../src/sfnt/directory'
import { decodeCoverage, decodeKern, mergeKerning, KerningPairMap } from '../src/tables/kern'
import { OutOfBoundsError, UnsupportedKerningFormatError } from '../src/shared/errors'
import {
  buildKern,
  buildSfnt,
  type KernPairInput,
  type KernSubtableInput,
} from './helpers/font-builder'
import { WriteBuffer } from './helpers/write-buffer'

function decode(kern: Uint8Array, options?: ParseOptions) {
  const reader = new ByteReader(buildSfnt([{ tag: 'kern', data: kern }]))
  const { records } = readTableDirectory(reader)
  const ctx = createContext(reader, records, options)
  const record = records.get('kern')
  if (!record) throw new Error('kern record missing')
  return { table: decodeKern(reader, record, ctx), issues: ctx.issues }
}

describe('kern - coverage', () => {
  it('decodes the low-byte flags', () => {
    expect(decodeCoverage(0x0001)).toEqual({
      horizontal: true,
      minimum: false,
      crossStream: false,
      override: false,
      reserved: 0,
      format: 0,
    })
    expect(decodeCoverage(0x000e)).toEqual({
      horizontal: false,
      minimum: true,
      crossStream: true,
      override: true,
      reserved: 0,
      format: 0,
    })
  })

  it('keeps the reserved nibble in place', () => {
    expect(decodeCoverage(0x00f1).reserved).toBe(0xf0)
  })

  it('takes the format from the high byte', () => {
    const coverage = decodeCoverage(0x0201)
    expect(coverage.format).toBe(2)
    expect(coverage.horizontal).toBe(true)
    // The low byte alone carries no format bits
    expect(decodeCoverage(0x0201 & 0xff).format).toBe(0)
  })
})

describe('kern - format 0', () => {
  it('maps a pair to its signed adjustment', () => {
    const { table, issues } = decode(buildKern([{ coverage: 0x0001, pairs: [[65, 66, -50]] }]))

    expect(issues).toEqual([])
    expect(table.version).toBe(0)
    expect(table.nTables).toBe(1)
    expect(table.subtables).toHaveLength(1)

    const subtable = table.subtables[0]
    expect(subtable.length).toBe(20)
    expect(subtable.nPairs).toBe(1)
    expect(subtable.searchRange).toBe(6)
    expect(subtable.entrySelector).toBe(0)
    expect(subtable.rangeShift).toBe(0)
    expect(subtable.pairs.get(65, 66)).toBe(-50)
  })

  it('treats pairs as ordered', () => {
    const { table } = decode(buildKern([{ coverage: 0x0001, pairs: [[65, 66, -50]] }]))
    const pairs = table.subtables[0].pairs

    expect(pairs.has(65, 66)).toBe(true)
    expect(pairs.has(66, 65)).toBe(false)
    expect(pairs.get(66, 65)).toBeUndefined()
  })

  it('reads several pairs in order', () => {
    const { table } = decode(
      buildKern([
        {
          coverage: 0x0001,
          pairs: [
            [1, 2, 10],
            [1, 3, -20],
            [2, 1, 32767],
            [65535, 65535, -32768],
          ],
        },
      ])
    )
    const pairs = table.subtables[0].pairs

    expect(pairs.size).toBe(4)
    expect([...pairs]).toEqual([
      [{ left: 1, right: 2 }, 10],
      [{ left: 1, right: 3 }, -20],
      [{ left: 2, right: 1 }, 32767],
      [{ left: 65535, right: 65535 }, -32768],
    ])
  })

  it('walks past a subtable whose 16-bit length overflowed', () => {
    const pairs: KernPairInput[] = []
    for (let i = 0; i < 11000; i++) {
      pairs.push([i, i + 1, -1])
    }
    const { table } = decode(
      buildKern([
        { coverage: 0x0001, pairs },
        { coverage: 0x0001, pairs: [[7, 8, 99]] },
      ])
    )

    expect(table.subtables).toHaveLength(2)
    // 6 + 8 + 66000 stored modulo 65536
    expect(table.subtables[0].length).toBe(478)
    expect(table.subtables[0].nPairs).toBe(11000)
    expect(table.subtables[1].pairs.get(7, 8)).toBe(99)
  })

  it('fails when the pair list is truncated', () => {
    const kern = buildKern([{ coverage: 0x0001, pairs: [[1, 2, 3], [4, 5, 6]] }])
    const truncated = kern.subarray(0, kern.byteLength - 4)
    const reader = new ByteReader(truncated)
    const record: TableRecord = { tag: 'kern', checksum: 0, offset: 0, length: truncated.byteLength }
    const ctx = createContext(reader, new Map([['kern', record]]))

    expect(() => decodeKern(reader, record, ctx)).toThrow(OutOfBoundsError)
  })
})

describe('kern - unsupported formats', () => {
  const input: KernSubtableInput[] = [
    { coverage: 0x0201, body: new Uint8Array(8) },
    { coverage: 0x0001, pairs: [[1, 2, 30]] },
  ]

  it('skips the subtable and keeps decoding the rest', () => {
    const { table, issues } = decode(buildKern(input))

    expect(table.nTables).toBe(2)
    expect(table.subtables).toHaveLength(1)
    expect(table.subtables[0].pairs.get(1, 2)).toBe(30)

    expect(issues).toHaveLength(1)
    const issue = issues[0]
    expect(issue).toBeInstanceOf(UnsupportedKerningFormatError)
    expect(issue.code).toBe('UNSUPPORTED_KERNING_FORMAT')
    expect(issue.message).toBe('Kerning subtable 0 uses unsupported format 2')
  })

  it('throws in strict mode', () => {
    expect(() => decode(buildKern(input), { strict: true })).toThrow(UnsupportedKerningFormatError)
  })

  it('reports the 32-bit versioned table and yields no subtables', () => {
    const kern = new WriteBuffer().writeU32(0x00010000).writeU32(0).getBytes()
    const { table, issues } = decode(kern)

    expect(table.version).toBe(1)
    expect(table.subtables).toEqual([])
    expect(issues).toHaveLength(1)
    expect(issues[0].message).toBe('kern table version 0x10000 is not supported')
  })

  it('passes issues to the logger', () => {
    const messages: string[] = []
    decode(buildKern(input), { logger: { warn: (message) => messages.push(message) } })

    expect(messages).toEqual([
      'UNSUPPORTED_KERNING_FORMAT: Kerning subtable 0 uses unsupported format 2',
    ])
  })
})

describe('kern - merging subtables', () => {
  it('adds, overrides and skips by coverage', () => {
    const { table } = decode(
      buildKern([
        { coverage: 0x0001, pairs: [[1, 2, -10], [3, 4, 5]] },
        { coverage: 0x0001, pairs: [[1, 2, -5]] },
        // override
        { coverage: 0x0009, pairs: [[3, 4, 40]] },
        // cross-stream
        { coverage: 0x0005, pairs: [[1, 2, 100]] },
        // minimum values
        { coverage: 0x0003, pairs: [[5, 6, 7]] },
        // vertical
        { coverage: 0x0000, pairs: [[5, 6, 8]] },
      ])
    )
    const merged = mergeKerning(table)

    expect(merged.size).toBe(2)
    expect(merged.get(1, 2)).toBe(-15)
    expect(merged.get(3, 4)).toBe(40)
    expect(merged.has(5, 6)).toBe(false)
  })

  it('returns an empty map for a table without subtables', () => {
    const merged = mergeKerning({ kind: 'kern', version: 0, nTables: 0, subtables: [] })
    expect(merged).toBeInstanceOf(KerningPairMap)
    expect(merged.size).toBe(0)
  })
})
