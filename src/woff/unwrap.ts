// WOFF 1.0 to plain sfnt
// https://www.w3.org/TR/WOFF/

import { inflateSync } from 'node:zlib'
import { ByteReader } from '../sfnt/byte-reader'
import { SFNT_ENTRY_SIZE, SFNT_HEADER_SIZE } from '../sfnt/directory'
import { pad4 } from '../shared/checksum'
import { InvalidSignatureError, MalformedWoffError } from '../shared/errors'
import { WOFF2_SIGNATURE, WOFF_SIGNATURE } from '../shared/known-tags'

const WOFF_HEADER_SIZE = 44
const WOFF_ENTRY_SIZE = 20

interface WoffTableEntry {
  tag: number
  offset: number
  compLength: number
  origLength: number
  checksum: number
}

// True for either WOFF signature; unwrapWoff turns WOFF2 away
export function isWoff(data: Uint8Array): boolean {
  if (data.byteLength < 4) return false
  const signature = new ByteReader(data).u32(0)
  return signature === WOFF_SIGNATURE || signature === WOFF2_SIGNATURE
}

export function unwrapWoff(data: Uint8Array): Uint8Array {
  const reader = new ByteReader(data)

  const signature = reader.u32(0)
  if (signature === WOFF2_SIGNATURE) {
    throw new InvalidSignatureError('WOFF2 input is not supported')
  }
  if (signature !== WOFF_SIGNATURE) {
    throw new InvalidSignatureError('Invalid WOFF signature')
  }

  const flavor = reader.u32(4)
  const numTables = reader.u16(12)

  // Read WOFF table directory
  const tables: WoffTableEntry[] = []
  for (let i = 0; i < numTables; i++) {
    const dirOffset = WOFF_HEADER_SIZE + i * WOFF_ENTRY_SIZE
    tables.push({
      tag: reader.u32(dirOffset),
      offset: reader.u32(dirOffset + 4),
      compLength: reader.u32(dirOffset + 8),
      origLength: reader.u32(dirOffset + 12),
      checksum: reader.u32(dirOffset + 16),
    })
  }

  // Sort by tag for sfnt output
  tables.sort((a, b) => a.tag - b.tag)

  const inflated = tables.map((table) => {
    const tableData = reader.bytes(table.offset, table.compLength)
    if (table.compLength > table.origLength) {
      throw new MalformedWoffError(
        `Table compLength ${table.compLength} exceeds origLength ${table.origLength}`
      )
    }
    // Stored uncompressed when compression would not have helped
    if (table.compLength === table.origLength) {
      return tableData
    }
    let result: Uint8Array
    try {
      result = new Uint8Array(inflateSync(tableData))
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new MalformedWoffError(`Table data does not inflate: ${reason}`)
    }
    if (result.byteLength !== table.origLength) {
      throw new MalformedWoffError(
        `Decompression size mismatch: expected ${table.origLength}, got ${result.byteLength}`
      )
    }
    return result
  })

  let totalSize = SFNT_HEADER_SIZE + numTables * SFNT_ENTRY_SIZE
  for (const table of tables) {
    totalSize += pad4(table.origLength)
  }

  const output = new Uint8Array(totalSize)
  const outView = new DataView(output.buffer)

  // sfnt header with recomputed binary search fields
  const entrySelector = numTables > 0 ? Math.floor(Math.log2(numTables)) : 0
  const searchRange = numTables > 0 ? 2 ** entrySelector * 16 : 0
  outView.setUint32(0, flavor)
  outView.setUint16(4, numTables)
  outView.setUint16(6, searchRange)
  outView.setUint16(8, entrySelector)
  outView.setUint16(10, numTables * 16 - searchRange)

  let dataOffset = SFNT_HEADER_SIZE + numTables * SFNT_ENTRY_SIZE

  for (let i = 0; i < numTables; i++) {
    const table = tables[i]
    const dirOffset = SFNT_HEADER_SIZE + i * SFNT_ENTRY_SIZE

    outView.setUint32(dirOffset, table.tag)
    outView.setUint32(dirOffset + 4, table.checksum)
    outView.setUint32(dirOffset + 8, dataOffset)
    outView.setUint32(dirOffset + 12, table.origLength)

    output.set(inflated[i], dataOffset)
    dataOffset += pad4(table.origLength)
  }

  return output
}
