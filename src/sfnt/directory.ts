// sfnt offset table and table records

import type { ByteReader } from './byte-reader'
import { OutOfBoundsError } from '../shared/errors'

export const SFNT_HEADER_SIZE = 12
export const SFNT_ENTRY_SIZE = 16

export interface TableDirectory {
  sfntVersion: number
  numTables: number
  searchRange: number
  entrySelector: number
  rangeShift: number
}

export interface TableRecord {
  tag: string
  checksum: number
  offset: number // absolute, from buffer start
  length: number
}

export interface DirectoryResult {
  directory: TableDirectory
  records: Map<string, TableRecord>
}

export function readTableDirectory(reader: ByteReader): DirectoryResult {
  const directory: TableDirectory = {
    sfntVersion: reader.u32(0),
    numTables: reader.u16(4),
    searchRange: reader.u16(6),
    entrySelector: reader.u16(8),
    rangeShift: reader.u16(10),
  }

  const records = new Map<string, TableRecord>()

  for (let i = 0; i < directory.numTables; i++) {
    const recordOffset = SFNT_HEADER_SIZE + i * SFNT_ENTRY_SIZE

    const record: TableRecord = {
      tag: reader.tag(recordOffset),
      checksum: reader.u32(recordOffset + 4),
      offset: reader.u32(recordOffset + 8),
      length: reader.u32(recordOffset + 12),
    }

    // Every table must lie inside the buffer
    if (record.offset + record.length > reader.length) {
      throw new OutOfBoundsError(record.offset, record.length, reader.length)
    }

    // Later duplicates overwrite earlier ones
    records.set(record.tag, record)
  }

  return { directory, records }
}
