// sfnt table checksum computation

import type { ByteReader } from '../sfnt/byte-reader'
import type { TableRecord } from '../sfnt/directory'
import { TAG_HEAD } from './known-tags'

// Offset of checksumAdjustment inside head
const HEAD_CHECKSUM_ADJUSTMENT = 8

export function computeChecksum(data: Uint8Array, offset: number, length: number): number {
  let sum = 0
  const end = offset + length
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  // Process 4-byte aligned words
  const alignedEnd = offset + (length & ~3)
  for (let i = offset; i < alignedEnd; i += 4) {
    sum = (sum + view.getUint32(i)) >>> 0
  }

  // Remaining 1-3 bytes are zero-padded to a word
  if (end > alignedEnd) {
    let last = 0
    for (let i = alignedEnd; i < end; i++) {
      last = (last << 8) | data[i]
    }
    last = (last << ((4 - (end - alignedEnd)) * 8)) >>> 0
    sum = (sum + last) >>> 0
  }

  return sum
}

// Checksum of one table as the directory records it. The head record is
// computed with checksumAdjustment taken as zero.
export function tableChecksum(reader: ByteReader, record: TableRecord): number {
  const data = reader.bytes(record.offset, record.length)
  let sum = computeChecksum(data, 0, data.byteLength)
  if (record.tag === TAG_HEAD && record.length >= HEAD_CHECKSUM_ADJUSTMENT + 4) {
    sum = (sum - reader.u32(record.offset + HEAD_CHECKSUM_ADJUSTMENT)) >>> 0
  }
  return sum
}

// Pad to 4-byte boundary
export function pad4(n: number): number {
  return (n + 3) & ~3
}
