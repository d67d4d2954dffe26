// Big-endian random-access reader with bounds checking
// Reads never move a cursor; every decoder tracks its own offset

import { OutOfBoundsError } from '../shared/errors'

// Seconds between 1904-01-01 (sfnt epoch) and 1970-01-01
const MAC_EPOCH_DELTA = 2082844800

export class ByteReader {
  private readonly u8a: Uint8Array

  constructor(data: ArrayBuffer | Uint8Array) {
    this.u8a = data instanceof Uint8Array ? data : new Uint8Array(data)
  }

  get length(): number {
    return this.u8a.byteLength
  }

  // Throws unless [offset, offset + width) lies inside the buffer
  ensure(offset: number, width: number): void {
    if (
      !Number.isInteger(offset) ||
      offset < 0 ||
      width < 0 ||
      offset + width > this.u8a.byteLength
    ) {
      throw new OutOfBoundsError(offset, width, this.u8a.byteLength)
    }
  }

  u8(offset: number): number {
    this.ensure(offset, 1)
    return this.u8a[offset]
  }

  u16(offset: number): number {
    this.ensure(offset, 2)
    return (this.u8a[offset] << 8) | this.u8a[offset + 1]
  }

  s16(offset: number): number {
    const val = this.u16(offset)
    return (val & 0x8000) !== 0 ? val - 0x10000 : val
  }

  u32(offset: number): number {
    this.ensure(offset, 4)
    const d = this.u8a
    return (
      (d[offset] * 0x1000000 +
        ((d[offset + 1] << 16) | (d[offset + 2] << 8) | d[offset + 3])) >>>
      0
    )
  }

  s32(offset: number): number {
    return this.u32(offset) | 0
  }

  // 16.16 fixed-point number
  fixed(offset: number): number {
    return this.s32(offset) / 0x10000
  }

  // 4 raw bytes as characters, not validated
  tag(offset: number): string {
    this.ensure(offset, 4)
    const d = this.u8a
    return String.fromCharCode(d[offset], d[offset + 1], d[offset + 2], d[offset + 3])
  }

  // LONGDATETIME: signed 64-bit seconds since 1904-01-01
  longDateTime(offset: number): Date {
    const high = this.s32(offset)
    const low = this.u32(offset + 4)
    const seconds = high * 0x100000000 + low - MAC_EPOCH_DELTA
    return new Date(seconds * 1000)
  }

  // Zero-copy view of a byte range
  bytes(offset: number, length: number): Uint8Array {
    this.ensure(offset, length)
    return this.u8a.subarray(offset, offset + length)
  }
}
