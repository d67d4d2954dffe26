// Decode error taxonomy

export type FontErrorCode =
  | 'OUT_OF_BOUNDS'
  | 'UNSUPPORTED_KERNING_FORMAT'
  | 'MALFORMED_CMAP'
  | 'UNSUPPORTED_FONT'
  | 'MISSING_TABLE'
  | 'MALFORMED_GLYPH'
  | 'CHECKSUM_MISMATCH'
  | 'INVALID_SIGNATURE'
  | 'MALFORMED_WOFF'

export class FontDecodeError extends Error {
  readonly code: FontErrorCode

  constructor(code: FontErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class OutOfBoundsError extends FontDecodeError {
  readonly offset: number
  readonly width: number
  readonly bufferLength: number

  constructor(offset: number, width: number, bufferLength: number) {
    super(
      'OUT_OF_BOUNDS',
      `Read of ${width} bytes at offset ${offset} exceeds buffer length ${bufferLength}`
    )
    this.offset = offset
    this.width = width
    this.bufferLength = bufferLength
  }
}

export class UnsupportedKerningFormatError extends FontDecodeError {
  readonly format: number

  // format is the subtable format, or the table version for a table
  // that cannot be walked at all
  constructor(format: number, message: string) {
    super('UNSUPPORTED_KERNING_FORMAT', message)
    this.format = format
  }
}

export class MalformedCmapError extends FontDecodeError {
  constructor(message: string) {
    super('MALFORMED_CMAP', message)
  }
}

export class UnsupportedFontError extends FontDecodeError {
  constructor(message: string) {
    super('UNSUPPORTED_FONT', message)
  }
}

export class MissingTableError extends FontDecodeError {
  readonly tag: string

  constructor(tag: string) {
    super('MISSING_TABLE', `Missing required table '${tag}'`)
    this.tag = tag
  }
}

export class MalformedGlyphError extends FontDecodeError {
  readonly glyphId: number

  constructor(glyphId: number, message: string) {
    super('MALFORMED_GLYPH', `Glyph ${glyphId}: ${message}`)
    this.glyphId = glyphId
  }
}

export class ChecksumMismatchError extends FontDecodeError {
  readonly tag: string
  readonly expected: number
  readonly actual: number

  constructor(tag: string, expected: number, actual: number) {
    super(
      'CHECKSUM_MISMATCH',
      `Table '${tag}' checksum 0x${actual.toString(16)} does not match record 0x${expected.toString(16)}`
    )
    this.tag = tag
    this.expected = expected
    this.actual = actual
  }
}

export class InvalidSignatureError extends FontDecodeError {
  constructor(message: string) {
    super('INVALID_SIGNATURE', message)
  }
}

export class MalformedWoffError extends FontDecodeError {
  constructor(message: string) {
    super('MALFORMED_WOFF', message)
  }
}
