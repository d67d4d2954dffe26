// State threaded through one decode call

import type { ByteReader } from './byte-reader'
import type { TableRecord } from './directory'
import type { FontDecodeError } from '../shared/errors'

export interface Logger {
  warn(message: string): void
}

export interface ParseOptions {
  /** Throw recoverable errors instead of collecting them in `Font.issues` */
  strict?: boolean
  /** Compare every table against its directory checksum */
  verifyChecksums?: boolean
  /** Receives every recoverable error as it is collected */
  logger?: Logger
}

export interface DecodeContext {
  reader: ByteReader
  records: Map<string, TableRecord>
  strict: boolean
  verifyChecksums: boolean
  logger: Logger | null
  issues: FontDecodeError[]
}

export function createContext(
  reader: ByteReader,
  records: Map<string, TableRecord>,
  options?: ParseOptions
): DecodeContext {
  return {
    reader,
    records,
    strict: options?.strict ?? false,
    verifyChecksums: options?.verifyChecksums ?? false,
    logger: options?.logger ?? null,
    issues: [],
  }
}

// Record an error that leaves the rest of the font usable
export function reportIssue(ctx: DecodeContext, error: FontDecodeError): void {
  if (ctx.strict) {
    throw error
  }
  ctx.issues.push(error)
  ctx.logger?.warn(`${error.code}: ${error.message}`)
}
