// Reference TrueType simple-glyph encoder
// Emits the smallest delta form per coordinate and run-length flags

import { WriteBuffer } from './write-buffer'

const FLAG_ON_CURVE = 0x01
const FLAG_X_SHORT = 0x02
const FLAG_Y_SHORT = 0x04
const FLAG_REPEAT = 0x08
const FLAG_X_SAME = 0x10
const FLAG_Y_SAME = 0x20

export interface OutlinePoint {
  x: number
  y: number
  onCurve: boolean
}

export interface SimpleGlyphInput {
  contours: OutlinePoint[][]
  instructions?: number[]
}

// Encode an empty glyph header (zero contours) with the given box
export function encodeEmptyGlyph(xMin = 0, yMin = 0, xMax = 0, yMax = 0): Uint8Array {
  return new WriteBuffer(10)
    .writeS16(0)
    .writeS16(xMin)
    .writeS16(yMin)
    .writeS16(xMax)
    .writeS16(yMax)
    .getBytes()
}

// Header of a composite glyph followed by one component record
export function encodeCompositeGlyph(componentGlyphId: number): Uint8Array {
  return new WriteBuffer(20)
    .writeS16(-1)
    .writeS16(0)
    .writeS16(0)
    .writeS16(100)
    .writeS16(100)
    .writeU16(0x0002) // ARGS_ARE_XY_VALUES, no more components
    .writeU16(componentGlyphId)
    .writeU8(0)
    .writeU8(0)
    .getBytes()
}

export function encodeSimpleGlyph(input: SimpleGlyphInput): Uint8Array {
  const points = input.contours.flat()
  const instructions = input.instructions ?? []

  let xMin = 0
  let yMin = 0
  let xMax = 0
  let yMax = 0
  points.forEach((p, i) => {
    if (i === 0) {
      xMin = xMax = p.x
      yMin = yMax = p.y
    } else {
      xMin = Math.min(xMin, p.x)
      xMax = Math.max(xMax, p.x)
      yMin = Math.min(yMin, p.y)
      yMax = Math.max(yMax, p.y)
    }
  })

  const out = new WriteBuffer()
  out.writeS16(input.contours.length)
  out.writeS16(xMin).writeS16(yMin).writeS16(xMax).writeS16(yMax)

  let end = -1
  for (const contour of input.contours) {
    end += contour.length
    out.writeU16(end)
  }

  out.writeU16(instructions.length)
  for (const b of instructions) out.writeU8(b)

  const flags: number[] = []
  const xOut = new WriteBuffer()
  const yOut = new WriteBuffer()
  let lastFlag = -1
  let repeatCount = 0
  // Index of the flag byte that starts the current run
  let runIndex = -1
  let x = 0
  let y = 0

  for (const p of points) {
    const dx = p.x - x
    const dy = p.y - y
    x = p.x
    y = p.y

    let flag = p.onCurve ? FLAG_ON_CURVE : 0

    if (dx === 0) {
      flag |= FLAG_X_SAME
    } else if (dx >= -255 && dx <= 255) {
      flag |= FLAG_X_SHORT
      if (dx > 0) flag |= FLAG_X_SAME
      xOut.writeU8(Math.abs(dx))
    } else {
      xOut.writeS16(dx)
    }

    if (dy === 0) {
      flag |= FLAG_Y_SAME
    } else if (dy >= -255 && dy <= 255) {
      flag |= FLAG_Y_SHORT
      if (dy > 0) flag |= FLAG_Y_SAME
      yOut.writeU8(Math.abs(dy))
    } else {
      yOut.writeS16(dy)
    }

    if (flag === lastFlag && repeatCount < 255) {
      repeatCount++
      if (repeatCount === 1) {
        flags[runIndex] |= FLAG_REPEAT
        flags.push(repeatCount)
      } else {
        flags[flags.length - 1] = repeatCount
      }
    } else {
      runIndex = flags.length
      flags.push(flag)
      lastFlag = flag
      repeatCount = 0
    }
  }

  for (const f of flags) out.writeU8(f)
  out.writeBytes(xOut.getBytes())
  out.writeBytes(yOut.getBytes())

  return out.getBytes()
}
