// Queries over a decoded font

import type { Font } from './font'
import type { ContourPoint, Glyph } from '../tables/glyf'

// Glyph 0 is the missing-glyph outline
export function getGlyphIdForCode(font: Font, code: number): number {
  return font.glyphIndexMap.get(code) ?? 0
}

export function getCodeForGlyphId(font: Font, glyphId: number): number | undefined {
  return font.characterMap.get(glyphId)
}

// A mapped id past the glyph list also falls back to glyph 0
export function getGlyphForCode(font: Font, code: number): Glyph {
  const glyphId = getGlyphIdForCode(font, code)
  return glyphId < font.numGlyphs ? font.glyphs[glyphId] : font.glyphs[0]
}

// Horizontal adjustment between two glyph indices, in font units
export function getKerningValue(font: Font, left: number, right: number): number {
  return font.kerning?.get(left, right) ?? 0
}

// Points of each contour in rendering order
export function splitContours(glyph: Glyph): ContourPoint[][] {
  if (glyph.kind !== 'simple') return []

  const { endIndices, points } = glyph.contours
  const contours: ContourPoint[][] = []
  let start = 0
  for (const end of endIndices) {
    contours.push(points.slice(start, end + 1))
    start = end + 1
  }
  return contours
}
