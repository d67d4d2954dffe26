import { bench, describe } from 'vitest'
import { parseFont } from '../src/sfnt/font'
import { buildFont, buildKern, buildUnicodeCmap, wrapWoff, type KernPairInput } from '../test/helpers/font-builder'
import { encodeSimpleGlyph, type OutlinePoint } from '../test/helpers/glyph-encoder'

function sizeLabel(bytes: number): string {
  return bytes >= 1024 * 1024
    ? `${(bytes / 1024 / 1024).toFixed(1)} MB`
    : `${(bytes / 1024).toFixed(1)} KB`
}

// Jagged outline so every glyph mixes short and long deltas
function outline(seed: number, points: number): OutlinePoint[] {
  const contour: OutlinePoint[] = []
  for (let i = 0; i < points; i++) {
    contour.push({
      x: (i * 37 + seed * 11) % 900,
      y: (i * 53 + seed * 7) % 1200 - 200,
      onCurve: i % 3 !== 1,
    })
  }
  return contour
}

function syntheticFont(numGlyphs: number): Uint8Array {
  const glyphs: Uint8Array[] = [new Uint8Array(0)]
  for (let id = 1; id < numGlyphs; id++) {
    glyphs.push(encodeSimpleGlyph({ contours: [outline(id, 24), outline(id + 1, 12)] }))
  }

  const pairs: KernPairInput[] = []
  for (let left = 1; left < Math.min(numGlyphs, 200); left++) {
    pairs.push([left, left + 1, -(left % 40)])
  }

  return buildFont({
    glyphs,
    cmap: buildUnicodeCmap([{ startCode: 0x4e00, endCode: 0x4e00 + numGlyphs - 2, idDelta: 1 - 0x4e00 }]),
    kern: buildKern([{ coverage: 0x0001, pairs }]),
    indexToLocFormat: 1,
  })
}

const fixtures = [100, 1000, 5000].map((numGlyphs) => {
  const sfnt = syntheticFont(numGlyphs)
  return { label: `${numGlyphs} glyphs`, sfnt, woff: wrapWoff(sfnt) }
})

console.log('\n[bench] parseFont:')
for (const f of fixtures) {
  console.log(`  ${f.label}: sfnt ${sizeLabel(f.sfnt.byteLength)}, woff ${sizeLabel(f.woff.byteLength)}`)
}

describe('parseFont', () => {
  for (const f of fixtures) {
    bench(`sfnt, ${f.label} (${sizeLabel(f.sfnt.byteLength)})`, () => {
      parseFont(f.sfnt)
    })
    bench(`woff, ${f.label} (${sizeLabel(f.woff.byteLength)})`, () => {
      parseFont(f.woff)
    })
  }
})
