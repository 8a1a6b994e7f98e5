/**
 * Label fitting by estimated glyph width
 *
 * SVG text measurement needs a live layout engine; labels are fitted
 * against an average character width instead, so layouts stay pure.
 */

import type { CourseMeta } from '../types'

// Average character width as fraction of font size
export const AVG_CHAR_WIDTH_RATIO = 0.55

export const ELLIPSIS = '…'

export function estimateTextWidth(text: string, fontPx: number): number {
  return Array.from(text).length * fontPx * AVG_CHAR_WIDTH_RATIO
}

/**
 * Returns `text` when it fits in `budgetPx`, otherwise the longest prefix
 * that fits with an ellipsis appended. Empty when not even the ellipsis fits.
 */
export function fitText(
  text: string,
  budgetPx: number,
  fontPx: number,
  measure: (value: string, fontPx: number) => number = estimateTextWidth
): string {
  if (measure(text, fontPx) <= budgetPx) return text
  if (measure(ELLIPSIS, fontPx) > budgetPx) return ''

  // Cut on code points so surrogate pairs stay whole
  const chars = Array.from(text)
  const prefix = (count: number) => chars.slice(0, count).join('').trimEnd() + ELLIPSIS

  let lo = 0
  let hi = chars.length
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2)
    if (measure(prefix(mid), fontPx) <= budgetPx) {
      lo = mid
    } else {
      hi = mid - 1
    }
  }
  return prefix(lo)
}

/** Tile label: the course code when there is one, else the (shortened) name */
export function courseTileLabel(meta: CourseMeta | undefined): string {
  if (!meta) return ''
  if (meta.code) return meta.code
  const chars = Array.from(meta.name || '')
  if (chars.length <= 16) return chars.join('')
  return `${chars.slice(0, 14).join('')}${ELLIPSIS}`
}
