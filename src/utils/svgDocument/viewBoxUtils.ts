// ViewBox parsing, formatting and merging

import type { SvgDocument, ViewBox } from './types'

/**
 * Parse viewBox attribute
 */
export function parseViewBox(viewBoxAttr: string | null): ViewBox | null {
  if (!viewBoxAttr) return null

  // ViewBox can be comma or space separated
  const parts = viewBoxAttr.trim().split(/[\s,]+/).map(parseFloat)

  if (parts.length !== 4 || parts.some(isNaN)) {
    return null
  }

  return {
    minX: parts[0],
    minY: parts[1],
    width: parts[2],
    height: parts[3]
  }
}

/**
 * Format viewBox as string, rounded to whole units
 */
export function formatViewBox(viewBox: ViewBox): string {
  return [viewBox.minX, viewBox.minY, viewBox.width, viewBox.height]
    .map(value => value.toFixed(0))
    .join(' ')
}

export function getViewBox(svg: SvgDocument): ViewBox | null {
  return parseViewBox(svg.root.getAttribute('viewBox'))
}

export function setViewBox(svg: SvgDocument, viewBox: ViewBox): void {
  svg.root.setAttribute('viewBox', formatViewBox(viewBox))
}

/**
 * Smallest viewBox enclosing both inputs
 */
export function mergeViewBoxes(a: ViewBox, b: ViewBox): ViewBox {
  const minX = Math.min(a.minX, b.minX)
  const minY = Math.min(a.minY, b.minY)
  const maxX = Math.max(a.minX + a.width, b.minX + b.width)
  const maxY = Math.max(a.minY + a.height, b.minY + b.height)

  return {
    minX,
    minY,
    width: maxX - minX,
    height: maxY - minY
  }
}
