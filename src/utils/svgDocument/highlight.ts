// Translucent overlays marking removed or merged lines

import { HIGHLIGHT } from '../../constants'
import type { LineSegment } from '../geometry'
import { serializePathData } from '../pathData'
import { createSvgElement } from './document'
import type { SvgDocument } from './types'

export function addHighlightLines(svg: SvgDocument, segments: LineSegment[], color: string): void {
  for (const segment of segments) {
    const path = createSvgElement(svg, 'path')
    path.setAttribute('d', serializePathData([{ type: 'line', start: segment.start, end: segment.end }]))
    path.setAttribute('fill', 'none')
    path.setAttribute('stroke', color)
    path.setAttribute('stroke-width', HIGHLIGHT.STROKE_WIDTH)
    path.setAttribute('stroke-opacity', HIGHLIGHT.STROKE_OPACITY)
    svg.root.appendChild(path)
  }
}
