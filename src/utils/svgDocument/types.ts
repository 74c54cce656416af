// SVG document types

import type { Document, Element } from '@xmldom/xmldom'

export interface ViewBox {
  minX: number
  minY: number
  width: number
  height: number
}

/**
 * A parsed SVG file: the owning document (for creating and importing
 * nodes) and its root <svg> element.
 */
export interface SvgDocument {
  document: Document
  root: Element
}
