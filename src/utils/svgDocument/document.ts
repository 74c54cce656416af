// Parse, serialize and query SVG documents

import { DOMParser, XMLSerializer } from '@xmldom/xmldom'
import type { Element } from '@xmldom/xmldom'
import type { SvgDocument } from './types'

export function parseSvgDocument(content: string): SvgDocument {
  const parser = new DOMParser()
  const document = parser.parseFromString(content, 'image/svg+xml')
  const root = document.documentElement
  if (!root || root.localName !== 'svg') {
    throw new Error('No SVG element found in content')
  }
  return { document, root }
}

export function serializeSvgDocument(svg: SvgDocument): string {
  const serializer = new XMLSerializer()
  return serializer.serializeToString(svg.document)
}

/**
 * Every <path> below the root, in document order. Matched by local name in
 * the root's namespace, so prefixed elements are found too. Returned as a
 * snapshot so paths appended afterwards are not picked up.
 */
export function getPathElements(svg: SvgDocument): Element[] {
  const namespace = svg.root.namespaceURI
  const nodes = namespace
    ? svg.root.getElementsByTagNameNS(namespace, 'path')
    : svg.root.getElementsByTagName('path')
  const paths: Element[] = []
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i)
    if (node) paths.push(node)
  }
  return paths
}

/**
 * Create an element in the root's namespace so it serializes without
 * an empty xmlns override
 */
export function createSvgElement(svg: SvgDocument, tagName: string): Element {
  const namespace = svg.root.namespaceURI
  return namespace
    ? svg.document.createElementNS(namespace, tagName)
    : svg.document.createElement(tagName)
}

export function setDimensions(svg: SvgDocument, width: string, height: string): void {
  svg.root.setAttribute('width', width)
  svg.root.setAttribute('height', height)
}
