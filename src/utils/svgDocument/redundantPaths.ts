// Remove redundant lines across every path of a document

import { parsePathData, serializePathData } from '../pathData'
import { reduceRedundantLines } from '../redundantLines'
import type { ReducerOptions, ReductionResult } from '../redundantLines'
import { getPathElements } from './document'
import type { SvgDocument } from './types'

/**
 * Reduce the lines of all <path> elements together, so overlaps between
 * different paths are found. Path data is only rewritten once the whole
 * reduction has succeeded. Paths without a d attribute are skipped.
 */
export function removeRedundantPaths(svg: SvgDocument, options: ReducerOptions = {}): ReductionResult {
  const elements = getPathElements(svg).filter(element => element.hasAttribute('d'))
  const paths = elements.map(element => parsePathData(element.getAttribute('d') ?? ''))

  const result = reduceRedundantLines(paths, options)

  elements.forEach((element, index) => {
    element.setAttribute('d', serializePathData(result.paths[index]))
  })
  return result
}
