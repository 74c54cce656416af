// Combine the paths of several drawings onto one canvas

import { DIMENSION_UNIT } from '../../constants'
import { getPathElements, setDimensions } from './document'
import type { SvgDocument } from './types'
import { getViewBox, mergeViewBoxes, setViewBox } from './viewBoxUtils'

/**
 * Copy every path of `source` into `target`, then grow the target's
 * viewBox and physical size to enclose both drawings.
 */
export function importPaths(target: SvgDocument, source: SvgDocument): void {
  const targetViewBox = getViewBox(target)
  const sourceViewBox = getViewBox(source)
  if (!targetViewBox || !sourceViewBox) {
    throw new Error('Both documents need a valid viewBox to be combined')
  }

  for (const path of getPathElements(source)) {
    target.root.appendChild(target.document.importNode(path, true))
  }

  const merged = mergeViewBoxes(sourceViewBox, targetViewBox)
  setViewBox(target, merged)
  setDimensions(
    target,
    `${merged.width.toFixed(0)}${DIMENSION_UNIT}`,
    `${merged.height.toFixed(0)}${DIMENSION_UNIT}`
  )
}
