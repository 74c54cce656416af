// Presentation attributes for each output pass

import { LASER_STYLES } from '../../constants'
import type { PathAttributes } from '../../constants'
import { getPathElements } from './document'
import type { SvgDocument } from './types'

export function applyPathAttributes(svg: SvgDocument, attributes: PathAttributes): void {
  for (const path of getPathElements(svg)) {
    for (const [name, value] of Object.entries(attributes)) {
      path.setAttribute(name, value)
    }
  }
}

export function applyLaserCutStyle(svg: SvgDocument): void {
  applyPathAttributes(svg, LASER_STYLES.CUT)
}

export function applyLaserEtchStyle(svg: SvgDocument): void {
  applyPathAttributes(svg, LASER_STYLES.ETCH)
}

export function applyRasterRenderStyle(svg: SvgDocument): void {
  applyPathAttributes(svg, LASER_STYLES.RASTER)
}
