// End-to-end preparation of one or more drawings for a laser pass

import { HIGHLIGHT } from '../../constants'
import type { ReducerOptions, ReductionResult } from '../redundantLines'
import { parseSvgDocument, serializeSvgDocument } from './document'
import { addHighlightLines } from './highlight'
import { importPaths } from './importPaths'
import { removeRedundantPaths } from './redundantPaths'
import { applyLaserCutStyle, applyLaserEtchStyle, applyRasterRenderStyle } from './styles'
import type { SvgDocument } from './types'

export type OutputStyle = 'cut' | 'etch' | 'raster'

export const OUTPUT_STYLES: readonly OutputStyle[] = ['cut', 'etch', 'raster']

export interface PrepareOptions {
  style: OutputStyle
  removeRedundant?: boolean   // Default true
  highlight?: boolean         // Overlay removed/merged lines, default false
  reducer?: ReducerOptions
}

export interface PrepareResult {
  svg: string
  reduction: ReductionResult | null
}

const STYLE_APPLIERS: Record<OutputStyle, (svg: SvgDocument) => void> = {
  cut: applyLaserCutStyle,
  etch: applyLaserEtchStyle,
  raster: applyRasterRenderStyle,
}

export function isOutputStyle(value: string): value is OutputStyle {
  return (OUTPUT_STYLES as readonly string[]).includes(value)
}

/**
 * Merge every drawing into the first, drop redundant lines, apply the
 * pass style and serialize. Highlights are added after styling so they
 * keep their own colors.
 */
export function prepareDrawings(contents: string[], options: PrepareOptions): PrepareResult {
  if (contents.length === 0) {
    throw new Error('At least one SVG document is required')
  }

  const [target, ...sources] = contents.map(parseSvgDocument)
  for (const source of sources) {
    importPaths(target, source)
  }

  const reduction = options.removeRedundant === false
    ? null
    : removeRedundantPaths(target, options.reducer)

  STYLE_APPLIERS[options.style](target)

  if (options.highlight && reduction) {
    addHighlightLines(target, reduction.removed, HIGHLIGHT.REMOVED_COLOR)
    addHighlightLines(target, reduction.merged, HIGHLIGHT.MERGED_COLOR)
  }

  return { svg: serializeSvgDocument(target), reduction }
}
