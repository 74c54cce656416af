// SVG document module exports

export type {
  ViewBox,
  SvgDocument,
} from './types'

export {
  parseSvgDocument,
  serializeSvgDocument,
  getPathElements,
  createSvgElement,
  setDimensions,
} from './document'

export {
  parseViewBox,
  formatViewBox,
  getViewBox,
  setViewBox,
  mergeViewBoxes,
} from './viewBoxUtils'

export {
  applyPathAttributes,
  applyLaserCutStyle,
  applyLaserEtchStyle,
  applyRasterRenderStyle,
} from './styles'

export { importPaths } from './importPaths'

export { addHighlightLines } from './highlight'

export { removeRedundantPaths } from './redundantPaths'

export type {
  OutputStyle,
  PrepareOptions,
  PrepareResult,
} from './pipeline'

export {
  OUTPUT_STYLES,
  isOutputStyle,
  prepareDrawings,
} from './pipeline'
