// Public API

export * from './utils/geometry'
export * from './utils/pathData'
export * from './utils/redundantLines'
export * from './utils/svgDocument'
export {
  REDUNDANT_LINES,
  PATH_DATA,
  LASER_STYLES,
  HIGHLIGHT,
  DIMENSION_UNIT,
} from './constants'
export type { PathAttributes } from './constants'
