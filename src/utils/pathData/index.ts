// Path data module - parse, serialize and measure SVG path primitives

export type {
  MovePrimitive,
  LinePrimitive,
  CubicPrimitive,
  QuadraticPrimitive,
  ArcPrimitive,
  ClosePrimitive,
  PathPrimitive,
  PrimitiveType,
} from './types'

export { PathDataError } from './errors'

export { parsePathData } from './parsing'

export {
  formatNumber,
  serializePathData,
} from './serialization'

export { primitiveLength } from './measurement'
