// Geometry module - re-exports all geometry utilities

// Types
export type {
  Point,
  LineSegment,
  SegmentBounds,
} from './types'

// Math utilities
export {
  distance,
  segmentLength,
  segmentBounds,
  pointsEqual,
  copySegment,
} from './math'
