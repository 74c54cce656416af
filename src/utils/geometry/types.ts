// Geometry type definitions

export interface Point {
  x: number
  y: number
}

/**
 * A straight line between two points. Endpoint order is preserved as drawn.
 */
export interface LineSegment {
  start: Point
  end: Point
}

/**
 * Axis-aligned extent of a segment; a line may be specified with its
 * endpoints in either order, so comparisons go through min/max values.
 */
export interface SegmentBounds {
  minX: number
  maxX: number
  minY: number
  maxY: number
}
