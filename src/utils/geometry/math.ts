// Math utilities for geometry operations

import type { LineSegment, Point, SegmentBounds } from './types'

/**
 * Calculate distance between two points
 */
export function distance(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x
  const dy = p2.y - p1.y
  return Math.sqrt(dx * dx + dy * dy)
}

export function segmentLength(segment: LineSegment): number {
  return distance(segment.start, segment.end)
}

/**
 * Min/max x and y of a segment, independent of endpoint order
 */
export function segmentBounds(segment: LineSegment): SegmentBounds {
  const { start, end } = segment
  return {
    minX: Math.min(start.x, end.x),
    maxX: Math.max(start.x, end.x),
    minY: Math.min(start.y, end.y),
    maxY: Math.max(start.y, end.y),
  }
}

export function pointsEqual(p1: Point, p2: Point): boolean {
  return p1.x === p2.x && p1.y === p2.y
}

export function copySegment(segment: LineSegment): LineSegment {
  return {
    start: { x: segment.start.x, y: segment.start.y },
    end: { x: segment.end.x, y: segment.end.y },
  }
}
