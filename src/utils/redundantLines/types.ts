// Redundant line removal types

import type { LineSegment } from '../geometry'
import type { PathPrimitive } from '../pathData'
import type { ExceededMaxPassesError } from './errors'

/** slope is null for vertical lines; intercept is then the x-coordinate */
export interface SlopeIntercept {
  slope: number | null
  intercept: number
}

/**
 * A bucketed line. Indices are assigned once during extraction and never
 * renumbered; `slot` addresses the line's current geometry in the arena.
 */
export interface SegmentRecord {
  overallIndex: number
  pathIndex: number
  lineIndex: number
  slot: number
}

/** Records sharing one rounded slope/intercept key, in scan order */
export type Bucket = SegmentRecord[]

export interface TrackedSegment {
  pathIndex: number
  lineIndex: number
  segment: LineSegment
}

// Both keyed by overallIndex; an index lives in at most one of the two
export type RemovalSet = Map<number, TrackedSegment>
export type UpdateSet = Map<number, TrackedSegment>

export interface ReductionState {
  arena: LineSegment[]
  removals: RemovalSet
  updates: UpdateSet
}

export interface BucketIndex {
  buckets: Map<string, Bucket>
  arena: LineSegment[]
}

export type OverlapKind =
  | 'first-contains-second'
  | 'second-contains-first'
  | 'partial'
  | 'disjoint'

export type ReducerLogger = Pick<Console, 'log'>

export interface ReducerOptions {
  tolerance?: number
  keyPrecision?: number
  maxPasses?: number
  logger?: ReducerLogger
}

export type ResolvedReducerOptions = Required<ReducerOptions>

export type BucketReduction =
  | { ok: true; passes: number }
  | { ok: false; error: ExceededMaxPassesError }

export interface ReductionStats {
  removedCount: number
  removedLength: number
  keptCount: number
  keptLength: number
}

export interface ReductionResult {
  paths: PathPrimitive[][]
  removed: LineSegment[]
  merged: LineSegment[]
  stats: ReductionStats
}
