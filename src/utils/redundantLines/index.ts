// Redundant line removal module exports

export type {
  SlopeIntercept,
  SegmentRecord,
  Bucket,
  TrackedSegment,
  RemovalSet,
  UpdateSet,
  ReductionState,
  BucketIndex,
  OverlapKind,
  ReducerLogger,
  ReducerOptions,
  ResolvedReducerOptions,
  BucketReduction,
  ReductionStats,
  ReductionResult,
} from './types'

export {
  GeometryAssertionError,
  ExceededMaxPassesError,
} from './errors'

export { resolveReducerOptions } from './options'

export {
  slopeIntercept,
  areCollinear,
  slopeInterceptKey,
  classifyOverlap,
  longestSpan,
} from './predicates'

export { bucketSegments } from './bucketing'

export {
  pairwiseOverlapPass,
  reduceBucket,
} from './overlapCheck'

export { reconstructPaths } from './reconstruction'

export { reduceRedundantLines } from './removeRedundantLines'
