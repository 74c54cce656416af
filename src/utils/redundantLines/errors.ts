// Fatal conditions raised while removing redundant lines

/**
 * Input geometry contradicted an assumption the reduction relies on
 * (inconsistent intercepts, a containing line shorter than the one it
 * contains, or bookkeeping that no longer lines up with the paths).
 */
export class GeometryAssertionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GeometryAssertionError'
  }
}

export class ExceededMaxPassesError extends Error {
  readonly bucketKey: string
  readonly maxPasses: number

  constructor(bucketKey: string, maxPasses: number) {
    super(`Exceeded the max number of pairwise overlap check passes (${maxPasses}) for bucket ${bucketKey}`)
    this.name = 'ExceededMaxPassesError'
    this.bucketKey = bucketKey
    this.maxPasses = maxPasses
  }
}
