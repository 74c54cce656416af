// Path data error types

export class PathDataError extends Error {
  readonly position: number

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`)
    this.name = 'PathDataError'
    this.position = position
  }
}
