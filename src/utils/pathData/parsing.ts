// SVG path data parsing

import type { Point } from '../geometry'
import type { PathPrimitive } from './types'
import { PathDataError } from './errors'

const COMMANDS = 'MmLlHhVvCcSsQqTtAaZz'
const NUMBER_PATTERN = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/y
const SEPARATOR_PATTERN = /[\s,]/

/**
 * Cursor over a d attribute. Numbers may be packed without separators
 * ("1-2", ".5.5") and arc flags may be written as single digits ("011").
 */
class PathDataScanner {
  private position = 0

  constructor(private readonly d: string) {}

  atEnd(): boolean {
    this.skipSeparators()
    return this.position >= this.d.length
  }

  hasNumber(): boolean {
    this.skipSeparators()
    const char: string | undefined = this.d[this.position]
    return char !== undefined && /[\d.+-]/.test(char)
  }

  readCommand(): string {
    this.skipSeparators()
    const char: string | undefined = this.d[this.position]
    if (char === undefined || !COMMANDS.includes(char)) {
      throw new PathDataError(`Expected a path command but found "${char ?? 'end of data'}"`, this.position)
    }
    this.position++
    return char
  }

  readNumber(): number {
    this.skipSeparators()
    NUMBER_PATTERN.lastIndex = this.position
    const match = NUMBER_PATTERN.exec(this.d)
    if (!match) {
      throw new PathDataError('Expected a number', this.position)
    }
    this.position += match[0].length
    return parseFloat(match[0])
  }

  readFlag(): boolean {
    this.skipSeparators()
    const char: string | undefined = this.d[this.position]
    if (char !== '0' && char !== '1') {
      throw new PathDataError('Expected an arc flag (0 or 1)', this.position)
    }
    this.position++
    return char === '1'
  }

  private skipSeparators(): void {
    while (this.position < this.d.length && SEPARATOR_PATTERN.test(this.d[this.position])) {
      this.position++
    }
  }
}

function reflect(control: Point | null, around: Point): Point {
  if (!control) return { ...around }
  return { x: 2 * around.x - control.x, y: 2 * around.y - control.y }
}

/**
 * Parse a path d attribute into absolute primitives, one per drawn segment.
 * H and V become lines; S and T get their reflected control points resolved.
 */
export function parsePathData(d: string): PathPrimitive[] {
  const scanner = new PathDataScanner(d)
  const primitives: PathPrimitive[] = []
  let current: Point = { x: 0, y: 0 }
  let subpathStart: Point = { x: 0, y: 0 }
  let lastCubicControl: Point | null = null
  let lastQuadraticControl: Point | null = null

  while (!scanner.atEnd()) {
    const command = scanner.readCommand()
    const type = command.toUpperCase()
    const isRelative = command !== type

    const readPoint = (): Point => {
      const x = scanner.readNumber()
      const y = scanner.readNumber()
      return isRelative ? { x: current.x + x, y: current.y + y } : { x, y }
    }

    let firstArgs = true
    do {
      const start = current
      let cubicControl: Point | null = null
      let quadraticControl: Point | null = null

      switch (type) {
        case 'M': {
          const end = readPoint()
          // Extra coordinate pairs after a move are implicit line-tos
          if (firstArgs) {
            primitives.push({ type: 'move', start, end })
            subpathStart = end
          } else {
            primitives.push({ type: 'line', start, end })
          }
          current = end
          break
        }
        case 'L': {
          const end = readPoint()
          primitives.push({ type: 'line', start, end })
          current = end
          break
        }
        case 'H': {
          const x = scanner.readNumber()
          const end = { x: isRelative ? current.x + x : x, y: current.y }
          primitives.push({ type: 'line', start, end })
          current = end
          break
        }
        case 'V': {
          const y = scanner.readNumber()
          const end = { x: current.x, y: isRelative ? current.y + y : y }
          primitives.push({ type: 'line', start, end })
          current = end
          break
        }
        case 'C': {
          const control1 = readPoint()
          const control2 = readPoint()
          const end = readPoint()
          primitives.push({ type: 'cubic', start, control1, control2, end })
          cubicControl = control2
          current = end
          break
        }
        case 'S': {
          const control1 = reflect(lastCubicControl, start)
          const control2 = readPoint()
          const end = readPoint()
          primitives.push({ type: 'cubic', start, control1, control2, end })
          cubicControl = control2
          current = end
          break
        }
        case 'Q': {
          const control = readPoint()
          const end = readPoint()
          primitives.push({ type: 'quadratic', start, control, end })
          quadraticControl = control
          current = end
          break
        }
        case 'T': {
          const control = reflect(lastQuadraticControl, start)
          const end = readPoint()
          primitives.push({ type: 'quadratic', start, control, end })
          quadraticControl = control
          current = end
          break
        }
        case 'A': {
          const rx = scanner.readNumber()
          const ry = scanner.readNumber()
          const rotation = scanner.readNumber()
          const largeArc = scanner.readFlag()
          const sweep = scanner.readFlag()
          const end = readPoint()
          primitives.push({
            type: 'arc',
            start,
            radius: { x: rx, y: ry },
            rotation,
            largeArc,
            sweep,
            end,
          })
          current = end
          break
        }
        case 'Z': {
          primitives.push({ type: 'close', start, end: subpathStart })
          current = subpathStart
          break
        }
      }

      lastCubicControl = cubicControl
      lastQuadraticControl = quadraticControl
      firstArgs = false
    } while (type !== 'Z' && scanner.hasNumber())
  }

  return primitives
}
