import { describe, it, expect } from 'vitest'
import { ExceededMaxPassesError } from '../utils/redundantLines'
import {
  addHighlightLines,
  applyLaserCutStyle,
  applyLaserEtchStyle,
  formatViewBox,
  getPathElements,
  importPaths,
  isOutputStyle,
  mergeViewBoxes,
  parseSvgDocument,
  parseViewBox,
  prepareDrawings,
  removeRedundantPaths,
} from '../utils/svgDocument'

const silent = { log: () => {} }

const SAMPLE = '<svg xmlns="http://www.w3.org/2000/svg" width="20mm" height="10mm" viewBox="0 0 20 10">' +
  '<path d="M 0 0 L 5 0"/><path d="M 3 0 L 10 0"/></svg>'

const OFFSET = '<svg xmlns="http://www.w3.org/2000/svg" viewBox="-5,0,10,22"><path d="M -5 0 L 0 0"/></svg>'

function pathData(svg: string): (string | null)[] {
  return getPathElements(parseSvgDocument(svg)).map(path => path.getAttribute('d'))
}

describe('parseSvgDocument', () => {
  it('should expose the root svg element', () => {
    const svg = parseSvgDocument(SAMPLE)

    expect(svg.root.tagName).toBe('svg')
    expect(getPathElements(svg)).toHaveLength(2)
  })

  it('should accept a prefixed svg root', () => {
    const svg = parseSvgDocument(
      '<svg:svg xmlns:svg="http://www.w3.org/2000/svg" viewBox="0 0 10 10"><svg:path d="M 0 0 L 1 0"/></svg:svg>'
    )

    expect(svg.root.localName).toBe('svg')
    expect(getPathElements(svg).map(path => path.getAttribute('d'))).toEqual(['M 0 0 L 1 0'])
  })

  it('should reject documents without an svg root', () => {
    expect(() => parseSvgDocument('<notsvg/>')).toThrow('No SVG element found in content')
  })
})

describe('viewBox utilities', () => {
  it('should parse comma and space separated values', () => {
    expect(parseViewBox('-5,0, 10 22')).toEqual({ minX: -5, minY: 0, width: 10, height: 22 })
  })

  it('should reject malformed values', () => {
    expect(parseViewBox(null)).toBeNull()
    expect(parseViewBox('0 0 10')).toBeNull()
    expect(parseViewBox('0 0 ten 10')).toBeNull()
  })

  it('should merge to the enclosing box', () => {
    const merged = mergeViewBoxes(
      { minX: -5, minY: 0, width: 10, height: 22 },
      { minX: 0, minY: 0, width: 20, height: 10 }
    )
    expect(merged).toEqual({ minX: -5, minY: 0, width: 25, height: 22 })
  })

  it('should format rounded to whole units', () => {
    expect(formatViewBox({ minX: -5, minY: 0, width: 25.6, height: 21.4 })).toBe('-5 0 26 21')
  })
})

describe('importPaths', () => {
  it('should copy paths and grow the canvas', () => {
    const target = parseSvgDocument(SAMPLE)
    importPaths(target, parseSvgDocument(OFFSET))

    expect(getPathElements(target).map(path => path.getAttribute('d'))).toEqual([
      'M 0 0 L 5 0',
      'M 3 0 L 10 0',
      'M -5 0 L 0 0',
    ])
    expect(target.root.getAttribute('viewBox')).toBe('-5 0 25 22')
    expect(target.root.getAttribute('width')).toBe('25mm')
    expect(target.root.getAttribute('height')).toBe('22mm')
  })

  it('should require a viewBox on both documents', () => {
    const target = parseSvgDocument(SAMPLE)
    const source = parseSvgDocument('<svg xmlns="http://www.w3.org/2000/svg"><path d="M 0 0 L 1 0"/></svg>')

    expect(() => importPaths(target, source)).toThrow('Both documents need a valid viewBox to be combined')
  })
})

describe('styles', () => {
  it('should apply the cut style to every path', () => {
    const svg = parseSvgDocument(SAMPLE)
    applyLaserCutStyle(svg)

    for (const path of getPathElements(svg)) {
      expect(path.getAttribute('fill')).toBe('none')
      expect(path.getAttribute('stroke')).toBe('#0000ff')
      expect(path.getAttribute('stroke-width')).toBe('0.1')
    }
  })

  it('should apply the etch style to every path', () => {
    const svg = parseSvgDocument(SAMPLE)
    applyLaserEtchStyle(svg)

    for (const path of getPathElements(svg)) {
      expect(path.getAttribute('fill')).toBe('#000000')
      expect(path.getAttribute('stroke')).toBe('none')
    }
  })
})

describe('removeRedundantPaths', () => {
  it('should reduce lines across paths and rewrite their data', () => {
    const svg = parseSvgDocument(SAMPLE)
    const result = removeRedundantPaths(svg, { logger: silent })

    expect(result.stats.removedCount).toBe(1)
    expect(getPathElements(svg).map(path => path.getAttribute('d'))).toEqual([
      'M 0,0',
      'M 3,0 M 0,0 L 10,0',
    ])
  })

  it('should skip paths without path data', () => {
    const svg = parseSvgDocument(
      '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 20 10"><path/><path d="M 0 0 L 5 0"/><path d="M 0 0 L 5 0"/></svg>'
    )
    const result = removeRedundantPaths(svg, { logger: silent })
    const [empty, first, second] = getPathElements(svg)

    expect(result.stats.removedCount).toBe(1)
    expect(empty.hasAttribute('d')).toBe(false)
    expect(first.getAttribute('d')).toBe('M 0,0 L 5,0')
    expect(second.getAttribute('d')).toBe('M 0,0')
  })

  it('should leave the document untouched when the reduction fails', () => {
    const svg = parseSvgDocument(SAMPLE)

    expect(() => removeRedundantPaths(svg, { logger: silent, maxPasses: 1 })).toThrow(ExceededMaxPassesError)
    expect(getPathElements(svg).map(path => path.getAttribute('d'))).toEqual([
      'M 0 0 L 5 0',
      'M 3 0 L 10 0',
    ])
  })
})

describe('addHighlightLines', () => {
  it('should append translucent lines in the svg namespace', () => {
    const svg = parseSvgDocument(SAMPLE)
    addHighlightLines(svg, [{ start: { x: 0, y: 0 }, end: { x: 5, y: 0 } }], '#ff0000')

    const paths = getPathElements(svg)
    const highlight = paths[paths.length - 1]
    expect(paths).toHaveLength(3)
    expect(highlight.namespaceURI).toBe('http://www.w3.org/2000/svg')
    expect(highlight.getAttribute('d')).toBe('M 0,0 L 5,0')
    expect(highlight.getAttribute('fill')).toBe('none')
    expect(highlight.getAttribute('stroke')).toBe('#ff0000')
    expect(highlight.getAttribute('stroke-width')).toBe('1')
    expect(highlight.getAttribute('stroke-opacity')).toBe('.45')
  })
})

describe('prepareDrawings', () => {
  it('should combine, reduce, style and highlight', () => {
    const { svg, reduction } = prepareDrawings([SAMPLE], {
      style: 'cut',
      highlight: true,
      reducer: { logger: silent },
    })

    expect(reduction?.removed).toEqual([{ start: { x: 0, y: 0 }, end: { x: 5, y: 0 } }])
    expect(pathData(svg)).toEqual([
      'M 0,0',
      'M 3,0 M 0,0 L 10,0',
      'M 0,0 L 5,0',
      'M 0,0 L 10,0',
    ])

    const paths = getPathElements(parseSvgDocument(svg))
    expect(paths[0].getAttribute('stroke')).toBe('#0000ff')
    expect(paths[2].getAttribute('stroke')).toBe('#ff0000')
    expect(paths[3].getAttribute('stroke')).toBe('#00ff00')
  })

  it('should reduce lines that only overlap once drawings are combined', () => {
    const other = '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 20 10"><path d="M 0 0 L 10 0"/></svg>'
    const { reduction } = prepareDrawings([SAMPLE, other], { style: 'raster', reducer: { logger: silent } })

    expect(reduction?.stats.removedCount).toBe(2)
    expect(reduction?.stats.keptLength).toBe(10)
  })

  it('should keep every line when reduction is disabled', () => {
    const { svg, reduction } = prepareDrawings([SAMPLE], { style: 'etch', removeRedundant: false })

    expect(reduction).toBeNull()
    expect(pathData(svg)).toEqual(['M 0 0 L 5 0', 'M 3 0 L 10 0'])
  })

  it('should require at least one drawing', () => {
    expect(() => prepareDrawings([], { style: 'cut' })).toThrow('At least one SVG document is required')
  })
})

describe('isOutputStyle', () => {
  it('should accept only known styles', () => {
    expect(isOutputStyle('cut')).toBe(true)
    expect(isOutputStyle('raster')).toBe(true)
    expect(isOutputStyle('engrave')).toBe(false)
  })
})
