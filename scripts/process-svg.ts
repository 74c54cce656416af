#!/usr/bin/env npx tsx
/**
 * Prepare SVG drawings for the laser
 *
 * Combines all inputs onto one canvas, removes lines that retrace other
 * lines, applies the cut/etch/raster style and writes the result.
 *
 * Run with: npx tsx scripts/process-svg.ts part.svg [more.svg ...] --output out.svg
 *   [--style cut|etch|raster] [--keep-redundant] [--highlight] [--tolerance 0.001]
 */

import * as fs from 'fs'
import * as path from 'path'
import {
  OUTPUT_STYLES,
  isOutputStyle,
  prepareDrawings,
} from '../src/utils/svgDocument'
import type { OutputStyle } from '../src/utils/svgDocument'

interface CliOptions {
  inputs: string[]
  output: string
  style: OutputStyle
  removeRedundant: boolean
  highlight: boolean
  tolerance?: number
}

const USAGE = 'Usage: process-svg <input.svg>... --output <file> [--style cut|etch|raster] [--keep-redundant] [--highlight] [--tolerance <n>]'

function parseArgs(args: string[]): CliOptions {
  const inputs: string[] = []
  let output: string | null = null
  let style: OutputStyle = 'cut'
  let removeRedundant = true
  let highlight = false
  let tolerance: number | undefined

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--output':
      case '-o':
        output = args[++i] ?? null
        break
      case '--style': {
        const value = args[++i] ?? ''
        if (!isOutputStyle(value)) {
          throw new Error(`Unknown style "${value}", expected one of ${OUTPUT_STYLES.join(', ')}`)
        }
        style = value
        break
      }
      case '--keep-redundant':
        removeRedundant = false
        break
      case '--highlight':
        highlight = true
        break
      case '--tolerance': {
        const value = parseFloat(args[++i] ?? '')
        if (!(value > 0)) {
          throw new Error('--tolerance needs a positive number')
        }
        tolerance = value
        break
      }
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option ${arg}`)
        }
        inputs.push(arg)
    }
  }

  if (inputs.length === 0) throw new Error('No input files given')
  if (!output) throw new Error('--output is required')

  return { inputs, output, style, removeRedundant, highlight, tolerance }
}

function main() {
  let options: CliOptions
  try {
    options = parseArgs(process.argv.slice(2))
  } catch (err) {
    console.error(`[process-svg] ${err instanceof Error ? err.message : String(err)}`)
    console.error(USAGE)
    process.exitCode = 1
    return
  }

  try {
    const contents = options.inputs.map(input => fs.readFileSync(input, 'utf-8'))
    const { svg, reduction } = prepareDrawings(contents, {
      style: options.style,
      removeRedundant: options.removeRedundant,
      highlight: options.highlight,
      reducer: options.tolerance === undefined ? {} : { tolerance: options.tolerance },
    })

    fs.mkdirSync(path.dirname(path.resolve(options.output)), { recursive: true })
    fs.writeFileSync(options.output, svg)

    if (reduction) {
      console.log(`[process-svg] ${reduction.removed.length} lines removed, ${reduction.merged.length} lines merged`)
    }
    console.log(`[process-svg] Wrote ${options.output}`)
  } catch (err) {
    console.error(`[process-svg] Failed to process ${options.inputs.join(', ')}:`, err)
    process.exitCode = 1
  }
}

main()
