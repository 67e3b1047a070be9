/**
 * Named seed patterns and the plaintext row parser.
 *
 * Rows use `O` (or `*`) for alive cells and `.` (or space) for dead ones.
 * Row index maps to y and column index to x, both offset by `origin`.
 */

import catalog from './patterns.json'
import { addPoints, point } from './point.js'
import type { Point } from './types.js'

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class PatternError extends Error {
  readonly pattern: string | undefined

  constructor(message: string, pattern?: string) {
    super(message)
    this.name = 'PatternError'
    this.pattern = pattern
  }
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export interface PatternEntry {
  /** still-life, oscillator, spaceship or methuselah. */
  category: string
  rows: string[]
}

const PATTERNS: Record<string, PatternEntry> = catalog

export const DEFAULT_PATTERN = 'block'

export function listPatterns(): string[] {
  return Object.keys(PATTERNS).sort()
}

export function hasPattern(name: string): boolean {
  return Object.hasOwn(PATTERNS, name)
}

/** Points of a catalog pattern, placed with its top-left cell at `origin`. */
export function getPattern(name: string, origin: Point = point(0, 0)): Point[] {
  if (!hasPattern(name)) {
    throw new PatternError(
      `Unknown pattern "${name}". Available: ${listPatterns().join(', ')}`,
      name,
    )
  }
  return parsePattern(PATTERNS[name].rows, origin, name)
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parsePattern(
  rows: readonly string[],
  origin: Point = point(0, 0),
  name?: string,
): Point[] {
  const points: Point[] = []

  rows.forEach((row, y) => {
    Array.from(row).forEach((ch, x) => {
      if (ch === 'O' || ch === '*') {
        points.push(addPoints(origin, point(x, y)))
      } else if (ch !== '.' && ch !== ' ') {
        throw new PatternError(
          `Unexpected character "${ch}" at row ${y}, column ${x}`,
          name,
        )
      }
    })
  })

  return points
}
