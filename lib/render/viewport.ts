/**
 * Renderer-side window onto the unbounded plane.
 *
 * A Viewport selects `width x height` cells starting at `origin`; screen
 * column c and row r show the cell at (origin.x + c, origin.y + r). The
 * Grid knows nothing about viewports: pan state lives here, and the only
 * thing read from the grid is the age of each visible coordinate.
 */

import type { Grid } from '@/lib/life/grid.js'
import { addPoints, point } from '@/lib/life/point.js'
import type { Point } from '@/lib/life/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Viewport {
  readonly origin: Point
  readonly width: number
  readonly height: number
}

/**
 * Maps screen coordinates to shade indices.
 *
 * Key format: "col,row" relative to the viewport. Dead cells are absent.
 */
export type ShadeGrid = Map<string, number>

/** Hex colors from newborn (index 0) to oldest. */
export const AGE_SHADES: readonly string[] = [
  '#ffffff',
  '#e0f2fe',
  '#bae6fd',
  '#7dd3fc',
  '#38bdf8',
  '#0ea5e9',
  '#0284c7',
  '#0369a1',
]

// ---------------------------------------------------------------------------
// Shading
// ---------------------------------------------------------------------------

/** Newborn cells get shade 0; each generation of age dims by one step. */
export function ageToShade(age: number, shadeCount: number = AGE_SHADES.length): number {
  if (shadeCount <= 0) return -1
  return Math.min(Math.max(age, 0), shadeCount - 1)
}

/** Query the age of every visible coordinate and shade the alive ones. */
export function toShadeGrid(
  grid: Grid,
  viewport: Viewport,
  shadeCount: number = AGE_SHADES.length,
): ShadeGrid {
  const shades: ShadeGrid = new Map()
  for (let row = 0; row < viewport.height; row++) {
    for (let col = 0; col < viewport.width; col++) {
      const age = grid.ageOfPoint(addPoints(viewport.origin, point(col, row)))
      if (age !== undefined) {
        shades.set(`${col},${row}`, ageToShade(age, shadeCount))
      }
    }
  }
  return shades
}

// ---------------------------------------------------------------------------
// Navigation
// ---------------------------------------------------------------------------

export function panViewport(viewport: Viewport, delta: Point): Viewport {
  return { ...viewport, origin: addPoints(viewport.origin, delta) }
}

/** A viewport centered on the grid's population, or on (0, 0) when empty. */
export function centerViewport(grid: Grid, width: number, height: number): Viewport {
  const bounds = grid.bounds()
  const center = bounds
    ? point(
        Math.floor((bounds.min.x + bounds.max.x) / 2),
        Math.floor((bounds.min.y + bounds.max.y) / 2),
      )
    : point(0, 0)

  return {
    origin: point(center.x - Math.floor(width / 2), center.y - Math.floor(height / 2)),
    width,
    height,
  }
}
