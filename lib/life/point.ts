/**
 * Point arithmetic and Moore-neighborhood enumeration.
 */

import type { Point, PointKey } from './types.js'

export function point(x: number, y: number): Point {
  return { x, y }
}

export function addPoints(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y }
}

export function subtractPoints(a: Point, b: Point): Point {
  return { x: a.x - b.x, y: a.y - b.y }
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y
}

/** Convenience helpers for PointKey coordinate keys. */
export function pointKey(p: Point): PointKey {
  return `${p.x},${p.y}`
}

export function parsePointKey(key: PointKey): Point {
  const i = key.indexOf(',')
  return { x: Number(key.slice(0, i)), y: Number(key.slice(i + 1)) }
}

// ---------------------------------------------------------------------------
// Neighborhood
// ---------------------------------------------------------------------------

/** Offsets of the 8 surrounding cells, in a fixed order. */
export const NEIGHBORHOOD_OFFSETS: readonly Point[] = [
  { x: -1, y: 1 },
  { x: 0, y: 1 },
  { x: 1, y: 1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 },
  { x: -1, y: -1 },
  { x: 0, y: -1 },
  { x: 1, y: -1 },
]

/** The 8 Moore neighbors of `p`, in NEIGHBORHOOD_OFFSETS order. */
export function neighbors(p: Point): Point[] {
  return NEIGHBORHOOD_OFFSETS.map((offset) => addPoints(p, offset))
}
