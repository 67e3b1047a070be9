/**
 * Sparse Game of Life grid on the unbounded integer plane.
 *
 * Only alive cells are stored, keyed by their PointKey, each carrying the
 * generation it was born in. Anything absent from the map is dead, so memory
 * grows with the population rather than with the area covered.
 *
 * tick() evaluates survivals and births against the pre-tick map and swaps
 * in a freshly built map afterwards. No React, no I/O -- pure TypeScript.
 */

import { formatGrid } from './format.js'
import { neighbors, point, pointKey } from './point.js'
import { randomInt } from './random.js'
import type { Bounds, Cell, Point, PointKey, Rng } from './types.js'

type CellMap = Map<PointKey, Cell>

/** Fraction of a rectangle's area sampled by Grid.random (8/10). */
const RANDOM_DENSITY_NUMERATOR = 8
const RANDOM_DENSITY_DENOMINATOR = 10

export class Grid {
  private _cells: CellMap
  private _generation: number

  private constructor(cells: CellMap, generation: number) {
    this._cells = cells
    this._generation = generation
  }

  // -----------------------------------------------------------------------
  // Construction
  // -----------------------------------------------------------------------

  static empty(): Grid {
    return new Grid(new Map(), 0)
  }

  /** Every distinct point becomes alive at generation 0. */
  static withPoints(points: Iterable<Point>): Grid {
    const grid = Grid.empty()
    for (const p of points) {
      grid.addPoint(p)
    }
    return grid
  }

  /**
   * Scatter cells uniformly over [topLeft, bottomRight).
   *
   * Samples floor(area * 0.8) points; repeated draws collapse, so the
   * resulting population is at most that and usually somewhat less.
   */
  static random(topLeft: Point, bottomRight: Point, rng: Rng = Math.random): Grid {
    const grid = Grid.empty()
    const width = bottomRight.x - topLeft.x
    const height = bottomRight.y - topLeft.y
    if (width <= 0 || height <= 0) return grid

    const desired = Math.floor(
      (width * height * RANDOM_DENSITY_NUMERATOR) / RANDOM_DENSITY_DENOMINATOR,
    )
    for (let i = 0; i < desired; i++) {
      grid.addPoint({
        x: randomInt(rng, topLeft.x, bottomRight.x),
        y: randomInt(rng, topLeft.y, bottomRight.y),
      })
    }
    return grid
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  /** Current simulation step, starting at 0. */
  get generation(): number {
    return this._generation
  }

  /** Number of alive cells. */
  get population(): number {
    return this._cells.size
  }

  isAlive(p: Point): boolean {
    return this._cells.has(pointKey(p))
  }

  /** Generation the cell at `p` was born in, or undefined when dead. */
  birthOf(p: Point): number | undefined {
    return this._cells.get(pointKey(p))?.born
  }

  /** Generations since the cell at `p` was born, or undefined when dead. */
  ageOfPoint(p: Point): number | undefined {
    const born = this.birthOf(p)
    return born === undefined ? undefined : this._generation - born
  }

  /** Snapshot of alive cells ordered by y, then x. */
  cells(): Cell[] {
    return Array.from(this._cells.values()).sort(
      (a, b) => a.point.y - b.point.y || a.point.x - b.point.x,
    )
  }

  /** Inclusive bounding box of the alive cells, or null for an empty grid. */
  bounds(): Bounds | null {
    if (this._cells.size === 0) return null

    let minX = Infinity
    let minY = Infinity
    let maxX = -Infinity
    let maxY = -Infinity
    for (const { point: p } of this._cells.values()) {
      if (p.x < minX) minX = p.x
      if (p.y < minY) minY = p.y
      if (p.x > maxX) maxX = p.x
      if (p.y > maxY) maxY = p.y
    }
    return { min: point(minX, minY), max: point(maxX, maxY) }
  }

  // -----------------------------------------------------------------------
  // Mutation
  // -----------------------------------------------------------------------

  /**
   * Bring `p` to life, stamped with the current generation.
   *
   * An already alive cell keeps its original birth generation.
   */
  addPoint(p: Point): this {
    const key = pointKey(p)
    if (!this._cells.has(key)) {
      this._cells.set(key, { point: point(p.x, p.y), born: this._generation })
    }
    return this
  }

  removePoint(p: Point): this {
    this._cells.delete(pointKey(p))
    return this
  }

  /**
   * Advance the simulation by one generation (B3/S23).
   *
   * The generation counter moves first so cells born in this tick carry the
   * new value. Survivors keep their birth generation.
   */
  tick(): this {
    this._generation++
    const snapshot = this._cells
    const next: CellMap = new Map()

    for (const [key, cell] of snapshot) {
      const count = countNeighbors(snapshot, cell.point)
      if (count > 1 && count < 4) {
        next.set(key, cell)
      }
    }

    for (const [key, candidate] of deadCandidates(snapshot)) {
      if (countNeighbors(snapshot, candidate) === 3) {
        next.set(key, { point: candidate, born: this._generation })
      }
    }

    this._cells = next
    return this
  }

  /** Run `ticks` generations. Throws RangeError unless `ticks` is a non-negative integer. */
  advance(ticks: number): this {
    if (!Number.isInteger(ticks) || ticks < 0) {
      throw new RangeError(`advance expects a non-negative integer, got ${ticks}`)
    }
    for (let i = 0; i < ticks; i++) {
      this.tick()
    }
    return this
  }

  toString(): string {
    return formatGrid(this)
  }
}

// ---------------------------------------------------------------------------
// Neighbor helpers (always read the pre-tick snapshot)
// ---------------------------------------------------------------------------

function countNeighbors(snapshot: CellMap, p: Point): number {
  let count = 0
  for (const n of neighbors(p)) {
    if (snapshot.has(pointKey(n))) count++
  }
  return count
}

/** Dead cells bordering at least one alive cell, each listed once. */
function deadCandidates(snapshot: CellMap): Map<PointKey, Point> {
  const candidates = new Map<PointKey, Point>()
  for (const cell of snapshot.values()) {
    for (const n of neighbors(cell.point)) {
      const key = pointKey(n)
      if (!snapshot.has(key) && !candidates.has(key)) {
        candidates.set(key, n)
      }
    }
  }
  return candidates
}
