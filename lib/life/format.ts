/**
 * Human-readable dump of a grid's state.
 *
 * Example: `Grid { generation: 3, population: 2, cells: [(0, 0) born 0, (1, 0) born 3] }`
 *
 * Intended for logs and the `run` command; not a stable or parseable format.
 */

import type { Grid } from './grid.js'
import type { Cell, Point } from './types.js'

export function formatPoint(p: Point): string {
  return `(${p.x}, ${p.y})`
}

export function formatCell(cell: Cell): string {
  return `${formatPoint(cell.point)} born ${cell.born}`
}

export function formatGrid(grid: Grid): string {
  const cells = grid.cells().map(formatCell).join(', ')
  return `Grid { generation: ${grid.generation}, population: ${grid.population}, cells: [${cells}] }`
}
