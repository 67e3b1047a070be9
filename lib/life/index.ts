export type { Bounds, Cell, Point, PointKey, Rng } from './types.js'
export {
  NEIGHBORHOOD_OFFSETS,
  addPoints,
  neighbors,
  parsePointKey,
  point,
  pointKey,
  pointsEqual,
  subtractPoints,
} from './point.js'
export { Grid } from './grid.js'
export { formatCell, formatGrid, formatPoint } from './format.js'
export { randomInt, seededRandom } from './random.js'
export { SimulationEngine } from './engine.js'
export type { GridListener } from './engine.js'
export {
  DEFAULT_PATTERN,
  PatternError,
  getPattern,
  hasPattern,
  listPatterns,
  parsePattern,
} from './patterns.js'
export type { PatternEntry } from './patterns.js'
