/**
 * Core type definitions for the Life engine.
 *
 * Renderer-agnostic: shared between the headless driver and the terminal
 * view. No side effects on import.
 */

// ---------------------------------------------------------------------------
// Coordinates
// ---------------------------------------------------------------------------

/** An integer coordinate on the unbounded plane. */
export interface Point {
  readonly x: number
  readonly y: number
}

/**
 * Canonical string form of a Point, used to key Maps and Sets.
 *
 * Key format: "x,y".
 */
export type PointKey = string

// ---------------------------------------------------------------------------
// Cells
// ---------------------------------------------------------------------------

/** An alive cell together with the generation it was born in. */
export interface Cell {
  readonly point: Point
  readonly born: number
}

/** Axis-aligned bounding box, both corners inclusive. */
export interface Bounds {
  readonly min: Point
  readonly max: Point
}

/** Uniform random source returning values in [0, 1). */
export type Rng = () => number
