/**
 * Timer-driven simulation clock.
 *
 * Owns a Grid and advances it on a fixed cadence, independent of whatever
 * renders it. Each timer callback runs one complete tick and then notifies
 * subscribers, so a listener only ever sees a fully published generation.
 *
 * The engine ticks via the global setInterval, so tests drive it with fake
 * timers. No React, no DOM -- pure TypeScript.
 */

import { Grid } from './grid.js'

export type GridListener = (grid: Grid) => void

const DEFAULT_TICKS_PER_SECOND = 8

/** Clamp a requested rate to at least 1; non-finite values yield `fallback`. */
function normalizeRate(requested: number, fallback: number): number {
  return Number.isFinite(requested) ? Math.max(1, requested) : fallback
}

export class SimulationEngine {
  private _grid: Grid
  private _listeners: Set<GridListener> = new Set()

  // Timing
  private _ticksPerSecond: number = DEFAULT_TICKS_PER_SECOND
  private _timerId: ReturnType<typeof setInterval> | null = null

  constructor(grid: Grid = Grid.empty(), opts?: { ticksPerSecond?: number }) {
    this._grid = grid
    if (opts?.ticksPerSecond !== undefined) {
      this._ticksPerSecond = normalizeRate(opts.ticksPerSecond, DEFAULT_TICKS_PER_SECOND)
    }
  }

  // -----------------------------------------------------------------------
  // Grid access
  // -----------------------------------------------------------------------

  get grid(): Grid {
    return this._grid
  }

  /** Replace the simulated grid and notify subscribers. */
  reset(grid: Grid): void {
    this._grid = grid
    this._emit()
  }

  /** Advance exactly one generation and notify subscribers. */
  step(): void {
    this._grid.tick()
    this._emit()
  }

  // -----------------------------------------------------------------------
  // Subscriptions
  // -----------------------------------------------------------------------

  /** Register a listener called after every published generation. */
  subscribe(listener: GridListener): () => void {
    this._listeners.add(listener)
    return () => {
      this._listeners.delete(listener)
    }
  }

  private _emit(): void {
    for (const listener of this._listeners) {
      try {
        listener(this._grid)
      } catch (err) {
        console.error('[engine] Listener failed:', err)
      }
    }
  }

  // -----------------------------------------------------------------------
  // Engine lifecycle
  // -----------------------------------------------------------------------

  /** Set the tick rate. Minimum 1, default 8; a non-finite rate is ignored. */
  setTicksPerSecond(ticksPerSecond: number): void {
    this._ticksPerSecond = normalizeRate(ticksPerSecond, this._ticksPerSecond)
    // Restart timer if running
    if (this._timerId !== null) {
      this.stop()
      this.start()
    }
  }

  get ticksPerSecond(): number {
    return this._ticksPerSecond
  }

  /** Whether the engine is ticking. */
  get isRunning(): boolean {
    return this._timerId !== null
  }

  start(): void {
    if (this._timerId !== null) return
    const interval = Math.round(1000 / this._ticksPerSecond)
    this._timerId = setInterval(() => this.step(), interval)
  }

  /** Stop the timer. The grid is preserved. */
  stop(): void {
    if (this._timerId !== null) {
      clearInterval(this._timerId)
      this._timerId = null
    }
  }

  /** Full teardown: stop timer, drop listeners. */
  destroy(): void {
    this.stop()
    this._listeners.clear()
  }
}
