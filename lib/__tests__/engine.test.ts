import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { SimulationEngine } from '@/lib/life/engine'
import { Grid } from '@/lib/life/grid'
import { getPattern } from '@/lib/life/patterns'

describe('SimulationEngine', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  describe('lifecycle', () => {
    it('should not be running initially', () => {
      const engine = new SimulationEngine()
      expect(engine.isRunning).toBe(false)
    })

    it('should start and stop', () => {
      const engine = new SimulationEngine()
      engine.start()
      expect(engine.isRunning).toBe(true)
      engine.stop()
      expect(engine.isRunning).toBe(false)
    })

    it('should not double-start', () => {
      const engine = new SimulationEngine()
      engine.start()
      engine.start()
      vi.advanceTimersByTime(125)
      expect(engine.grid.generation).toBe(1)
    })

    it('should default to 8 ticks per second', () => {
      expect(new SimulationEngine().ticksPerSecond).toBe(8)
    })

    it('should clamp the tick rate to at least 1', () => {
      const engine = new SimulationEngine(Grid.empty(), { ticksPerSecond: 0 })
      expect(engine.ticksPerSecond).toBe(1)
      engine.setTicksPerSecond(-5)
      expect(engine.ticksPerSecond).toBe(1)
    })

    it('should ignore non-finite tick rates', () => {
      const engine = new SimulationEngine(Grid.empty(), { ticksPerSecond: NaN })
      expect(engine.ticksPerSecond).toBe(8)
      engine.setTicksPerSecond(4)
      engine.setTicksPerSecond(NaN)
      expect(engine.ticksPerSecond).toBe(4)
      engine.setTicksPerSecond(Infinity)
      expect(engine.ticksPerSecond).toBe(4)
    })
  })

  describe('ticking', () => {
    it('should tick once per interval', () => {
      const engine = new SimulationEngine(Grid.empty(), { ticksPerSecond: 4 })
      engine.start()
      vi.advanceTimersByTime(1000)
      expect(engine.grid.generation).toBe(4)
    })

    it('should keep the grid when stopped', () => {
      const engine = new SimulationEngine(Grid.withPoints(getPattern('block')), { ticksPerSecond: 10 })
      engine.start()
      vi.advanceTimersByTime(300)
      engine.stop()
      vi.advanceTimersByTime(1000)
      expect(engine.grid.generation).toBe(3)
      expect(engine.grid.population).toBe(4)
    })

    it('should restart the timer at the new rate', () => {
      const engine = new SimulationEngine(Grid.empty(), { ticksPerSecond: 1 })
      engine.start()
      engine.setTicksPerSecond(10)
      expect(engine.isRunning).toBe(true)
      vi.advanceTimersByTime(500)
      expect(engine.grid.generation).toBe(5)
    })

    it('should step manually while stopped', () => {
      const engine = new SimulationEngine()
      engine.step()
      engine.step()
      expect(engine.grid.generation).toBe(2)
    })
  })

  describe('subscriptions', () => {
    it('should notify listeners after each tick', () => {
      const engine = new SimulationEngine(Grid.empty(), { ticksPerSecond: 10 })
      const seen: number[] = []
      engine.subscribe((grid) => seen.push(grid.generation))
      engine.start()
      vi.advanceTimersByTime(300)
      expect(seen).toEqual([1, 2, 3])
    })

    it('should stop notifying after unsubscribe', () => {
      const engine = new SimulationEngine()
      const listener = vi.fn()
      const unsubscribe = engine.subscribe(listener)
      engine.step()
      unsubscribe()
      engine.step()
      expect(listener).toHaveBeenCalledTimes(1)
    })

    it('should keep notifying other listeners when one throws', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const engine = new SimulationEngine()
      const healthy = vi.fn()
      engine.subscribe(() => {
        throw new Error('boom')
      })
      engine.subscribe(healthy)

      engine.step()

      expect(healthy).toHaveBeenCalledTimes(1)
      expect(errorSpy).toHaveBeenCalledWith('[engine] Listener failed:', expect.any(Error))
    })

    it('should notify on reset with the new grid', () => {
      const engine = new SimulationEngine()
      const listener = vi.fn()
      engine.subscribe(listener)
      const next = Grid.withPoints(getPattern('glider'))
      engine.reset(next)
      expect(engine.grid).toBe(next)
      expect(listener).toHaveBeenCalledWith(next)
    })
  })

  describe('destroy', () => {
    it('should stop the timer and drop listeners', () => {
      const engine = new SimulationEngine()
      const listener = vi.fn()
      engine.subscribe(listener)
      engine.start()
      engine.destroy()
      expect(engine.isRunning).toBe(false)
      engine.step()
      expect(listener).not.toHaveBeenCalled()
    })
  })
})
