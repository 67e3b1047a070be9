/**
 * React hook managing the SimulationEngine lifecycle.
 *
 * Creates a single engine per mount, starts its clock, and re-renders the
 * consumer whenever the engine publishes a generation. The tick cadence is
 * the engine's; Ink repaints at its own pace.
 */

import { useEffect, useRef, useState } from "react";

import { SimulationEngine } from "@/lib/life/engine.js";
import type { Grid } from "@/lib/life/grid.js";

export interface SimulationHandle {
  engine: SimulationEngine;
  grid: Grid;
  /** Bumped on every published generation or reset. */
  version: number;
}

export function useSimulation(initialGrid: () => Grid, ticksPerSecond: number): SimulationHandle {
  const engineRef = useRef<SimulationEngine | null>(null);
  if (engineRef.current === null) {
    engineRef.current = new SimulationEngine(initialGrid(), { ticksPerSecond });
  }
  const engine = engineRef.current;

  const [version, setVersion] = useState(0);

  useEffect(() => {
    const unsubscribe = engine.subscribe(() => {
      setVersion((v) => v + 1);
    });
    engine.start();

    return () => {
      unsubscribe();
      engine.destroy();
    };
  }, [engine]);

  return { engine, grid: engine.grid, version };
}
