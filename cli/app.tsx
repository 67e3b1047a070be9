/**
 * Root component of the `watch` terminal view.
 *
 * Data flow:
 *   SimulationEngine (timer) -> useSimulation version bump -> re-render
 *   Grid + Viewport -> ShadeGrid (age per visible cell) -> GridCanvas
 *   Keys -> engine controls / viewport pan (via useKeyBindings)
 *
 * The viewport is renderer state only; the grid never learns about it.
 */

import React, { useCallback, useMemo, useState } from "react";
import { Box, useApp } from "ink";

import { seedGrid, type LifeConfig } from "@/lib/config/config.js";
import { point } from "@/lib/life/point.js";
import {
  AGE_SHADES,
  centerViewport,
  panViewport,
  toShadeGrid,
  type Viewport,
} from "@/lib/render/viewport.js";

import { useKeyBindings } from "./hooks/useKeyBindings.js";
import { useSimulation } from "./hooks/useSimulation.js";
import { GridCanvas } from "./components/grid/GridCanvas.js";
import { Footer } from "./components/layout/Footer.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PAN_STEP = 4;
const MAX_TICKS_PER_SECOND = 60;

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function App({ config }: { config: LifeConfig }) {
  const { exit } = useApp();
  const { engine, grid, version } = useSimulation(() => seedGrid(config), config.ticksPerSecond);

  const { width, height } = config.viewport;
  const [viewport, setViewport] = useState<Viewport>(() => centerViewport(grid, width, height));
  const [paused, setPaused] = useState(false);
  const [ticksPerSecond, setTicksPerSecond] = useState(engine.ticksPerSecond);

  const changeSpeed = useCallback(
    (delta: number) => {
      const next = Math.min(MAX_TICKS_PER_SECOND, Math.max(1, engine.ticksPerSecond + delta));
      engine.setTicksPerSecond(next);
      setTicksPerSecond(next);
    },
    [engine],
  );

  const pan = useCallback((dx: number, dy: number) => {
    setViewport((v) => panViewport(v, point(dx, dy)));
  }, []);

  useKeyBindings(paused ? "paused" : "running", {
    quit: () => {
      engine.destroy();
      exit();
    },
    toggle_pause: () => {
      if (engine.isRunning) {
        engine.stop();
        setPaused(true);
      } else {
        engine.start();
        setPaused(false);
      }
    },
    step: () => engine.step(),
    recenter: () => setViewport(centerViewport(engine.grid, width, height)),
    speed_up: () => changeSpeed(1),
    slow_down: () => changeSpeed(-1),
    pan_up: () => pan(0, -PAN_STEP),
    pan_down: () => pan(0, PAN_STEP),
    pan_left: () => pan(-PAN_STEP, 0),
    pan_right: () => pan(PAN_STEP, 0),
  });

  // The grid mutates in place; `version` marks each published generation.
  const shades = useMemo(() => toShadeGrid(grid, viewport), [grid, viewport, version]);

  return (
    <Box flexDirection="column">
      <GridCanvas viewport={viewport} shades={shades} palette={AGE_SHADES} />
      <Footer
        viewContext={paused ? "paused" : "running"}
        generation={grid.generation}
        population={grid.population}
        ticksPerSecond={ticksPerSecond}
        width={Math.ceil(width / 2)}
      />
    </Box>
  );
}
