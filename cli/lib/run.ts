/**
 * Headless driver: seed a grid, tick it a fixed number of times, report.
 */

import { seedGrid, type LifeConfig } from "@/lib/config/config.js";
import type { Grid } from "@/lib/life/grid.js";

export function runHeadless(config: LifeConfig): Grid {
  const grid = seedGrid(config);
  const startPopulation = grid.population;
  const startedAt = Date.now();

  grid.advance(config.ticks);

  console.debug(
    `[cli] Ran ${config.ticks} ticks in ${Date.now() - startedAt}ms (population ${startPopulation} -> ${grid.population})`,
  );
  return grid;
}
