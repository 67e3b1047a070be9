/**
 * Braille-character renderer for the visible part of the grid.
 *
 * Converts a ShadeGrid (viewport coordinates mapped to age shades) into a
 * grid of Unicode braille characters, each representing a 2x4 block of
 * cells. The youngest cell within a block decides the chalk color of the
 * whole character, so births stay visible inside older clusters.
 */

import React, { useMemo } from "react";
import { Box, Text } from "ink";
import chalk from "chalk";

import { encodeBlock } from "@/lib/render/braille.js";
import type { ShadeGrid, Viewport } from "@/lib/render/viewport.js";

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export interface GridCanvasProps {
  viewport: Viewport;
  shades: ShadeGrid;
  /** Hex colors indexed by shade. */
  palette: readonly string[];
}

export function GridCanvas({ viewport, shades, palette }: GridCanvasProps): React.ReactElement {
  const cellCols = Math.ceil(viewport.width / 2);
  const cellRows = Math.ceil(viewport.height / 4);

  const rows = useMemo(() => {
    const result: React.ReactElement[] = [];

    for (let cy = 0; cy < cellRows; cy++) {
      let line = "";
      for (let cx = 0; cx < cellCols; cx++) {
        const { char, shade } = encodeBlock(cx * 2, cy * 4, shades);
        line += shade >= 0 && shade < palette.length ? chalk.hex(palette[shade])(char) : char;
      }
      result.push(<Text key={cy}>{line}</Text>);
    }

    return result;
  }, [shades, palette, cellCols, cellRows]);

  if (shades.size === 0) {
    return (
      <Box height={cellRows} alignItems="center" justifyContent="center" width={cellCols}>
        <Text dimColor>(no living cells in view)</Text>
      </Box>
    );
  }

  return <Box flexDirection="column">{rows}</Box>;
}
