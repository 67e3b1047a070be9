/**
 * Status bar rendered under the grid.
 *
 * Shows:
 * - Generation, population and tick rate
 * - Running/paused indicator
 * - Key hints for the active context
 */

import React from "react";
import { Box, Text } from "ink";

import { getFooterHints } from "@/lib/keys/bindings.js";
import type { ViewContext } from "@/lib/keys/types.js";

interface FooterProps {
  viewContext: ViewContext;
  generation: number;
  population: number;
  ticksPerSecond: number;
  width: number;
}

export function Footer({ viewContext, generation, population, ticksPerSecond, width }: FooterProps) {
  const hints = getFooterHints(viewContext);
  const paused = viewContext === "paused";

  return (
    <Box flexDirection="column">
      <Text dimColor>{"─".repeat(width)}</Text>

      <Box flexDirection="row" gap={2}>
        <Text color={paused ? "yellow" : "green"}>{paused ? "❚❚ Paused" : "▶ Running"}</Text>
        <Text>gen {generation}</Text>
        <Text>pop {population}</Text>
        <Text dimColor>{ticksPerSecond} tick/s</Text>
      </Box>

      <Box flexDirection="row" gap={1}>
        {hints.map((hint, i) => (
          <Text key={i}>
            <Text bold>[{hint.key}]</Text> <Text dimColor>{hint.description}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
