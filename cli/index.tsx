#!/usr/bin/env node
/**
 * Entry point for the `life` command.
 *
 * `run` ticks headlessly and prints the final grid, `watch` renders the Ink
 * view in the terminal, `patterns` lists the seed catalog.
 *
 * Exit codes: 0 success, 1 configuration or unexpected error, 2 usage error.
 */

import React from "react";
import { render } from "ink";

import { applyOverrides, ConfigError, loadConfig, type LifeConfig } from "@/lib/config/config.js";
import { formatGrid } from "@/lib/life/format.js";
import { listPatterns } from "@/lib/life/patterns.js";

import { App } from "./app.js";
import { parseCliArgs, USAGE, UsageError, type CliArgs } from "./lib/args.js";
import { runHeadless } from "./lib/run.js";

async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  if (args.command === "help") {
    console.log(USAGE);
    return 0;
  }
  if (args.command === "patterns") {
    console.log(listPatterns().join("\n"));
    return 0;
  }

  let config: LifeConfig;
  try {
    config = applyOverrides(loadConfig(args.configPath), args.overrides);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[cli] ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (args.command === "run") {
    console.log(formatGrid(runHeadless(config)));
    return 0;
  }

  const { waitUntilExit } = render(<App config={config} />, {
    patchConsole: false,
  });
  await waitUntilExit();
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    console.error("[cli] Unexpected error:", err);
    process.exit(1);
  });
