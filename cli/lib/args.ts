/**
 * Command-line argument parsing for the `life` entry point.
 */

import { parseArgs } from "node:util";

import type { ConfigOverrides } from "@/lib/config/config.js";
import { hasPattern, listPatterns } from "@/lib/life/patterns.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const COMMANDS = ["run", "watch", "patterns", "help"] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  configPath?: string;
  overrides: ConfigOverrides;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = [
  "Usage: life <command> [options]",
  "",
  "Commands:",
  "  run        Tick the seeded grid and print its final state (default)",
  "  watch      Animate the grid in the terminal",
  "  patterns   List the built-in seed patterns",
  "  help       Show this message",
  "",
  "Options:",
  "  -p, --pattern NAME   Seed from a built-in pattern",
  "  -t, --ticks N        Generations to run (run)",
  "      --tps N          Ticks per second (watch)",
  "      --seed N         Seed a reproducible random population",
  "  -c, --config PATH    YAML config file (default: $LIFE_CONFIG_PATH or ./life.yml)",
  "  -h, --help           Show this message",
].join("\n");

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseInteger(flag: string, value: string, min: number): number {
  if (!/^-?\d+$/.test(value)) {
    throw new UsageError(`--${flag} expects an integer, got "${value}"`);
  }
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < min) {
    throw new UsageError(`--${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return n;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parseTokens>;
  try {
    parsed = parseTokens(argv);
  } catch (err) {
    // node:util reports unknown flags and missing values as TypeErrors.
    if (err instanceof TypeError) throw new UsageError(err.message);
    throw err;
  }

  const { values, positionals } = parsed;

  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument "${positionals[1]}"`);
  }

  const name = positionals[0] ?? "run";
  if (!isCommand(name)) {
    throw new UsageError(`Unknown command "${name}"`);
  }

  const overrides: ConfigOverrides = {};

  if (values.pattern !== undefined) {
    if (!hasPattern(values.pattern)) {
      throw new UsageError(
        `Unknown pattern "${values.pattern}". Available: ${listPatterns().join(", ")}`,
      );
    }
    overrides.pattern = values.pattern;
  }
  if (values.ticks !== undefined) overrides.ticks = parseInteger("ticks", values.ticks, 0);
  if (values.tps !== undefined) overrides.ticksPerSecond = parseInteger("tps", values.tps, 1);
  if (values.seed !== undefined) {
    overrides.seed = parseInteger("seed", values.seed, Number.MIN_SAFE_INTEGER);
  }

  return {
    command: values.help ? "help" : name,
    configPath: values.config,
    overrides,
  };
}

function parseTokens(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      pattern: { type: "string", short: "p" },
      ticks: { type: "string", short: "t" },
      tps: { type: "string" },
      seed: { type: "string" },
      config: { type: "string", short: "c" },
      help: { type: "boolean", short: "h" },
    },
  });
}
