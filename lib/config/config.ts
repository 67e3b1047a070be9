/**
 * Simulation configuration loaded from YAML.
 *
 * Lookup order: explicit path, then $LIFE_CONFIG_PATH, then ./life.yml.
 * A missing default file means "use defaults"; a missing file that was
 * asked for explicitly is an error.
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import { parse } from 'yaml'
import { z } from 'zod'

import { Grid } from '@/lib/life/grid.js'
import { DEFAULT_PATTERN, getPattern, hasPattern } from '@/lib/life/patterns.js'
import { point } from '@/lib/life/point.js'
import { seededRandom } from '@/lib/life/random.js'

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class ConfigError extends Error {
  readonly path: string
  readonly issues: string[]

  constructor(message: string, path: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message)
    this.name = 'ConfigError'
    this.path = path
    this.issues = issues
  }
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const coordinateSchema = z.tuple([z.number().int(), z.number().int()])

type Coordinate = z.infer<typeof coordinateSchema>

/** Largest rectangle a random section may cover, in cells. */
export const MAX_RANDOM_AREA = 1_000_000

function regionArea(topLeft: Coordinate, bottomRight: Coordinate): number {
  const width = bottomRight[0] - topLeft[0]
  const height = bottomRight[1] - topLeft[1]
  return width > 0 && height > 0 ? width * height : 0
}

function regionTooLarge(area: number): string {
  return `region covers ${area} cells, limit is ${MAX_RANDOM_AREA}`
}

const randomSchema = z
  .object({
    topLeft: coordinateSchema,
    bottomRight: coordinateSchema,
    seed: z.number().int().optional(),
  })
  .superRefine((region, ctx) => {
    const area = regionArea(region.topLeft, region.bottomRight)
    if (area > MAX_RANDOM_AREA) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: regionTooLarge(area) })
    }
  })

const viewportSchema = z.object({
  width: z.number().int().positive().default(80),
  height: z.number().int().positive().default(40),
})

const configSchema = z
  .object({
    pattern: z
      .string()
      .refine(hasPattern, (name) => ({ message: `unknown pattern "${name}"` }))
      .default(DEFAULT_PATTERN),
    points: z.array(coordinateSchema).optional(),
    random: randomSchema.optional(),
    ticks: z.number().int().nonnegative().default(1000),
    ticksPerSecond: z.number().int().positive().default(8),
    viewport: viewportSchema.default({}),
  })
  .strict()

export type LifeConfig = z.infer<typeof configSchema>

/** Values supplied on the command line; each one wins over the file. */
export interface ConfigOverrides {
  pattern?: string
  ticks?: number
  ticksPerSecond?: number
  seed?: number
}

const DEFAULT_CONFIG_FILE = 'life.yml'

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function defaultConfig(): LifeConfig {
  return configSchema.parse({})
}

export function parseConfig(raw: string, source: string = '<inline>'): LifeConfig {
  let data: unknown
  try {
    data = parse(raw)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Invalid YAML in ${source}`, source, [message])
  }

  // An empty document parses to null.
  const result = configSchema.safeParse(data ?? {})
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}`,
      source,
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    )
  }
  return result.data
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function expandHome(p: string): string {
  if (p.startsWith('~/')) return resolve(process.env.HOME ?? '', p.slice(2))
  return p
}

export function resolveConfigPath(explicitPath?: string): { path: string; explicit: boolean } {
  const chosen = explicitPath ?? process.env.LIFE_CONFIG_PATH
  if (chosen) return { path: resolve(expandHome(chosen)), explicit: true }
  return { path: resolve(process.cwd(), DEFAULT_CONFIG_FILE), explicit: false }
}

export function loadConfig(explicitPath?: string): LifeConfig {
  const { path, explicit } = resolveConfigPath(explicitPath)

  let raw: string
  try {
    raw = readFileSync(path, 'utf-8')
  } catch (err) {
    const error = err as NodeJS.ErrnoException
    if (error.code === 'ENOENT' && !explicit) {
      console.debug(`[config] No config file at ${path}, using defaults`)
      return defaultConfig()
    }

    console.error(`[config] Failed to read config from ${path}:`, error.message)
    if (error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found at ${path}`, path)
    } else if (error.code === 'EACCES') {
      throw new ConfigError(`Permission denied reading config file at ${path}`, path)
    } else {
      throw new ConfigError(`Failed to read config file at ${path}: ${error.message}`, path)
    }
  }

  return parseConfig(raw, path)
}

// ---------------------------------------------------------------------------
// Overrides & seeding
// ---------------------------------------------------------------------------

/**
 * Apply command-line values on top of a loaded config.
 *
 * An explicit pattern replaces any points or random section from the file.
 * A seed without a random section scatters cells over the viewport area,
 * which must stay within MAX_RANDOM_AREA.
 */
export function applyOverrides(config: LifeConfig, overrides: ConfigOverrides): LifeConfig {
  const next: LifeConfig = { ...config }

  if (overrides.ticks !== undefined) next.ticks = overrides.ticks
  if (overrides.ticksPerSecond !== undefined) next.ticksPerSecond = overrides.ticksPerSecond

  if (overrides.pattern !== undefined) {
    next.pattern = overrides.pattern
    next.points = undefined
    next.random = undefined
  } else if (overrides.seed !== undefined) {
    next.points = undefined
    if (next.random) {
      next.random = { ...next.random, seed: overrides.seed }
    } else {
      const area = next.viewport.width * next.viewport.height
      if (area > MAX_RANDOM_AREA) {
        throw new ConfigError('Cannot scatter a seeded population over the viewport', '--seed', [
          `viewport: ${regionTooLarge(area)}`,
        ])
      }
      next.random = {
        topLeft: [0, 0],
        bottomRight: [next.viewport.width, next.viewport.height],
        seed: overrides.seed,
      }
    }
  }

  return next
}

/** Build the initial grid: explicit points, else random scatter, else a pattern. */
export function seedGrid(config: LifeConfig): Grid {
  if (config.points) {
    return Grid.withPoints(config.points.map(([x, y]) => point(x, y)))
  }

  if (config.random) {
    const { topLeft, bottomRight, seed } = config.random
    return Grid.random(
      point(topLeft[0], topLeft[1]),
      point(bottomRight[0], bottomRight[1]),
      seed === undefined ? Math.random : seededRandom(seed),
    )
  }

  return Grid.withPoints(getPattern(config.pattern))
}
