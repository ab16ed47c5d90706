import { z } from 'zod'
import { formatZodErrors } from './error-utils.js'

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

/**
 * Largest accepted `graph.nodeCapacity`. Graphs beyond a few million nodes
 * belong in a dedicated graph store rather than in-memory adjacency lists.
 */
export const MAX_NODE_CAPACITY = 5_000_000

export const DEFAULT_NODE_CAPACITY = 100_000

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/** Sizing and edge semantics of the adjacency store. */
const graphSchema = z
  .object({
    /**
     * Upper bound on distinct node keys the store will ever resolve, through
     * edge insertion or traversal queries. Resolving one more key throws
     * `CapacityExceededError`.
     */
    nodeCapacity: z
      .number()
      .int('graph.nodeCapacity must be an integer')
      .min(1, 'graph.nodeCapacity must be at least 1')
      .max(MAX_NODE_CAPACITY, `graph.nodeCapacity must be at most ${MAX_NODE_CAPACITY}`)
      .default(DEFAULT_NODE_CAPACITY),
    /** true = edges point one way only; false = every edge is mirrored. */
    directed: z.boolean().default(true),
  })
  .strip()

/** Behavior of BFS traversals built from this config. */
const traversalSchema = z
  .object({
    /**
     * What `run()` does when the previous run was never cleared:
     * - "throw": raise StaleTraversalStateError (default)
     * - "clear": log a warning and reset first
     */
    onStaleRun: z.enum(['throw', 'clear']).default('throw'),
  })
  .strip()

/**
 * Controls structured metric output from traversals.
 * Metrics go to stderr via console.warn with a `[graphx:metrics]` prefix.
 * File output appends JSONL to `{directory}/.metrics.jsonl` on flush.
 */
const metricsSchema = z
  .object({
    enabled: z.boolean().default(false),
    fileOutput: z.boolean().default(false),
    /** Relative directory for the metrics file. */
    directory: z
      .string()
      .min(1, 'metrics.directory must not be empty')
      .refine(
        (v) => !v.startsWith('/') && !/^[a-zA-Z]:/.test(v),
        { message: 'metrics.directory must be a relative path (must not start with / or a drive letter)' }
      )
      .refine(
        (v) => !v.split(/[\\/]/).some((seg) => seg === '..'),
        { message: 'metrics.directory must not contain ".." segments' }
      )
      .default('.graphx'),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the full configuration.
 *
 * - Unknown keys are stripped, not rejected.
 * - All fields have defaults; an empty object `{}` produces a fully-valid config.
 */
export const graphxConfigSchema = z
  .object({
    graph: graphSchema.default({}),
    traversal: traversalSchema.default({}),
    metrics: metricsSchema.default({}),
  })
  .strip()

// ---------------------------------------------------------------------------
// Unknown-key helpers for parseConfig
// ---------------------------------------------------------------------------

const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  graph: new Set(Object.keys(graphSchema.shape)),
  traversal: new Set(Object.keys(traversalSchema.shape)),
  metrics: new Set(Object.keys(metricsSchema.shape)),
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Returns unknown key paths in `raw` at the top level and one level deep
 * inside recognised sub-objects (e.g. `"graph.capacity"`).
 */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(graphxConfigSchema.shape))
  const result: string[] = []
  for (const key of Object.keys(raw)) {
    if (!topLevelKnown.has(key)) {
      result.push(key)
      continue
    }
    const subShape = SUB_SCHEMA_SHAPES[key]
    const nested = raw[key]
    if (subShape === undefined || !isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

/** Options accepted by {@link parseConfig}. */
export interface ParseConfigOptions {
  /**
   * Called with all unknown key paths (e.g. `["unknownTop", "graph.typo"]`)
   * when the raw input contains keys not recognised by the schema.
   * @example
   *   parseConfig(raw, {
   *     onUnknownKeys: (keys) => console.warn(`Unknown keys: ${keys.join(', ')}`)
   *   })
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

/** Utility: recursively marks all fields and nested arrays readonly. */
type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved configuration with all defaults applied. Immutable. */
export type GraphxConfig = DeepReadonly<z.infer<typeof graphxConfigSchema>>

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values.
 *
 * The message lists every failing field path. The original `ZodError` is
 * preserved as `Error.cause`.
 */
export class ConfigValidationError extends Error {
  /** Structured list of validation failures, one per invalid field. */
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(`graphx configuration is invalid:\n${formatZodErrors(zodError.errors)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parse function
// ---------------------------------------------------------------------------

/**
 * Parses and validates raw (unknown) config input, applying all defaults.
 *
 * `undefined` and `{}` both produce the default config. Unknown keys are
 * stripped and, when `options.onUnknownKeys` is given, reported to it.
 *
 * @throws {ConfigValidationError} if the input contains invalid values.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): GraphxConfig {
  const result = graphxConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(raw) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(raw)
    if (unknownKeys.length > 0) {
      try {
        options.onUnknownKeys(unknownKeys)
      } catch (err) {
        // The valid config is returned even when the callback throws.
        console.error('[graphx] parseConfig: onUnknownKeys callback threw — unknown-key notification failed.', err)
      }
    }
  }

  return result.data
}
