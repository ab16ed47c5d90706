/**
 * node-key.ts — Caller-facing node identifiers and their canonical form.
 *
 * A node key is a scalar, a coordinate pair, or a coordinate triple of
 * integers. Every form reduces to a normalized triple before it is hashed:
 *
 *   scalar(x)   → (x, 0, 0)
 *   pair(x, y)  → (x, y, 0)
 *
 * so `scalar(5)`, `pair(5, 0)` and `triple(5, 0, 0)` are the same node.
 * Equality and hashing depend on the normalized triple only.
 */

import { z } from 'zod'
import { InvalidKeyShapeError } from './errors.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScalarKey {
  readonly kind: 'scalar'
  readonly x: number
}

export interface PairKey {
  readonly kind: 'pair'
  readonly x: number
  readonly y: number
}

export interface TripleKey {
  readonly kind: 'triple'
  readonly x: number
  readonly y: number
  readonly z: number
}

/** Tagged node key. */
export type NodeKey = ScalarKey | PairKey | TripleKey

/**
 * Anything accepted where a node key is expected: a tagged key, or the
 * shorthand forms `5`, `[row, col]` and `[row, col, state]`.
 */
export type NodeKeyInput =
  | NodeKey
  | number
  | readonly [number, number]
  | readonly [number, number, number]

/** The canonical `(x, y, z)` form every key reduces to. */
export type NormalizedTriple = readonly [number, number, number]

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function scalar(x: number): ScalarKey {
  return { kind: 'scalar', x }
}

export function pair(x: number, y: number): PairKey {
  return { kind: 'pair', x, y }
}

export function triple(x: number, y: number, z: number): TripleKey {
  return { kind: 'triple', x, y, z }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const coordinateSchema = z
  .number()
  .int('Node key coordinates must be integers')
  .safe('Node key coordinates must be safe integers')

const taggedKeySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('scalar'), x: coordinateSchema }).strict(),
  z.object({ kind: z.literal('pair'), x: coordinateSchema, y: coordinateSchema }).strict(),
  z
    .object({
      kind: z.literal('triple'),
      x: coordinateSchema,
      y: coordinateSchema,
      z: coordinateSchema,
    })
    .strict(),
])

const shorthandKeySchema = z.union([
  coordinateSchema,
  z.tuple([coordinateSchema, coordinateSchema]),
  z.tuple([coordinateSchema, coordinateSchema, coordinateSchema]),
])

/** Zod schema accepting every node key form, tagged or shorthand. */
export const nodeKeySchema = z.union([shorthandKeySchema, taggedKeySchema])

/**
 * Validates an untrusted value as a node key and returns its tagged form.
 *
 * @throws {InvalidKeyShapeError} for anything other than an integer, an
 *   integer pair/triple tuple, or a well-formed tagged key.
 */
export function parseNodeKey(input: unknown): NodeKey {
  const result = nodeKeySchema.safeParse(input)
  if (!result.success) {
    throw new InvalidKeyShapeError(input, result.error)
  }

  const parsed = result.data
  if (typeof parsed === 'number') return scalar(parsed)
  if (Array.isArray(parsed)) {
    if (parsed.length === 2) return pair(parsed[0], parsed[1])
    return triple(parsed[0], parsed[1], parsed[2])
  }
  return parsed
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

// -0 and 0 must hash to the same node.
function coordinate(value: number): number {
  return value === 0 ? 0 : value
}

/**
 * Reduces any accepted key form to its normalized triple.
 *
 * @throws {InvalidKeyShapeError} if `input` is not a valid node key.
 */
export function normalizeNodeKey(input: NodeKeyInput): NormalizedTriple {
  const key = parseNodeKey(input)
  switch (key.kind) {
    case 'scalar':
      return [coordinate(key.x), 0, 0]
    case 'pair':
      return [coordinate(key.x), coordinate(key.y), 0]
    case 'triple':
      return [coordinate(key.x), coordinate(key.y), coordinate(key.z)]
  }
}

/** String hash of a normalized triple, e.g. `"3,4,0"`. */
export function canonicalKey(normalized: NormalizedTriple): string {
  return `${normalized[0]},${normalized[1]},${normalized[2]}`
}

/** True when both keys normalize to the same triple. */
export function nodeKeysEqual(a: NodeKeyInput, b: NodeKeyInput): boolean {
  return canonicalKey(normalizeNodeKey(a)) === canonicalKey(normalizeNodeKey(b))
}
