/**
 * Typed error classes for the graph core.
 *
 * Each class sets `name` and restores the prototype chain so `instanceof`
 * checks work for callers regardless of how the module was compiled.
 */

import type { z } from 'zod'
import { describeValue, formatZodErrors } from '../error-utils.js'

/**
 * Thrown when a value passed as a node key is not a scalar, pair, or triple of
 * integers. The original `ZodError` is kept as `Error.cause`.
 */
export class InvalidKeyShapeError extends Error {
  /** The rejected value, as received. */
  readonly input: unknown
  readonly issues: readonly z.ZodIssue[]

  constructor(input: unknown, zodError: z.ZodError) {
    super(
      `Invalid node key ${describeValue(input)}: expected an integer, a [x, y] or [x, y, z] ` +
        `integer tuple, or a tagged scalar/pair/triple key\n${formatZodErrors(zodError.errors)}`,
      { cause: zodError }
    )
    this.name = 'InvalidKeyShapeError'
    this.input = input
    this.issues = zodError.errors
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Thrown when resolving a key would hand out a dense id at or beyond the
 * store's `nodeCapacity`. Raised before anything is inserted.
 */
export class CapacityExceededError extends Error {
  readonly nodeCapacity: number
  /** The first dense id that did not fit. */
  readonly requestedId: number

  constructor(nodeCapacity: number, requestedId: number) {
    super(
      `Node capacity exceeded: dense id ${requestedId} does not fit in a store sized for ` +
        `${nodeCapacity} nodes. Construct the store with a larger nodeCapacity.`
    )
    this.name = 'CapacityExceededError'
    this.nodeCapacity = nodeCapacity
    this.requestedId = requestedId
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Thrown by `BfsTraversal.run` when the traversal still holds the results of a
 * previous run. Call `clear()` first, or use the `'clear'` stale-run policy.
 */
export class StaleTraversalStateError extends Error {
  constructor() {
    super('BFS traversal already completed a run; call clear() before running from a new source')
    this.name = 'StaleTraversalStateError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class InvalidEdgeWeightError extends Error {
  readonly weight: unknown

  constructor(weight: unknown) {
    super(`Edge weight must be an integer, got ${describeValue(weight)}`)
    this.name = 'InvalidEdgeWeightError'
    this.weight = weight
    Object.setPrototypeOf(this, new.target.prototype)
  }
}
