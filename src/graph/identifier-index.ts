/**
 * identifier-index.ts — Maps node keys to dense ids in first-seen order.
 *
 * Ids are contiguous from 0 and never reassigned, so `size` is always the
 * next id to be handed out. Every resolution is insert-or-get; there is no
 * removal and no lookup that skips insertion.
 */

import { CapacityExceededError } from './errors.js'
import { canonicalKey, normalizeNodeKey } from './node-key.js'
import type { NodeKeyInput } from './node-key.js'

/** A small non-negative integer standing for one distinct node key. */
export type DenseId = number

export interface IdentifierIndexOptions {
  /**
   * Upper bound (exclusive) on the ids this index may hand out.
   * Omit for an unbounded index.
   */
  readonly capacity?: number
}

export class IdentifierIndex {
  private readonly ids = new Map<string, DenseId>()
  private readonly capacity: number

  constructor(options: IdentifierIndexOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY
  }

  /** Number of ids handed out so far. */
  get size(): number {
    return this.ids.size
  }

  /**
   * Returns the id of `key`, minting the next sequential id on first sight.
   *
   * @throws {InvalidKeyShapeError} if `key` is not a valid node key.
   * @throws {CapacityExceededError} if a new id would reach the capacity.
   *   Nothing is inserted in that case.
   */
  resolve(key: NodeKeyInput): DenseId {
    const hash = canonicalKey(normalizeNodeKey(key))
    const existing = this.ids.get(hash)
    if (existing !== undefined) return existing
    return this.mint(hash)
  }

  /**
   * Resolves both endpoints of an edge as one step: either both get an id,
   * or `CapacityExceededError` is thrown before any new id is minted.
   * `u` is minted before `v`.
   */
  resolvePair(u: NodeKeyInput, v: NodeKeyInput): readonly [DenseId, DenseId] {
    const hashU = canonicalKey(normalizeNodeKey(u))
    const hashV = canonicalKey(normalizeNodeKey(v))

    const unseen = new Set([hashU, hashV].filter((hash) => !this.ids.has(hash)))
    if (this.ids.size + unseen.size > this.capacity) {
      throw new CapacityExceededError(this.capacity, this.capacity)
    }

    const from = this.ids.get(hashU) ?? this.mint(hashU)
    const to = this.ids.get(hashV) ?? this.mint(hashV)
    return [from, to]
  }

  private mint(hash: string): DenseId {
    const id = this.ids.size
    if (id >= this.capacity) {
      throw new CapacityExceededError(this.capacity, id)
    }
    this.ids.set(hash, id)
    return id
  }
}
