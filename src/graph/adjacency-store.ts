/**
 * adjacency-store.ts — Weighted adjacency lists indexed by dense id.
 *
 * Callers insert edges by node key; the store resolves keys through its own
 * IdentifierIndex, which is bounded by `nodeCapacity`. Lists are created on
 * first append, so memory follows the nodes actually used rather than the
 * capacity.
 */

import { IdentifierIndex } from './identifier-index.js'
import type { DenseId } from './identifier-index.js'
import type { NodeKeyInput } from './node-key.js'
import { InvalidEdgeWeightError } from './errors.js'
import type { GraphxConfig } from '../config.js'

/** One outgoing edge in an adjacency list. */
export interface AdjacentEdge {
  readonly target: DenseId
  readonly weight: number
}

const NO_EDGES: readonly AdjacentEdge[] = Object.freeze([])

export class AdjacencyStore {
  readonly nodeCapacity: number
  readonly directed: boolean
  /** Shared by every traversal over this store. */
  readonly index: IdentifierIndex

  private readonly lists: AdjacentEdge[][] = []
  private insertedEdges = 0

  /**
   * @param nodeCapacity - Upper bound on distinct node keys this store will
   *   ever resolve, whether through edge insertion or traversal queries.
   * @param directed - When false every inserted edge is mirrored.
   */
  constructor(nodeCapacity: number, directed = true) {
    if (!Number.isSafeInteger(nodeCapacity) || nodeCapacity < 1) {
      throw new RangeError(`nodeCapacity must be a positive integer, got ${nodeCapacity}`)
    }
    this.nodeCapacity = nodeCapacity
    this.directed = directed
    this.index = new IdentifierIndex({ capacity: nodeCapacity })
  }

  static fromConfig(config: Pick<GraphxConfig, 'graph'>): AdjacencyStore {
    return new AdjacencyStore(config.graph.nodeCapacity, config.graph.directed)
  }

  /** Distinct node keys resolved so far. */
  get nodeCount(): number {
    return this.index.size
  }

  /** Number of `addEdge` calls; a mirrored undirected edge counts once. */
  get edgeCount(): number {
    return this.insertedEdges
  }

  /**
   * Resolves a key to its dense id, minting one if needed.
   *
   * @throws {CapacityExceededError} if the key is new and the store is full.
   */
  resolve(key: NodeKeyInput): DenseId {
    return this.index.resolve(key)
  }

  /**
   * Appends `u → v` (and `v → u` when undirected). Parallel edges and
   * self-loops are kept as given.
   *
   * @throws {InvalidKeyShapeError} if either endpoint is not a valid key.
   * @throws {InvalidEdgeWeightError} if `weight` is not an integer.
   * @throws {CapacityExceededError} if the endpoints do not fit; raised
   *   before either list is touched.
   */
  addEdge(u: NodeKeyInput, v: NodeKeyInput, weight = 0): void {
    if (!Number.isSafeInteger(weight)) {
      throw new InvalidEdgeWeightError(weight)
    }

    const [from, to] = this.index.resolvePair(u, v)

    this.append(from, to, weight)
    if (!this.directed) {
      this.append(to, from, weight)
    }
    this.insertedEdges++
  }

  /** Outgoing edges of `id` in insertion order. Empty for ids without edges. */
  adjacency(id: DenseId): readonly AdjacentEdge[] {
    return this.lists[id] ?? NO_EDGES
  }

  private append(from: DenseId, to: DenseId, weight: number): void {
    const list = this.lists[from]
    if (list) {
      list.push({ target: to, weight })
    } else {
      this.lists[from] = [{ target: to, weight }]
    }
  }
}
