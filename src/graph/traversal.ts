/**
 * traversal.ts — Single-source breadth-first search over an AdjacencyStore.
 *
 * Distances are hop counts; edge weights are read but never summed. Keys are
 * resolved through the store's own IdentifierIndex, so the same key maps to
 * the same dense id at insertion time and at query time.
 *
 * Neighbors are explored in adjacency insertion order, which makes the visit
 * order (and therefore tie-breaks among equal-distance nodes) deterministic
 * for a given graph and source.
 */

import type { AdjacencyStore } from './adjacency-store.js'
import type { DenseId } from './identifier-index.js'
import type { NodeKeyInput } from './node-key.js'
import type { MetricsSink } from '../metrics/sink.js'
import { StaleTraversalStateError } from './errors.js'
import type {
  BfsTraversalOptions,
  StaleRunPolicy,
  TraversalState,
  TraversalSummary,
} from './traversal-types.js'

/** Distance reported for nodes the last run did not reach. */
export const UNREACHED = -1

export class BfsTraversal {
  private readonly store: AdjacencyStore
  private readonly onStaleRun: StaleRunPolicy
  private readonly metrics: MetricsSink | undefined

  private distances: number[] = []
  private visited: boolean[] = []
  private order: DenseId[] = []
  private current: TraversalState = 'idle'

  constructor(store: AdjacencyStore, options: BfsTraversalOptions = {}) {
    this.store = store
    this.onStaleRun = options.onStaleRun ?? 'throw'
    this.metrics = options.metrics
  }

  get state(): TraversalState {
    return this.current
  }

  /** Drops all results: every node reads as unvisited with distance -1. */
  clear(): void {
    this.distances = []
    this.visited = []
    this.order = []
    this.current = 'idle'
  }

  /**
   * Explores everything reachable from `source`.
   *
   * `source` need not appear in any edge; such a node is visited alone.
   *
   * @throws {StaleTraversalStateError} if a previous run has not been
   *   cleared and the stale-run policy is `'throw'`.
   * @throws {CapacityExceededError} if `source` is a new key and the store
   *   is full.
   */
  run(source: NodeKeyInput): TraversalSummary {
    if (this.current === 'completed') {
      if (this.onStaleRun === 'throw') {
        throw new StaleTraversalStateError()
      }
      console.warn('[graphx] bfs: run() called on a completed traversal — clearing previous results')
      this.clear()
    }

    const sourceId = this.store.resolve(source)
    const queue = this.order
    this.visited[sourceId] = true
    this.distances[sourceId] = 0
    queue.push(sourceId)

    let edgesScanned = 0
    let maxDistance = 0

    // The queue grows while it is iterated; dequeued entries are kept as the visit order.
    for (const node of queue) {
      const nextDistance = this.distanceOf(node) + 1
      for (const edge of this.store.adjacency(node)) {
        edgesScanned++
        if (this.visited[edge.target]) continue
        this.visited[edge.target] = true
        this.distances[edge.target] = nextDistance
        maxDistance = Math.max(maxDistance, nextDistance)
        queue.push(edge.target)
      }
    }

    this.current = 'completed'

    const summary: TraversalSummary = {
      sourceId,
      visitedCount: queue.length,
      maxDistance,
      edgesScanned,
    }
    this.metrics?.record({
      stage: 'bfs',
      ...summary,
      nodeCount: this.store.nodeCount,
      edgeCount: this.store.edgeCount,
    })
    return summary
  }

  /**
   * Hop distance from the last run's source to `target`, or -1 if it was not
   * reached. A key never seen before is given an id and reports -1.
   */
  minDist(target: NodeKeyInput): number {
    return this.distanceOf(this.store.resolve(target))
  }

  isVisited(target: NodeKeyInput): boolean {
    return this.visited[this.store.resolve(target)] ?? false
  }

  /** Dense ids in the order the last run dequeued them, source first. */
  visitOrder(): readonly DenseId[] {
    return this.order
  }

  private distanceOf(id: DenseId): number {
    return this.distances[id] ?? UNREACHED
  }
}
