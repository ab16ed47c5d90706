/**
 * Types for the BFS traversal engine.
 */

import type { MetricsSink } from '../metrics/sink.js'
import type { DenseId } from './identifier-index.js'

/**
 * `'idle'`: no results held (initial state and after `clear()`).
 * `'completed'`: results of the last `run()` are queryable.
 */
export type TraversalState = 'idle' | 'completed'

/**
 * What `run()` does when the traversal still holds a previous run's results.
 * - `'throw'`: raise `StaleTraversalStateError`
 * - `'clear'`: log a warning and reset before running
 */
export type StaleRunPolicy = 'throw' | 'clear'

export interface BfsTraversalOptions {
  /** @default 'throw' */
  readonly onStaleRun?: StaleRunPolicy
  /** Receives one `bfs` metric per completed run. */
  readonly metrics?: MetricsSink
}

/** Returned by `run()`. */
export interface TraversalSummary {
  readonly sourceId: DenseId
  readonly visitedCount: number
  /** Largest hop distance reached; 0 when only the source was visited. */
  readonly maxDistance: number
  /** Adjacency entries read during the run, including those leading to visited nodes. */
  readonly edgesScanned: number
}
