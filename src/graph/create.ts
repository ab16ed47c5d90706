import type { GraphxConfig } from '../config.js'
import { createMetricsSink } from '../metrics/sink.js'
import type { MetricsSink } from '../metrics/sink.js'
import { AdjacencyStore } from './adjacency-store.js'
import { BfsTraversal } from './traversal.js'

/** A store plus a traversal over it, sharing one identifier index. */
export interface GraphHandle {
  readonly store: AdjacencyStore
  readonly traversal: BfsTraversal
  readonly metrics: MetricsSink
}

/**
 * Builds a store and a traversal from a validated config (see `parseConfig`).
 * Further traversals over the same store can be constructed directly with
 * `new BfsTraversal(handle.store, ...)`.
 */
export function createGraph(config: GraphxConfig): GraphHandle {
  const store = AdjacencyStore.fromConfig(config)
  const metrics = createMetricsSink(config.metrics)
  const traversal = new BfsTraversal(store, {
    onStaleRun: config.traversal.onStaleRun,
    metrics,
  })
  return { store, traversal, metrics }
}
