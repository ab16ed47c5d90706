/**
 * Structured metric types emitted by graph traversals.
 * All types are immutable and serializable to JSON.
 */

/** Metrics emitted at the end of every BFS run. */
export interface TraversalMetrics {
  readonly stage: 'bfs'
  readonly sourceId: number
  readonly visitedCount: number
  /** Largest hop distance reached; 0 when only the source was visited. */
  readonly maxDistance: number
  /** Adjacency entries read, parallel and already-visited targets included. */
  readonly edgesScanned: number
  readonly nodeCount: number
  readonly edgeCount: number
}

/** Union of all metric payload types. */
export type MetricData = TraversalMetrics

/** A timestamped metric event carrying one of the metric payloads. */
export interface MetricEvent {
  readonly stage: MetricData['stage']
  readonly timestamp: string
  readonly data: MetricData
}
