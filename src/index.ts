export {
  parseConfig,
  graphxConfigSchema,
  ConfigValidationError,
  MAX_NODE_CAPACITY,
  DEFAULT_NODE_CAPACITY,
} from './config.js'
export type { GraphxConfig, ParseConfigOptions } from './config.js'

export {
  scalar,
  pair,
  triple,
  parseNodeKey,
  normalizeNodeKey,
  canonicalKey,
  nodeKeysEqual,
  nodeKeySchema,
} from './graph/node-key.js'
export type {
  NodeKey,
  ScalarKey,
  PairKey,
  TripleKey,
  NodeKeyInput,
  NormalizedTriple,
} from './graph/node-key.js'

export { IdentifierIndex } from './graph/identifier-index.js'
export type { DenseId, IdentifierIndexOptions } from './graph/identifier-index.js'

export { AdjacencyStore } from './graph/adjacency-store.js'
export type { AdjacentEdge } from './graph/adjacency-store.js'

export { BfsTraversal, UNREACHED } from './graph/traversal.js'
export type {
  TraversalState,
  StaleRunPolicy,
  BfsTraversalOptions,
  TraversalSummary,
} from './graph/traversal-types.js'

export { createGraph } from './graph/create.js'
export type { GraphHandle } from './graph/create.js'

export {
  InvalidKeyShapeError,
  CapacityExceededError,
  StaleTraversalStateError,
  InvalidEdgeWeightError,
} from './graph/errors.js'

export {
  METRICS_FILE_NAME,
  createMetricEvent,
  emitMetric,
  appendMetricsFile,
  createMetricsSink,
} from './metrics/index.js'
export type { MetricsSink, TraversalMetrics, MetricData, MetricEvent } from './metrics/index.js'
