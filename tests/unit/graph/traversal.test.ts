import { describe, it, expect, vi, afterEach } from 'vitest'
import { AdjacencyStore } from '../../../src/graph/adjacency-store.js'
import { BfsTraversal, UNREACHED } from '../../../src/graph/traversal.js'
import { CapacityExceededError, StaleTraversalStateError } from '../../../src/graph/errors.js'
import type { MetricsSink } from '../../../src/metrics/sink.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildGraph(
  edges: readonly (readonly [number, number])[],
  options: { capacity?: number; directed?: boolean } = {}
): AdjacencyStore {
  const store = new AdjacencyStore(options.capacity ?? 10, options.directed ?? true)
  for (const [u, v] of edges) store.addEdge(u, v)
  return store
}

function fakeSink(): MetricsSink {
  return { record: vi.fn(), flush: vi.fn(async () => {}), pending: [] }
}

afterEach(() => {
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// run / minDist / isVisited
// ---------------------------------------------------------------------------

describe('BfsTraversal.run', () => {
  it('directed path 0→1→2→3: distances 0..3, node 4 unreached', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2], [2, 3]], { capacity: 5 }))
    bfs.run(0)

    expect([0, 1, 2, 3].map((n) => bfs.minDist(n))).toEqual([0, 1, 2, 3])
    expect(bfs.minDist(4)).toBe(-1)
    expect(bfs.isVisited(4)).toBe(false)
  })

  it('disconnected components stay unvisited', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1], [2, 3]], { capacity: 5 }))
    bfs.run(0)

    expect(bfs.isVisited(0)).toBe(true)
    expect(bfs.isVisited(1)).toBe(true)
    expect(bfs.isVisited(2)).toBe(false)
    expect(bfs.isVisited(3)).toBe(false)
    expect(bfs.minDist(3)).toBe(UNREACHED)
  })

  it('directed edges are not followed backwards', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2]]))
    bfs.run(2)

    expect(bfs.minDist(2)).toBe(0)
    expect(bfs.minDist(1)).toBe(-1)
    expect(bfs.minDist(0)).toBe(-1)
  })

  it('cycle 0→1→2→3→1: the back edge does not shorten node 1', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2], [2, 3], [3, 1]], { capacity: 4 }))
    const summary = bfs.run(0)

    expect([0, 1, 2, 3].map((n) => bfs.minDist(n))).toEqual([0, 1, 2, 3])
    expect(summary).toEqual({ sourceId: 0, visitedCount: 4, maxDistance: 3, edgesScanned: 4 })
  })

  it('shortcut edges give the minimum hop count', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2], [2, 3], [0, 3]]))
    bfs.run(0)
    expect(bfs.minDist(3)).toBe(1)
    expect(bfs.minDist(2)).toBe(2)
  })

  it('weights are ignored: hops, not weighted length', () => {
    const store = new AdjacencyStore(5)
    store.addEdge(0, 1, 100)
    store.addEdge(0, 2, 1)
    store.addEdge(2, 1, 1)

    const bfs = new BfsTraversal(store)
    bfs.run(0)
    expect(bfs.minDist(1)).toBe(1)
  })

  it('a source that was never inserted is visited alone', () => {
    const store = buildGraph([[0, 1]], { capacity: 5 })
    const bfs = new BfsTraversal(store)

    expect(bfs.run(9)).toEqual({ sourceId: 2, visitedCount: 1, maxDistance: 0, edgesScanned: 0 })
    expect(bfs.minDist(9)).toBe(0)
    expect(bfs.minDist(0)).toBe(-1)
    expect(store.nodeCount).toBe(3)
  })

  it('a never-seen query key reports -1 and is given an id', () => {
    const store = buildGraph([[0, 1]], { capacity: 5 })
    const bfs = new BfsTraversal(store)
    bfs.run(0)

    expect(bfs.minDist([8, 8])).toBe(-1)
    expect(bfs.isVisited([8, 8])).toBe(false)
    expect(store.nodeCount).toBe(3)
  })

  it('source key outside capacity → CapacityExceededError, traversal stays idle', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1]], { capacity: 2 }))

    expect(() => bfs.run(5)).toThrow(CapacityExceededError)
    expect(bfs.state).toBe('idle')

    bfs.run(0)
    expect(bfs.minDist(1)).toBe(1)
  })

  it('distance-to-self is 0 and every reached node is one hop past its parent', () => {
    const edges: [number, number][] = [
      [0, 1], [0, 2], [1, 3], [2, 3], [3, 4], [4, 0], [2, 5], [5, 6], [6, 4],
    ]
    const store = buildGraph(edges)
    const bfs = new BfsTraversal(store)
    bfs.run(0)

    expect(bfs.minDist(0)).toBe(0)
    for (const [u, v] of edges) {
      if (!bfs.isVisited(u)) continue
      expect(bfs.isVisited(v)).toBe(true)
      expect(bfs.minDist(v)).toBeLessThanOrEqual(bfs.minDist(u) + 1)
    }
    // Every non-source node has some in-edge from a node exactly one hop closer.
    for (const node of [1, 2, 3, 4, 5, 6]) {
      const parents = edges.filter(([, v]) => v === node).map(([u]) => u)
      expect(parents.some((p) => bfs.minDist(p) === bfs.minDist(node) - 1)).toBe(true)
    }
  })
})

// ---------------------------------------------------------------------------
// Visit order
// ---------------------------------------------------------------------------

describe('BfsTraversal.visitOrder', () => {
  it('follows adjacency insertion order among equal-distance nodes', () => {
    const store = buildGraph([[0, 2], [0, 1], [1, 3], [2, 4]])
    const bfs = new BfsTraversal(store)
    bfs.run(0)

    // ids: 0→0, 2→1, 1→2, 3→3, 4→4
    expect(bfs.visitOrder()).toEqual([0, 1, 2, 4, 3])
  })

  it('repeated runs from the same source produce identical orders', () => {
    const store = buildGraph([[0, 3], [0, 1], [3, 2], [1, 2], [2, 4]], { directed: false })
    const bfs = new BfsTraversal(store)

    bfs.run(0)
    const first = [...bfs.visitOrder()]
    bfs.clear()
    bfs.run(0)

    expect(bfs.visitOrder()).toEqual(first)
  })

  it('is empty when idle', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1]]))
    expect(bfs.visitOrder()).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// clear / stale runs
// ---------------------------------------------------------------------------

describe('BfsTraversal.clear', () => {
  it('resets visited flags and distances', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2]], { capacity: 3 }))
    bfs.run(0)
    expect(bfs.isVisited(1)).toBe(true)
    expect(bfs.state).toBe('completed')

    bfs.clear()
    expect(bfs.state).toBe('idle')
    expect(bfs.isVisited(1)).toBe(false)
    expect(bfs.minDist(0)).toBe(-1)
    expect(bfs.minDist(1)).toBe(-1)

    bfs.run(1)
    expect(bfs.isVisited(2)).toBe(true)
    expect(bfs.minDist(2)).toBe(1)
    expect(bfs.isVisited(0)).toBe(false)
  })

  it('is safe before the first run', () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1]]))
    bfs.clear()
    bfs.clear()
    expect(bfs.state).toBe('idle')
    bfs.run(0)
    expect(bfs.minDist(1)).toBe(1)
  })

  it('does not touch the graph', () => {
    const store = buildGraph([[0, 1]])
    const bfs = new BfsTraversal(store)
    bfs.run(0)
    bfs.clear()
    expect(store.adjacency(0)).toEqual([{ target: 1, weight: 0 }])
    expect(store.edgeCount).toBe(1)
  })
})

describe('BfsTraversal — stale runs', () => {
  it("default policy 'throw': second run without clear() throws", () => {
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2]]))
    bfs.run(0)

    expect(() => bfs.run(1)).toThrow(StaleTraversalStateError)
    // The previous results are still intact.
    expect(bfs.minDist(2)).toBe(2)
  })

  it("policy 'clear': warns, resets, and runs from the new source", () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2]]), { onStaleRun: 'clear' })
    bfs.run(0)
    bfs.run(1)

    expect(warnSpy).toHaveBeenCalledOnce()
    expect(warnSpy).toHaveBeenCalledWith(
      '[graphx] bfs: run() called on a completed traversal — clearing previous results'
    )
    expect(bfs.minDist(1)).toBe(0)
    expect(bfs.minDist(2)).toBe(1)
    expect(bfs.isVisited(0)).toBe(false)
  })

  it('two traversals over one store run independently', () => {
    const store = buildGraph([[0, 1], [1, 2]], { directed: false })
    const fromStart = new BfsTraversal(store)
    const fromEnd = new BfsTraversal(store)

    fromStart.run(0)
    fromEnd.run(2)

    expect(fromStart.minDist(2)).toBe(2)
    expect(fromEnd.minDist(0)).toBe(2)
    expect(fromEnd.minDist(2)).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

describe('BfsTraversal — metrics', () => {
  it('records one bfs metric per run', () => {
    const sink = fakeSink()
    const bfs = new BfsTraversal(buildGraph([[0, 1], [1, 2], [2, 3]]), { metrics: sink })
    bfs.run(0)

    expect(sink.record).toHaveBeenCalledOnce()
    expect(sink.record).toHaveBeenCalledWith({
      stage: 'bfs',
      sourceId: 0,
      visitedCount: 4,
      maxDistance: 3,
      edgesScanned: 3,
      nodeCount: 4,
      edgeCount: 3,
    })
  })

  it('records nothing when the run fails', () => {
    const sink = fakeSink()
    const bfs = new BfsTraversal(buildGraph([[0, 1]]), { metrics: sink })
    bfs.run(0)
    expect(() => bfs.run(0)).toThrow(StaleTraversalStateError)
    expect(sink.record).toHaveBeenCalledOnce()
  })
})
