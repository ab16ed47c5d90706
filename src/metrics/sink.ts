/**
 * Metric emission sinks: structured console output and optional JSONL file.
 *
 * `emitMetric` always writes to console.warn with a `[graphx:metrics]` prefix.
 * `appendMetricsFile` appends to `{directory}/.metrics.jsonl`.
 * `createMetricsSink` combines both according to the `metrics` config block.
 */

import { promises as fs } from 'node:fs'
import { join, dirname } from 'node:path'
import type { GraphxConfig } from '../config.js'
import type { MetricData, MetricEvent } from './types.js'

/** File name written inside the configured metrics directory. */
export const METRICS_FILE_NAME = '.metrics.jsonl'

/** Wraps a payload in a timestamped event. */
export function createMetricEvent(data: MetricData, now: Date = new Date()): MetricEvent {
  return { stage: data.stage, timestamp: now.toISOString(), data }
}

/**
 * Emits a metric event to stderr via console.warn.
 * Unconditional; the sink decides whether to call it.
 */
export function emitMetric(event: MetricEvent): void {
  console.warn(`[graphx:metrics] ${JSON.stringify(event)}`)
}

/**
 * Appends metric events as JSONL lines to `{directory}/.metrics.jsonl`.
 * Creates the file and parent directories if they don't exist.
 *
 * Never throws. Errors are logged and swallowed.
 */
export async function appendMetricsFile(
  directory: string,
  events: readonly MetricEvent[]
): Promise<void> {
  if (events.length === 0) return

  const filePath = join(directory, METRICS_FILE_NAME)
  try {
    await fs.mkdir(dirname(filePath), { recursive: true })
    await fs.appendFile(filePath, events.map((e) => JSON.stringify(e) + '\n').join(''), 'utf-8')
  } catch (err) {
    console.error(
      `[graphx] metrics: failed to append to ${filePath}:`,
      err instanceof Error ? err.message : String(err),
    )
  }
}

/** Receives traversal metrics; see {@link createMetricsSink}. */
export interface MetricsSink {
  /** Records one payload. Synchronous; file output is deferred to `flush`. */
  record(data: MetricData): void
  /** Writes buffered events to the metrics file, if file output is on. */
  flush(): Promise<void>
  /** Events recorded since the last flush. */
  readonly pending: readonly MetricEvent[]
}

/**
 * Builds a sink from the `metrics` config block.
 *
 * - `enabled: false`: every call is a no-op.
 * - `enabled: true`: each record goes to stderr via {@link emitMetric}.
 * - `fileOutput: true`: records are also buffered and appended to the file
 *   under `directory` on `flush()`.
 */
export function createMetricsSink(config: GraphxConfig['metrics']): MetricsSink {
  let buffer: MetricEvent[] = []

  return {
    record(data) {
      if (!config.enabled) return
      const event = createMetricEvent(data)
      emitMetric(event)
      if (config.fileOutput) buffer.push(event)
    },
    async flush() {
      if (buffer.length === 0) return
      const batch = buffer
      buffer = []
      await appendMetricsFile(config.directory, batch)
    },
    get pending() {
      return buffer
    },
  }
}
