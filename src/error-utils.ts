import type { z } from 'zod'

/**
 * Formats a Zod issue path as a dot/bracket string.
 *
 * Examples:
 *   []                          → "(root)"
 *   ["graph", "nodeCapacity"]   → "graph.nodeCapacity"
 *   [1]                         → "[1]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('')
}

/**
 * Formats Zod issues one per line, each indented by two spaces:
 * `  <path>: <message>`.
 */
export function formatZodErrors(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`)
    .join('\n')
}

/**
 * Renders an arbitrary value for inclusion in an error message.
 * Falls back to `String()` for values JSON cannot represent.
 */
export function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined'
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value)
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}
