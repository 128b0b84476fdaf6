import type { Fault } from "../ports/error"
import { isNil, isObjectLike, multiCauseOf, singleCauseOf } from "./utils/error-graph"
import { isFault } from "./utils/is-fault"

/** Nesting beyond this depth is rendered as {@link TRUNCATED}. */
export const MAX_RENDER_DEPTH = 256

const CYCLE = "<cycle>"
const TRUNCATED = "<truncated>"

/** Hook `node:util` calls to inspect a value. */
export const inspectCustom: unique symbol = Symbol.for("nodejs.util.inspect.custom")

/**
 * One-line rendering of any value.
 *
 * - faultline errors use their own `toString()` (`<code>: <message>`)
 * - other errors render their message, or their name when it is empty
 * - anything else is printed as a value
 */
export function formatConcise(value: unknown): string {
  if (isFault(value)) return value.toString()
  if (value instanceof Error) return value.message || value.name
  return formatValue(value)
}

/**
 * Multi-line rendering:
 *
 * ```text
 * code=<code> msg="<message>"
 * ctx: key1=val1 key2=val2
 * cause: <cause, rendered verbosely>
 * stack:
 *   fn file:line
 * ```
 *
 * A defect's `msg` is its concise form (`defect: <message or cause>`).
 * Sections without content are omitted. Joined errors render each child in
 * turn, one after another. A node met again on its own cause path prints as
 * `<cycle>`.
 */
export function formatVerbose(value: unknown): string {
  return renderVerbose(value, new Set<object>(), 0)
}

function renderVerbose(value: unknown, path: Set<object>, depth: number): string {
  if (!isObjectLike(value)) return formatValue(value)
  if (path.has(value)) return CYCLE
  if (depth >= MAX_RENDER_DEPTH) return TRUNCATED

  path.add(value)
  try {
    return isFault(value) ? renderFault(value, path, depth) : renderForeign(value, path, depth)
  } finally {
    path.delete(value)
  }
}

function renderFault(err: Fault, path: Set<object>, depth: number): string {
  const code = err.code ? `code=${err.code} ` : ""
  const message = err.kind === "defect" ? err.toString() : err.message
  const lines = [`${code}msg=${JSON.stringify(message)}`]

  const ctx = err.fields
    .filter((f) => f.key !== "")
    .map((f) => `${f.key}=${formatValue(f.value)}`)
  if (ctx.length > 0) lines.push(`ctx: ${ctx.join(" ")}`)

  if (!isNil(err.cause)) {
    lines.push(`cause: ${renderVerbose(err.cause, path, depth + 1)}`)
  }

  if (err.frames && err.frames.length > 0) {
    lines.push("stack:")
    for (const frame of err.frames) {
      lines.push(`  ${frame.function} ${frame.file}:${frame.line}`)
    }
  }

  return lines.join("\n")
}

function renderForeign(value: object, path: Set<object>, depth: number): string {
  const children = multiCauseOf(value)
  if (children) {
    return children
      .filter((child) => !isNil(child))
      .map((child) => renderVerbose(child, path, depth + 1))
      .join("\n")
  }

  const head = formatConcise(value)
  const cause = singleCauseOf(value)
  return isNil(cause) ? head : `${head}\ncause: ${renderVerbose(cause, path, depth + 1)}`
}

/** Renders a context value the way `ctx:` lines show it. */
export function formatValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return value
    case "function":
      return `[function ${value.name || "anonymous"}]`
    case "object":
      if (value === null) return "null"
      if (value instanceof Error) return formatConcise(value)
      if (value instanceof Date) return value.toISOString()
      return safeStringify(value)
    default:
      return String(value)
  }
}

function safeStringify(value: object): string {
  try {
    return JSON.stringify(value) ?? objectTag(value)
  } catch {
    return objectTag(value)
  }
}

/** `[object Object]` and the like; works without a prototype. */
function objectTag(value: object): string {
  return Object.prototype.toString.call(value)
}
