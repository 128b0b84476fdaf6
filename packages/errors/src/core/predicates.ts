import { Codes } from "./codes"
import { Defect } from "./defect"
import { Interrupt } from "./interrupt"
import { deadlineExceeded, operationCanceled } from "./sentinels"
import {
  has,
  isNil,
  isObjectLike,
  multiCauseOf,
  singleCauseOf,
  some,
} from "./utils/error-graph"

export type CodeOfOptions = Readonly<{
  /**
   * - `"primary"`: follow the cause chain, taking the first child of a joined
   *   error, and report the first code met
   * - `"graph"`: report the first code in `walk` order across every branch
   *
   * @default "primary"
   */
  scope?: "primary" | "graph"
}>

const RETRYABLE_CODES: ReadonlySet<string> = new Set([
  Codes.Unavailable,
  Codes.Timeout,
  Codes.TooManyRequests,
])

const ABORT_ERROR_NAMES: ReadonlySet<unknown> = new Set(["AbortError", "TimeoutError"])

/**
 * The code a node reports: any object whose `code` property is a string.
 *
 * @remarks
 * Foreign errors count too, so a Node.js system error reports e.g. `ENOENT`.
 */
function reportedCode(node: unknown): string | undefined {
  if (!isObjectLike(node)) return undefined
  try {
    const code: unknown = Reflect.get(node, "code")
    return typeof code === "string" ? code : undefined
  } catch {
    return undefined
  }
}

/** Whether any node in the graph, on any branch, reports `code`. */
export function hasCode(err: unknown, code: string): boolean {
  return some(err, (node) => reportedCode(node) === code)
}

/**
 * The first code found in `err`, or `""` when no node reports one.
 *
 * The default scope follows the primary path only, so under a join of mixed
 * codes the answer comes from the first child; pass `{ scope: "graph" }` to
 * search every branch in walk order.
 */
export function codeOf(err: unknown, options?: CodeOfOptions): string {
  if ((options?.scope ?? "primary") === "graph") {
    let found = ""
    some(err, (node) => {
      const code = reportedCode(node)
      if (code === undefined) return false
      found = code
      return true
    })
    return found
  }

  const visited = new Set<unknown>()
  let node = err
  while (!isNil(node) && !visited.has(node)) {
    const code = reportedCode(node)
    if (code !== undefined) return code

    visited.add(node)
    const children = multiCauseOf(node)
    node = children ? children.find((child) => !isNil(child)) : singleCauseOf(node)
  }
  return ""
}

/**
 * Heuristic: any node reports `unavailable`, `timeout` or
 * `too_many_requests`. Backoff and budgets are the caller's business.
 */
export function isRetryable(err: unknown): boolean {
  return some(err, (node) => {
    const code = reportedCode(node)
    return code !== undefined && RETRYABLE_CODES.has(code)
  })
}

/** Any node is a {@link Defect} or reports `defect`. */
export function isDefect(err: unknown): boolean {
  return some(err, (node) => node instanceof Defect || reportedCode(node) === Codes.Defect)
}

/**
 * Cooperative cancellation anywhere in the graph: a cancellation sentinel, an
 * {@link Interrupt}, a node reporting `interrupt`, or an `AbortError` /
 * `TimeoutError` such as an aborted `AbortSignal` throws.
 */
export function isInterrupt(err: unknown): boolean {
  if (isCanceled(err) || isDeadline(err)) return true

  return some(
    err,
    (node) =>
      node instanceof Interrupt ||
      reportedCode(node) === Codes.Interrupt ||
      (isObjectLike(node) && "name" in node && ABORT_ERROR_NAMES.has(node.name)),
  )
}

/** `err` unwraps to {@link operationCanceled}. */
export function isCanceled(err: unknown): boolean {
  return has(err, operationCanceled)
}

/** `err` unwraps to {@link deadlineExceeded}. */
export function isDeadline(err: unknown): boolean {
  return has(err, deadlineExceeded)
}
