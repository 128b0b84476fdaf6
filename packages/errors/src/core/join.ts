import { formatConcise, formatVerbose, inspectCustom } from "./format"
import { isNil } from "./utils/error-graph"

/**
 * Multi-cause container returned by {@link join}.
 *
 * It is an `AggregateError`, so `errors` holds the children; the message is
 * each child's concise rendering, one per line. `formatVerbose` renders every
 * child verbosely instead.
 */
export class JoinedError extends AggregateError {
  constructor(errors: readonly unknown[]) {
    super(errors, errors.map((e) => formatConcise(e)).join("\n"))

    this.name = this.constructor.name
    Object.freeze(this.errors)
  }

  toString(): string {
    return this.message
  }

  [inspectCustom](): string {
    return formatVerbose(this)
  }
}

/**
 * Combines errors, ignoring nils.
 *
 * - no non-nil input → `undefined`
 * - one → that value, unchanged
 * - more → a {@link JoinedError}
 */
export function join(...errs: (Error | null | undefined)[]): Error | undefined
export function join(...errs: unknown[]): unknown
export function join(...errs: unknown[]): unknown {
  const present = errs.filter((e) => !isNil(e))

  if (present.length === 0) return undefined
  if (present.length === 1) return present[0]
  return new JoinedError(present)
}

/**
 * `join(head, ...more)`, returning `head` as-is when there is nothing to add.
 */
export function append(
  head: Error | null | undefined,
  ...more: (Error | null | undefined)[]
): Error | undefined
export function append(head: unknown, ...more: unknown[]): unknown
export function append(head: unknown, ...more: unknown[]): unknown {
  if (isNil(head)) return join(...more)
  if (more.every((e) => isNil(e))) return head
  return join(head, ...more)
}
