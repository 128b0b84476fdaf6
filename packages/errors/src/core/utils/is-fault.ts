import type { Fault, FaultKind } from "../../ports/error"

const FAULT_KINDS: ReadonlySet<unknown> = new Set<FaultKind>(["failure", "defect", "interrupt"])

/**
 * Type guard for the three error variants.
 *
 * @example
 * ```ts
 * try {
 *   // ...
 * } catch (err) {
 *   if (isFault(err)) {
 *     console.log(err.code, err.contextSnapshot())
 *   }
 * }
 * ```
 */
export function isFault(e: unknown): e is Fault {
  return (
    e instanceof Error &&
    "kind" in e &&
    FAULT_KINDS.has(e.kind) &&
    "code" in e &&
    typeof e.code === "string" &&
    "fields" in e &&
    Array.isArray(e.fields) &&
    "addContext" in e &&
    typeof e.addContext === "function"
  )
}
