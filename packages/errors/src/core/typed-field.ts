import type { Fault } from "../ports/error"
import { defect } from "./constructors"
import { isNil } from "./utils/error-graph"
import { isFault } from "./utils/is-fault"
import { withField } from "./utils/to-fault"

export type SafeParseResult<T> = { success: true; data: T } | { success: false }

/** Anything with a zod-style `safeParse`. */
export type FieldSchema<T> = {
  safeParse: (value: unknown) => SafeParseResult<T>
}

export type FieldGuard<T> = (value: unknown) => value is T

export type FieldCheck<T> = FieldGuard<T> | FieldSchema<T>

export interface TypedField<T> {
  readonly key: string

  /** `withField(err, key, value)`; a nil `err` becomes a new internal failure. */
  set(err: unknown, value: T): Fault

  /** The value if `err` is a Fault holding the key and the value passes the check. */
  get(err: unknown): T | undefined

  /**
   * Like {@link TypedField.get} but throws a {@link Defect} when the error is
   * nil, the field is missing, or the value fails the check.
   *
   * Meant for tests and invariants, where absence is a bug.
   */
  mustGet(err: unknown): T
}

type Lookup<T> = { ok: true; value: T } | { ok: false; reason: string }

/**
 * Declares a context key whose value is checked on the way out.
 *
 * @example
 * ```ts
 * const attempt = typedField("attempt", z.number().int())
 * const requestId = typedField("request_id", (v): v is string => typeof v === "string")
 *
 * const err = attempt.set(unavailable("db"), 3)
 * attempt.get(err) // 3
 * ```
 */
export function typedField<T>(key: string, check: FieldCheck<T>): TypedField<T> {
  const parse = (value: unknown): SafeParseResult<T> => {
    if (typeof check === "function") {
      return check(value) ? { success: true, data: value } : { success: false }
    }
    return check.safeParse(value)
  }

  const lookup = (err: unknown): Lookup<T> => {
    if (isNil(err)) return { ok: false, reason: "error is nil" }
    if (!isFault(err)) return { ok: false, reason: "field missing" }

    const context = err.contextSnapshot()
    if (!Object.hasOwn(context, key)) return { ok: false, reason: "field missing" }

    const value = context[key]
    const parsed = parse(value)
    if (!parsed.success) {
      return { ok: false, reason: `wrong type (${describeType(value)})` }
    }
    return { ok: true, value: parsed.data }
  }

  return {
    key,
    set: (err, value) => withField(err, key, value),
    get: (err) => {
      const found = lookup(err)
      return found.ok ? found.value : undefined
    },
    mustGet: (err) => {
      const found = lookup(err)
      if (found.ok) return found.value

      throw defect(new TypeError(`typed field "${key}": ${found.reason}`)).addContext(
        "",
        "key",
        key,
        "reason",
        found.reason,
      )
    },
  }
}

function describeType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}
