import type { Field, Fields } from "../ports/error"

/** Canonical empty context, reused instead of allocating. */
export const EMPTY_FIELDS: Fields = Object.freeze([])

export function createField(key: string, value: unknown): Field {
  return Object.freeze({ key, value })
}

/**
 * Returns `dst` followed by `add` as a new frozen array.
 * Appending nothing returns `dst` itself.
 */
export function appendFields(dst: Fields, add: Fields): Fields {
  if (add.length === 0) {
    return dst.length === 0 ? EMPTY_FIELDS : dst
  }
  return Object.freeze([...dst, ...add])
}

/**
 * Reads `(key, value)` pairs left to right.
 *
 * A non-string key drops the entire pair, key and value, so that a value is
 * never promoted to the next pair's key. A trailing key with no value is kept
 * with `undefined`.
 *
 * @example
 * ```ts
 * fieldsFromPairs([123, "v1", "k2", "v2"]) // [{ key: "k2", value: "v2" }]
 * ```
 */
export function fieldsFromPairs(pairs: readonly unknown[]): Fields {
  if (pairs.length === 0) return EMPTY_FIELDS

  const out: Field[] = []
  for (let i = 0; i < pairs.length; i += 2) {
    const key = pairs[i]
    if (typeof key !== "string") continue
    out.push(createField(key, i + 1 < pairs.length ? pairs[i + 1] : undefined))
  }

  return out.length === 0 ? EMPTY_FIELDS : Object.freeze(out)
}

/**
 * Keeps the newest `maxFields` entries. `maxFields <= 0` leaves the context
 * unbounded.
 */
export function boundFields(fields: Fields, maxFields: number): Fields {
  if (maxFields <= 0 || fields.length <= maxFields) return fields
  return Object.freeze(fields.slice(fields.length - maxFields))
}

/**
 * Projects fields to a new record (copy-on-read). Later duplicates overwrite
 * earlier ones and empty keys are skipped.
 */
export function fieldsToRecord(fields: Fields): Record<string, unknown> {
  const entries = new Map<string, unknown>()
  for (const { key, value } of fields) {
    if (key === "") continue
    entries.set(key, value)
  }
  return Object.fromEntries(entries)
}
