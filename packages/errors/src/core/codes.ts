/**
 * Built-in classification codes.
 *
 * Codes carry no policy (no status mapping, no retry rules). Projects may use
 * any other lowercase code without registering it.
 */
export const Codes = {
  // Domain / validation
  BadRequest: "bad_request",
  Unauthorized: "unauthorized",
  Forbidden: "forbidden",
  NotFound: "not_found",
  Conflict: "conflict",
  Invalid: "invalid",
  Unprocessable: "unprocessable",
  TooManyRequests: "too_many_requests",

  // Availability / time
  Timeout: "timeout",
  Unavailable: "unavailable",

  // Internal / meta
  Internal: "internal",
  Defect: "defect",
  Interrupt: "interrupt",
} as const

export type BuiltinCode = (typeof Codes)[keyof typeof Codes]

/** Built-in codes in a stable order. */
export const BUILTIN_CODES: readonly BuiltinCode[] = Object.freeze(Object.values(Codes))

const builtinCodeSet: ReadonlySet<string> = new Set(BUILTIN_CODES)

/** Returns a copy of {@link BUILTIN_CODES} the caller may modify. */
export function builtinCodes(): BuiltinCode[] {
  return [...BUILTIN_CODES]
}

export function isBuiltinCode(code: string): code is BuiltinCode {
  return builtinCodeSet.has(code)
}
