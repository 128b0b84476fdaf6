import { Codes } from "./codes"
import { fieldsFromPairs } from "./context"
import { Defect } from "./defect"
import { Failure } from "./failure"
import { formatConcise } from "./format"
import { Interrupt } from "./interrupt"
import { deadlineExceeded, operationCanceled } from "./sentinels"
import { captureFrames } from "./stack"
import { isNil, isObjectLike } from "./utils/error-graph"

// Domain

/** A missing entity, e.g. `notFound("user", 42)` → `user not found`. */
export function notFound(entity: string, id: unknown): Failure {
  return new Failure({
    message: `${entity} not found`,
    code: Codes.NotFound,
    fields: fieldsFromPairs(["entity", entity, "id", id]),
  })
}

/** Syntactically or semantically invalid input. */
export function invalid(field: string, reason: string): Failure {
  return new Failure({
    message: `invalid ${field}`,
    code: Codes.Invalid,
    fields: fieldsFromPairs(["field", field, "reason", reason]),
  })
}

/** Well-formed input that cannot be processed. */
export function unprocessable(field: string, reason: string): Failure {
  return new Failure({
    message: `unprocessable ${field}`,
    code: Codes.Unprocessable,
    fields: fieldsFromPairs(["field", field, "reason", reason]),
  })
}

export function badRequest(message: string): Failure {
  return new Failure({ message, code: Codes.BadRequest })
}

export function unauthorized(message: string): Failure {
  return new Failure({ message, code: Codes.Unauthorized })
}

export function forbidden(resource: string): Failure {
  return new Failure({
    message: "forbidden",
    code: Codes.Forbidden,
    fields: fieldsFromPairs(["resource", resource]),
  })
}

export function conflict(message: string): Failure {
  return new Failure({ message, code: Codes.Conflict })
}

export function tooManyRequests(resource: string): Failure {
  return new Failure({
    message: "too many requests",
    code: Codes.TooManyRequests,
    fields: fieldsFromPairs(["resource", resource]),
  })
}

// Infrastructure

/**
 * Wraps `cause` as an internal failure and captures a stack at the caller,
 * even when there is no cause.
 */
export function internal(cause?: unknown): Failure {
  return new Failure({
    message: "internal error",
    code: Codes.Internal,
    cause: isNil(cause) ? undefined : cause,
  }).captureStackSkipping(1)
}

/**
 * An operation that took too long; records `timeout_ms`.
 * Use {@link interruptDeadline} when a deadline canceled the work.
 */
export function timeout(durationMs: number): Failure {
  return new Failure({
    message: "timeout",
    code: Codes.Timeout,
    fields: fieldsFromPairs(["timeout_ms", durationMs]),
  })
}

export function unavailable(service: string): Failure {
  return new Failure({
    message: "unavailable",
    code: Codes.Unavailable,
    fields: fieldsFromPairs(["service", service]),
  })
}

/**
 * Generic internal failure with a message and optional key/value pairs.
 * Prefer a semantic constructor when one fits.
 *
 * @example
 * ```ts
 * throw createFault("ledger out of balance", "account_id", id)
 * ```
 */
export function createFault(message: string, ...pairs: unknown[]): Failure {
  return new Failure({ message, code: Codes.Internal, fields: fieldsFromPairs(pairs) })
}

// Defects and interrupts

/**
 * Wraps an unexpected programming error and captures a stack at the caller.
 * A missing cause is replaced by `Error("nil defect")`.
 */
export function defect(cause?: unknown): Defect {
  return new Defect({
    message: "",
    cause: isNil(cause) ? new Error("nil defect") : cause,
    frames: captureFrames({ skip: 1 }),
  })
}

/** Cooperative cancellation; unwraps to {@link operationCanceled}. */
export function interrupt(reason: string): Interrupt {
  return new Interrupt({ message: reason, cause: operationCanceled })
}

/** Deadline expiry; unwraps to {@link deadlineExceeded}. */
export function interruptDeadline(reason: string): Interrupt {
  return new Interrupt({ message: reason, cause: deadlineExceeded })
}

/**
 * Interrupt for an aborted `AbortSignal`.
 *
 * A `TimeoutError` reason (what `AbortSignal.timeout()` produces) gives the
 * deadline variant. A reason other than the platform's default `AbortError`
 * or `TimeoutError` is kept as the `signal_reason` field.
 */
export function interruptFromSignal(signal: AbortSignal, reason = ""): Interrupt {
  const cause: unknown = signal.reason
  const base = isNamedError(cause, "TimeoutError")
    ? interruptDeadline(reason)
    : interrupt(reason)

  if (isNil(cause) || isNamedError(cause, "AbortError") || isNamedError(cause, "TimeoutError")) {
    return base
  }
  return base.withField("signal_reason", formatConcise(cause))
}

function isNamedError(value: unknown, name: string): boolean {
  return isObjectLike(value) && "name" in value && value.name === name
}
