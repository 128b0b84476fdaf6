import type { ErrorCode, Fault } from "../../ports/error"
import { Codes } from "../codes"
import { createField, EMPTY_FIELDS, fieldsFromPairs } from "../context"
import { Failure } from "../failure"
import { isNil } from "./error-graph"
import { isFault } from "./is-fault"

/**
 * Convert any thrown value to a Fault.
 *
 * - nil → `undefined`: nothing to convert
 * - a Fault passes through unchanged
 * - anything else becomes an internal failure with the value as its cause
 *   (no stack capture)
 */
export function toFault(err: unknown): Fault | undefined {
  if (isNil(err)) return undefined
  if (isFault(err)) return err
  return internalWrapper(err)
}

/**
 * Adds a message and key/value pairs to any value.
 *
 * Unlike {@link toFault}, a nil `err` yields a new internal failure: the caller
 * is asserting that something went wrong, not converting.
 * A Fault is augmented with `addContext`; anything else is wrapped as an
 * internal failure carrying the message and pairs.
 */
export function wrap(err: unknown, message: string, ...pairs: unknown[]): Fault {
  if (isFault(err)) return err.addContext(message, ...pairs)

  return new Failure({
    message,
    code: Codes.Internal,
    fields: fieldsFromPairs(pairs),
    cause: isNil(err) ? undefined : err,
  })
}

/** Attaches a single field to any value, creating a failure when needed. */
export function withField(err: unknown, key: string, value: unknown): Fault {
  if (isFault(err)) return err.withField(key, value)

  const fields = Object.freeze([createField(key, value)])
  if (isNil(err)) {
    return new Failure({ message: "error", code: Codes.Internal, fields })
  }
  return new Failure({ message: "internal error", code: Codes.Internal, fields, cause: err })
}

/** Sets the code on any value, creating a failure when needed. */
export function recode(err: unknown, code: ErrorCode): Fault {
  if (isFault(err)) return err.reclassify(code)
  if (isNil(err)) return new Failure({ message: "error", code })
  return new Failure({ message: "internal error", code, cause: err })
}

/** Captures a stack at the caller onto any value. */
export function withStack(err: unknown): Fault {
  return withStackSkip(err, 1)
}

/**
 * Like {@link withStack}, skipping `skip` more frames above the caller.
 * Use it from helpers that should not appear in the captured stack.
 */
export function withStackSkip(err: unknown, skip: number): Fault {
  if (isFault(err)) return err.captureStackSkipping(skip + 1)

  const base = isNil(err)
    ? new Failure({ message: "error", code: Codes.Internal })
    : internalWrapper(err)
  return base.captureStackSkipping(skip + 1)
}

function internalWrapper(cause: unknown): Failure {
  return new Failure({
    message: "internal error",
    code: Codes.Internal,
    fields: EMPTY_FIELDS,
    cause,
  })
}
