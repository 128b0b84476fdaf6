function sentinel(name: string, message: string): Error {
  const err = new Error(message)
  err.name = name
  return Object.freeze(err)
}

/**
 * Canonical cause of every plain interrupt. Compare with `has(err, operationCanceled)`.
 */
export const operationCanceled: Error = sentinel("AbortError", "operation canceled")

/** Canonical cause of every deadline interrupt. */
export const deadlineExceeded: Error = sentinel("TimeoutError", "deadline exceeded")
