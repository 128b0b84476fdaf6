import { type Fault, formatVerbose, isFault } from "@faultline/errors"
import { errWithCause } from "pino-std-serializers"

/**
 * Log shape of a faultline error.
 *
 * Designed to be JSON.stringify-safe as long as context values are.
 */
export type SerializedFault = {
  type: string
  kind: Fault["kind"]
  code: string
  message: string
  concise: string
  context: Record<string, unknown>
  cause?: unknown
  verbose?: string
}

export type FaultSerializerOptions = Readonly<{
  /** Add the verbose rendering (context, causes, frames). Default: false */
  includeStack?: boolean
}>

/**
 * Builds pino's `err` serializer.
 *
 * Handles:
 * - faultline errors (code, context and the concise form are kept)
 * - other Error instances, through `errWithCause` from pino-std-serializers
 * - non-Error values, which pass through untouched
 */
export function createFaultSerializer(
  options?: FaultSerializerOptions,
): (err: unknown) => unknown {
  const includeStack = options?.includeStack ?? false

  const serialize = (err: unknown): unknown => {
    if (isFault(err)) return serializeFault(err)
    if (err instanceof Error) return errWithCause(err)
    return err
  }

  const serializeFault = (err: Fault): SerializedFault => ({
    type: err.name,
    kind: err.kind,
    code: err.code,
    message: err.message,
    concise: err.toString(),
    context: err.contextSnapshot(),
    ...(err.cause !== undefined && { cause: serialize(err.cause) }),
    ...(includeStack && { verbose: formatVerbose(err) }),
  })

  return serialize
}
