import type { ErrorCode, Fault, Fields, Stack } from "../ports/error"
import {
  appendFields,
  boundFields,
  createField,
  EMPTY_FIELDS,
  fieldsFromPairs,
  fieldsToRecord,
} from "./context"
import { formatVerbose, inspectCustom } from "./format"
import { captureFrames } from "./stack"
import { appendMessage, causeOption, setMessageOnce } from "./utils/message"

export type FailureState = Readonly<{
  message: string
  code: ErrorCode
  fields?: Fields
  cause?: unknown
  frames?: Stack
}>

/**
 * An expected, recoverable outcome: not found, invalid input, a dependency
 * that is down.
 *
 * Stacks are opt-in through {@link Failure.captureStack}. Prefer the semantic
 * constructors (`notFound`, `timeout`, ...) over `new Failure(...)`.
 */
export class Failure extends Error implements Fault {
  readonly kind = "failure"
  readonly code: ErrorCode
  readonly fields: Fields
  readonly frames: Stack | undefined

  constructor(state: FailureState) {
    super(state.message, causeOption(state.cause))

    this.name = this.constructor.name
    this.code = state.code
    this.fields = state.fields ?? EMPTY_FIELDS
    this.frames = state.frames
  }

  addContext(message: string, ...pairs: unknown[]): Failure {
    return this.derive({
      message: setMessageOnce(this.message, message),
      fields: appendFields(this.fields, fieldsFromPairs(pairs)),
    })
  }

  addContextBounded(message: string, maxFields: number, ...pairs: unknown[]): Failure {
    return this.derive({
      message: setMessageOnce(this.message, message),
      fields: boundFields(appendFields(this.fields, fieldsFromPairs(pairs)), maxFields),
    })
  }

  withField(key: string, value: unknown): Failure {
    return this.derive({ fields: appendFields(this.fields, [createField(key, value)]) })
  }

  appendMessage(message: string): Failure {
    return this.derive({ message: appendMessage(this.message, message) })
  }

  replaceMessage(message: string): Failure {
    return this.derive({ message })
  }

  reclassify(code: ErrorCode): Failure {
    return this.derive({ code })
  }

  captureStack(): Failure {
    return this.captureStackSkipping(1)
  }

  /** Replaces any existing frames. */
  captureStackSkipping(skip: number): Failure {
    return this.derive({ frames: captureFrames({ skip: skip + 1 }) })
  }

  contextSnapshot(): Record<string, unknown> {
    return fieldsToRecord(this.fields)
  }

  toString(): string {
    if (this.message === "") return this.code || "error"
    return this.code ? `${this.code}: ${this.message}` : this.message
  }

  [inspectCustom](): string {
    return formatVerbose(this)
  }

  private derive(patch: Partial<FailureState>): Failure {
    return new Failure({
      message: this.message,
      code: this.code,
      fields: this.fields,
      cause: this.cause,
      frames: this.frames,
      ...patch,
    })
  }
}
