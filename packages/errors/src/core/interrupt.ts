import type { ErrorCode, Fault, Fields } from "../ports/error"
import { Codes } from "./codes"
import {
  appendFields,
  boundFields,
  createField,
  EMPTY_FIELDS,
  fieldsFromPairs,
  fieldsToRecord,
} from "./context"
import { formatVerbose, inspectCustom } from "./format"
import { appendMessage, setMessageOnce } from "./utils/message"

export type InterruptState = Readonly<{
  message: string
  fields?: Fields
  /** `operationCanceled` or `deadlineExceeded` */
  cause: Error
}>

/**
 * Cooperative cancellation or an expired deadline.
 *
 * Unwraps to one of the cancellation sentinels, so
 * `has(err, operationCanceled)` answers "was this canceled". Never carries
 * frames.
 */
export class Interrupt extends Error implements Fault {
  readonly kind = "interrupt"
  readonly code = Codes.Interrupt
  readonly fields: Fields
  readonly frames: undefined = undefined
  declare readonly cause: Error

  constructor(state: InterruptState) {
    super(state.message, { cause: state.cause })

    this.name = this.constructor.name
    this.fields = state.fields ?? EMPTY_FIELDS
  }

  addContext(message: string, ...pairs: unknown[]): Interrupt {
    return this.derive({
      message: setMessageOnce(this.message, message),
      fields: appendFields(this.fields, fieldsFromPairs(pairs)),
    })
  }

  addContextBounded(message: string, maxFields: number, ...pairs: unknown[]): Interrupt {
    return this.derive({
      message: setMessageOnce(this.message, message),
      fields: boundFields(appendFields(this.fields, fieldsFromPairs(pairs)), maxFields),
    })
  }

  withField(key: string, value: unknown): Interrupt {
    return this.derive({ fields: appendFields(this.fields, [createField(key, value)]) })
  }

  appendMessage(message: string): Interrupt {
    return this.derive({ message: appendMessage(this.message, message) })
  }

  replaceMessage(message: string): Interrupt {
    return this.derive({ message })
  }

  /** No-op: an interrupt stays an interrupt. Returns an equivalent copy. */
  reclassify(_code: ErrorCode): Interrupt {
    return this.derive({})
  }

  /** No-op: interrupts never carry frames. */
  captureStack(): Interrupt {
    return this.derive({})
  }

  captureStackSkipping(_skip: number): Interrupt {
    return this.derive({})
  }

  contextSnapshot(): Record<string, unknown> {
    return fieldsToRecord(this.fields)
  }

  toString(): string {
    return this.message === "" ? "interrupt" : `interrupt: ${this.message}`
  }

  [inspectCustom](): string {
    return formatVerbose(this)
  }

  private derive(patch: Partial<InterruptState>): Interrupt {
    return new Interrupt({
      message: this.message,
      fields: this.fields,
      cause: this.cause,
      ...patch,
    })
  }
}
