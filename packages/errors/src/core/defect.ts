import type { ErrorCode, Fault, Fields, Stack } from "../ports/error"
import { Codes } from "./codes"
import {
  appendFields,
  boundFields,
  createField,
  EMPTY_FIELDS,
  fieldsFromPairs,
  fieldsToRecord,
} from "./context"
import { formatConcise, formatVerbose, inspectCustom } from "./format"
import { appendMessage, setMessageOnce } from "./utils/message"

export type DefectState = Readonly<{
  message: string
  fields?: Fields
  cause: unknown
  frames: Stack
}>

/**
 * A programming bug or broken invariant.
 *
 * The code is always `defect`, the cause is never `undefined`, and frames are
 * captured once when the defect is created.
 */
export class Defect extends Error implements Fault {
  readonly kind = "defect"
  readonly code = Codes.Defect
  readonly fields: Fields
  readonly frames: Stack

  constructor(state: DefectState) {
    super(state.message, { cause: state.cause })

    this.name = this.constructor.name
    this.fields = state.fields ?? EMPTY_FIELDS
    this.frames = state.frames
  }

  addContext(message: string, ...pairs: unknown[]): Defect {
    return this.derive({
      message: setMessageOnce(this.message, message),
      fields: appendFields(this.fields, fieldsFromPairs(pairs)),
    })
  }

  addContextBounded(message: string, maxFields: number, ...pairs: unknown[]): Defect {
    return this.derive({
      message: setMessageOnce(this.message, message),
      fields: boundFields(appendFields(this.fields, fieldsFromPairs(pairs)), maxFields),
    })
  }

  withField(key: string, value: unknown): Defect {
    return this.derive({ fields: appendFields(this.fields, [createField(key, value)]) })
  }

  appendMessage(message: string): Defect {
    return this.derive({ message: appendMessage(this.message, message) })
  }

  replaceMessage(message: string): Defect {
    return this.derive({ message })
  }

  /** No-op: a defect stays a defect. Returns an equivalent copy. */
  reclassify(_code: ErrorCode): Defect {
    return this.derive({})
  }

  /** No-op: frames were captured at creation and are never recaptured. */
  captureStack(): Defect {
    return this.derive({})
  }

  /** No-op, see {@link Defect.captureStack}. */
  captureStackSkipping(_skip: number): Defect {
    return this.derive({})
  }

  contextSnapshot(): Record<string, unknown> {
    return fieldsToRecord(this.fields)
  }

  toString(): string {
    if (this.message !== "") return `defect: ${this.message}`
    return `defect: ${formatConcise(this.cause)}`
  }

  [inspectCustom](): string {
    return formatVerbose(this)
  }

  private derive(patch: Partial<DefectState>): Defect {
    return new Defect({
      message: this.message,
      fields: this.fields,
      cause: this.cause,
      frames: this.frames,
      ...patch,
    })
  }
}
