/**
 * Classification tag. Built-in codes are lowercase snake_case; custom codes
 * need no registration.
 */
export type ErrorCode = Lowercase<string>

/** A single contextual key/value pair. Keys should be snake_case. */
export type Field = Readonly<{
  key: string
  value: unknown
}>

/**
 * Ordered, append-only context. Arrays are frozen once published and are
 * shared read-only between derived errors.
 */
export type Fields = readonly Field[]

/** One call site, most recent first within a {@link Stack}. */
export type Frame = Readonly<{
  function: string
  file: string
  line: number
  column: number
}>

export type Stack = readonly Frame[]

export type FaultKind = "failure" | "defect" | "interrupt"

/**
 * The capability set shared by the three error variants.
 *
 * Every fluent method is copy-on-write: it returns a new error and never
 * alters the receiver, so a value can be shared freely once created.
 */
export interface Fault extends Error {
  /** Variant tag: expected failure, programmer defect or cooperative interrupt */
  readonly kind: FaultKind

  /** Classification for programmatic handling */
  readonly code: ErrorCode

  /** Context fields in insertion order, duplicates included */
  readonly fields: Fields

  /** Captured call frames, if any */
  readonly frames: Stack | undefined

  /**
   * Immediate wrapped value.
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown

  /**
   * Sets the message only if it is currently empty (never concatenates) and
   * always appends the given key/value pairs.
   *
   * @remarks
   * A non-string key drops the whole pair, so later pairs stay aligned.
   * A trailing key without a value is stored with `undefined`.
   */
  addContext(message: string, ...pairs: unknown[]): Fault

  /**
   * Like {@link Fault.addContext}, then keeps only the newest `maxFields`
   * entries. `maxFields <= 0` means unbounded.
   */
  addContextBounded(message: string, maxFields: number, ...pairs: unknown[]): Fault

  withField(key: string, value: unknown): Fault

  /** Appends `message` to the current one with a `": "` separator. */
  appendMessage(message: string): Fault

  replaceMessage(message: string): Fault

  /** Replaces the code. Defects and interrupts keep their fixed code. */
  reclassify(code: ErrorCode): Fault

  /** Captures frames starting at the caller. */
  captureStack(): Fault

  /** Captures frames starting at the caller, skipping `skip` more frames. */
  captureStackSkipping(skip: number): Fault

  /**
   * Context projected to a fresh record: last write wins per key and empty
   * keys are dropped. Mutating the record never affects the error.
   */
  contextSnapshot(): Record<string, unknown>

  /** Concise rendering, e.g. `not_found: user not found` */
  toString(): string
}
