export { BUILTIN_CODES, type BuiltinCode, builtinCodes, Codes, isBuiltinCode } from "./core/codes"
export {
  badRequest,
  conflict,
  createFault,
  defect,
  forbidden,
  internal,
  interrupt,
  interruptDeadline,
  interruptFromSignal,
  invalid,
  notFound,
  timeout,
  tooManyRequests,
  unauthorized,
  unavailable,
  unprocessable,
} from "./core/constructors"
export {
  appendFields,
  boundFields,
  createField,
  EMPTY_FIELDS,
  fieldsFromPairs,
  fieldsToRecord,
} from "./core/context"
export { Defect, type DefectState } from "./core/defect"
export { Failure, type FailureState } from "./core/failure"
export {
  formatConcise,
  formatValue,
  formatVerbose,
  MAX_RENDER_DEPTH,
} from "./core/format"
export { Interrupt, type InterruptState } from "./core/interrupt"
export { append, JoinedError, join } from "./core/join"
export {
  type CodeOfOptions,
  codeOf,
  hasCode,
  isCanceled,
  isDeadline,
  isDefect,
  isInterrupt,
  isRetryable,
} from "./core/predicates"
export { deadlineExceeded, operationCanceled } from "./core/sentinels"
export {
  captureFrames,
  DEFAULT_STACK_DEPTH,
  parseStack,
  type StackOptions,
} from "./core/stack"
export {
  type FieldCheck,
  type FieldGuard,
  type FieldSchema,
  type SafeParseResult,
  type TypedField,
  typedField,
} from "./core/typed-field"
export {
  flatten,
  has,
  MAX_TRAVERSAL_DEPTH,
  MAX_TRAVERSAL_NODES,
  root,
  some,
  type TraversalOptions,
  type Visitor,
  walk,
} from "./core/utils/error-graph"
export { isFault } from "./core/utils/is-fault"
export {
  recode,
  toFault,
  withField,
  withStack,
  withStackSkip,
  wrap,
} from "./core/utils/to-fault"
export type {
  ErrorCode,
  Fault,
  FaultKind,
  Field,
  Fields,
  Frame,
  Stack,
} from "./ports/error"
