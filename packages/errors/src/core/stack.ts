import type { Frame, Stack } from "../ports/error"

export const DEFAULT_STACK_DEPTH = 64

export type StackOptions = Readonly<{
  /** Frames to drop above the caller of {@link captureFrames}. Default: 0 */
  skip?: number

  /** Maximum number of frames kept. Default: {@link DEFAULT_STACK_DEPTH} */
  maxDepth?: number
}>

const EMPTY_STACK: Stack = Object.freeze([])

/**
 * Captures the current call stack, starting at the caller of this function.
 *
 * Frames come from V8's `Error.captureStackTrace`; the stack trace limit is
 * raised for the duration of the capture so that `skip + maxDepth` frames are
 * available.
 */
export function captureFrames(options?: StackOptions): Stack {
  const skip = Math.max(0, Math.trunc(options?.skip ?? 0))
  const maxDepth =
    options?.maxDepth !== undefined && options.maxDepth > 0
      ? Math.trunc(options.maxDepth)
      : DEFAULT_STACK_DEPTH

  const holder: { stack?: string } = {}
  const limit = Error.stackTraceLimit
  Error.stackTraceLimit = skip + maxDepth
  try {
    Error.captureStackTrace(holder, captureFrames)
  } finally {
    Error.stackTraceLimit = limit
  }

  const frames = parseStack(holder.stack ?? "").slice(skip, skip + maxDepth)
  return frames.length === 0 ? EMPTY_STACK : Object.freeze(frames)
}

/**
 * Parses V8 stack text (`    at fn (file:line:column)`) into frames.
 * Lines that are not call sites, such as the header, are ignored.
 */
export function parseStack(text: string): Frame[] {
  const frames: Frame[] = []
  for (const raw of text.split("\n")) {
    const line = raw.trim()
    if (!line.startsWith("at ")) continue
    frames.push(parseFrame(line.slice(3)))
  }
  return frames
}

const CALL_SITE = /^(.*?) \((.*)\)$/
const LOCATION = /^(.*):(\d+):(\d+)$/

function parseFrame(site: string): Frame {
  const body = site.startsWith("async ") ? site.slice(6) : site
  const call = CALL_SITE.exec(body)
  const fn = call?.[1] ?? "<anonymous>"
  const location = call?.[2] ?? body

  const at = LOCATION.exec(location)
  if (!at) {
    return Object.freeze({ function: fn, file: location, line: 0, column: 0 })
  }

  return Object.freeze({
    function: fn,
    file: at[1] ?? location,
    line: Number(at[2]),
    column: Number(at[3]),
  })
}
