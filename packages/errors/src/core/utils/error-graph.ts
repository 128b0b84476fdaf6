/** Traversal stops once this many frames are pending on its stack. */
export const MAX_TRAVERSAL_DEPTH = 4096

/**
 * Traversal stops after entering this many nodes. Only graphs whose accessors
 * return a new object on every read get this far.
 */
export const MAX_TRAVERSAL_NODES = 1 << 16

export type TraversalOptions = Readonly<{
  /**
   * Cap on pending frames, i.e. on multi-cause nesting. Single-cause links
   * do not count. Default: {@link MAX_TRAVERSAL_DEPTH}
   */
  maxDepth?: number

  /** Cap on nodes entered. Default: {@link MAX_TRAVERSAL_NODES} */
  maxNodes?: number
}>

/** Return `false` to stop the walk. */
export type Visitor = (node: unknown) => boolean

export function isNil(v: unknown): v is null | undefined {
  return v === null || v === undefined
}

export function isObjectLike(v: unknown): v is object {
  return (typeof v === "object" && v !== null) || typeof v === "function"
}

/**
 * Children of a multi-cause node: an `Error` carrying an `errors` array, as
 * `AggregateError` and `JoinedError` do. `undefined` for any other value.
 */
export function multiCauseOf(node: unknown): readonly unknown[] | undefined {
  if (!(node instanceof Error)) return undefined
  try {
    const errors: unknown = Reflect.get(node, "errors")
    return Array.isArray(errors) ? errors : undefined
  } catch {
    return undefined
  }
}

/**
 * The `cause` of a single-cause node. A throwing accessor reads as no cause,
 * which makes the node a leaf.
 */
export function singleCauseOf(node: unknown): unknown {
  if (!isObjectLike(node)) return undefined
  try {
    return "cause" in node ? Reflect.get(node, "cause") : undefined
  } catch {
    return undefined
  }
}

/**
 * Membership guard for visited nodes.
 *
 * Objects and functions are tracked by identity, primitives by value. A getter
 * that returns a fresh object on every read defeats both, so the node cap is
 * what bounds such graphs.
 */
class SeenGuard {
  private readonly identities = new WeakSet<object>()
  private readonly values = new Set<unknown>()

  /** `true` if `node` was newly marked, `false` if it was seen before. */
  mark(node: unknown): boolean {
    if (isObjectLike(node)) {
      if (this.identities.has(node)) return false
      this.identities.add(node)
      return true
    }
    if (this.values.has(node)) return false
    this.values.add(node)
    return true
  }
}

function positive(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? Math.trunc(value) : fallback
}

type FlattenFrame = {
  node: unknown
  children: readonly unknown[] | undefined
  next: number
}

function flattenFrame(node: unknown): FlattenFrame {
  return { node, children: multiCauseOf(node), next: 0 }
}

/**
 * Collects the leaves of an error graph (nodes with nothing to unwrap) in
 * depth-first, left-to-right order of discovery.
 *
 * Multi-cause children are explored before anything else; a single cause is
 * followed in place so an intermediate link is never reported as a leaf and
 * a chain of any length uses one frame. Revisited nodes are skipped, and
 * reaching either cap ends the traversal with the leaves found so far.
 *
 * @example
 * ```ts
 * flatten(join(new Error("a"), wrap(new Error("b"), "ctx")))
 * // [Error("a"), Error("b")]
 * ```
 */
export function flatten(err: unknown, options?: TraversalOptions): unknown[] {
  if (isNil(err)) return []

  const maxDepth = positive(options?.maxDepth, MAX_TRAVERSAL_DEPTH)
  const maxNodes = positive(options?.maxNodes, MAX_TRAVERSAL_NODES)
  const leaves: unknown[] = []
  const seen = new SeenGuard()
  const stack: FlattenFrame[] = [flattenFrame(err)]
  seen.mark(err)
  let entered = 1

  while (stack.length > 0 && stack.length <= maxDepth && entered <= maxNodes) {
    const top = stack[stack.length - 1]
    if (!top) break

    if (top.children) {
      const children = top.children
      while (top.next < children.length && isNil(children[top.next])) top.next++

      if (top.next < children.length) {
        const child = children[top.next]
        top.next++
        if (seen.mark(child)) {
          entered++
          stack.push(flattenFrame(child))
        }
        continue
      }

      stack.pop()
      continue
    }

    const cause = singleCauseOf(top.node)
    if (!isNil(cause)) {
      if (seen.mark(cause)) {
        entered++
        stack[stack.length - 1] = flattenFrame(cause)
      } else {
        stack.pop()
      }
      continue
    }

    leaves.push(top.node)
    stack.pop()
  }

  return leaves
}

/**
 * Visits every distinct node once, in pre-order: a node is passed to `visit`
 * before its children are expanded, and multi-cause children are visited left
 * to right. Returning `false` stops the walk immediately, as does reaching
 * either cap.
 */
export function walk(err: unknown, visit: Visitor, options?: TraversalOptions): void {
  if (isNil(err)) return

  const maxDepth = positive(options?.maxDepth, MAX_TRAVERSAL_DEPTH)
  const maxNodes = positive(options?.maxNodes, MAX_TRAVERSAL_NODES)
  const seen = new SeenGuard()
  const stack: unknown[] = [err]
  seen.mark(err)
  let visited = 0

  while (stack.length > 0 && stack.length <= maxDepth && visited < maxNodes) {
    const node = stack.pop()
    visited++
    if (!visit(node)) return

    const children = multiCauseOf(node)
    if (children) {
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i]
        if (!isNil(child) && seen.mark(child)) stack.push(child)
      }
      continue
    }

    const cause = singleCauseOf(node)
    if (!isNil(cause) && seen.mark(cause)) stack.push(cause)
  }
}

/** First leaf of {@link flatten}: the deepest cause along the left-most path. */
export function root(err: unknown): unknown {
  return flatten(err)[0]
}

/**
 * Whether `target` is reachable from `err`, compared with `Object.is`.
 * `false` when either argument is nil.
 */
export function has(err: unknown, target: unknown): boolean {
  if (isNil(err) || isNil(target)) return false

  let found = false
  walk(err, (node) => {
    found = Object.is(node, target)
    return !found
  })
  return found
}

/**
 * Whether `predicate` holds for any node reachable from `err`.
 */
export function some(err: unknown, predicate: (node: unknown) => boolean): boolean {
  let found = false
  walk(err, (node) => {
    found = predicate(node)
    return !found
  })
  return found
}
