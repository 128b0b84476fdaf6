import { Codes } from "../codes"
import { badRequest, internal, notFound } from "../constructors"
import { Failure } from "../failure"
import { isFault } from "../utils/is-fault"

function loadReport() {
  return internal(new Error("connection reset"))
}

function captureInHandler(err: Failure) {
  return err.captureStack()
}

describe("Failure", () => {
  it("is an Error with a code, a message and context", () => {
    const err = notFound("user", 42)

    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(Failure)
    expect(isFault(err)).toBe(true)
    expect(err.name).toBe("Failure")
    expect(err.kind).toBe("failure")
    expect(err.code).toBe(Codes.NotFound)
    expect(err.message).toBe("user not found")
    expect(err.contextSnapshot()).toEqual({ entity: "user", id: 42 })
    expect(err.frames).toBeUndefined()
    expect(err.cause).toBeUndefined()
    expect(err.toString()).toBe("not_found: user not found")
  })

  it("builds a message and context through a chain of calls", () => {
    const err = badRequest("")
      .addContext("invalid input", "field", "email")
      .addContext("ignored", "user_id", 42)
      .appendMessage("check format")

    expect(err.message).toBe("invalid input: check format")
    expect(err.code).toBe("bad_request")
    expect(err.contextSnapshot()).toEqual({ field: "email", user_id: 42 })
    expect(err.toString()).toBe("bad_request: invalid input: check format")
  })

  describe("copy-on-write", () => {
    it("never alters the receiver", () => {
      const base = notFound("user", 42)

      const withContext = base.addContext("ignored", "attempt", 1)
      const reclassified = base.reclassify("gone")
      const appended = base.appendMessage("in cache")
      const replaced = base.replaceMessage("no such user")
      const withStack = base.captureStack()

      expect(withContext).not.toBe(base)
      expect(withContext.contextSnapshot()).toEqual({ entity: "user", id: 42, attempt: 1 })
      expect(reclassified.code).toBe("gone")
      expect(appended.message).toBe("user not found: in cache")
      expect(replaced.message).toBe("no such user")
      expect(withStack.frames?.length).toBeGreaterThan(0)

      expect(base.code).toBe("not_found")
      expect(base.message).toBe("user not found")
      expect(base.fields).toHaveLength(2)
      expect(base.frames).toBeUndefined()
    })

    it("derives siblings that do not see each other", () => {
      const base = notFound("user", 42)
      const first = base.withField("k1", "one")
      const second = base.withField("k2", "two")

      expect(first.contextSnapshot()).toEqual({ entity: "user", id: 42, k1: "one" })
      expect(second.contextSnapshot()).toEqual({ entity: "user", id: 42, k2: "two" })
      expect(base.contextSnapshot()).toEqual({ entity: "user", id: 42 })
    })

    it("keeps the cause and frames when deriving", () => {
      const cause = new Error("connection reset")
      const err = internal(cause)
      const derived = err.reclassify("unavailable").withField("attempt", 2)

      expect(derived.cause).toBe(cause)
      expect(derived.frames).toBe(err.frames)
    })

    it("publishes frozen fields", () => {
      const err = notFound("user", 42).withField("attempt", 1)

      expect(Object.isFrozen(err.fields)).toBe(true)
      expect(Object.isFrozen(err.fields[0])).toBe(true)
    })
  })

  describe("addContext", () => {
    it("sets the message only while it is empty", () => {
      const first = badRequest("").addContext("first")
      const second = first.addContext("second")

      expect(first.message).toBe("first")
      expect(second.message).toBe("first")
    })

    it("keeps duplicate keys in order and reports the last value", () => {
      const err = badRequest("x").addContext("", "k1", 1, "k2", 2).addContext("", "k1", 3)

      expect(err.fields.map((f) => f.key)).toEqual(["k1", "k2", "k1"])
      expect(err.contextSnapshot()).toEqual({ k1: 3, k2: 2 })
    })

    it("drops a pair whose key is not a string", () => {
      const err = badRequest("x").addContext("", 123, "v1", "k2", "v2")

      expect(err.contextSnapshot()).toEqual({ k2: "v2" })
    })
  })

  describe("addContextBounded", () => {
    it("keeps the newest entries", () => {
      const err = notFound("user", 42).addContextBounded("", 2, "a", 1, "b", 2)

      expect(err.fields.map((f) => f.key)).toEqual(["a", "b"])
    })

    it("counts duplicate keys as separate entries", () => {
      const err = badRequest("x").addContextBounded("", 2, "a", 1, "b", 2, "a", 3)

      expect(err.fields).toEqual([
        { key: "b", value: 2 },
        { key: "a", value: 3 },
      ])
      expect(err.contextSnapshot()).toEqual({ b: 2, a: 3 })
    })

    it("is unbounded for a zero limit", () => {
      const err = notFound("user", 42).addContextBounded("", 0, "a", 1, "b", 2)

      expect(err.fields).toHaveLength(4)
    })
  })

  describe("appendMessage", () => {
    it("ignores an empty suffix and fills an empty message", () => {
      expect(badRequest("x").appendMessage("").message).toBe("x")
      expect(badRequest("").appendMessage("y").message).toBe("y")
    })
  })

  describe("toString", () => {
    it("falls back to the code, then to 'error'", () => {
      expect(new Failure({ message: "", code: "conflict" }).toString()).toBe("conflict")
      expect(new Failure({ message: "", code: "" }).toString()).toBe("error")
      expect(new Failure({ message: "plain", code: "" }).toString()).toBe("plain")
    })
  })

  describe("stacks", () => {
    it("internal captures frames at its caller", () => {
      const err = loadReport()

      expect(err.frames?.[0]?.function).toContain("loadReport")
      expect(err.frames?.[0]?.file).toContain("failure.test.ts")
    })

    it("captureStack starts at its caller and replaces earlier frames", () => {
      const err = captureInHandler(loadReport())

      expect(err.frames?.[0]?.function).toContain("captureInHandler")
    })

    it("captureStackSkipping drops extra frames", () => {
      const helper = (err: Failure) => err.captureStackSkipping(1)
      function outerFrame() {
        return helper(badRequest("x"))
      }

      expect(outerFrame().frames?.[0]?.function).toContain("outerFrame")
    })
  })
})
