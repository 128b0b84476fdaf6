import { inspect } from "node:util"
import { badRequest, defect, interrupt, notFound, unavailable } from "../constructors"
import { Failure } from "../failure"
import { formatConcise, formatValue, formatVerbose, MAX_RENDER_DEPTH } from "../format"
import { join } from "../join"
import { wrap } from "../utils/to-fault"

describe("format", () => {
  describe("formatConcise", () => {
    it("renders faults as code and message", () => {
      expect(formatConcise(notFound("user", 42))).toBe("not_found: user not found")
      expect(formatConcise(interrupt(""))).toBe("interrupt")
    })

    it("renders foreign errors by message, then name", () => {
      expect(formatConcise(new Error("boom"))).toBe("boom")
      expect(formatConcise(new TypeError())).toBe("TypeError")
    })

    it("renders other values", () => {
      expect(formatConcise("text")).toBe("text")
      expect(formatConcise(undefined)).toBe("undefined")
    })
  })

  describe("formatVerbose", () => {
    it("renders code, message and context", () => {
      expect(formatVerbose(notFound("user", 42))).toBe(
        'code=not_found msg="user not found"\nctx: entity=user id=42',
      )
    })

    it("omits empty sections and quotes the message", () => {
      expect(formatVerbose(badRequest('bad "quote"'))).toBe('code=bad_request msg="bad \\"quote\\""')
      expect(formatVerbose(new Failure({ message: "x", code: "" }))).toBe('msg="x"')
    })

    it("renders the cause chain", () => {
      const err = wrap(new Error("dial tcp"), "load user", "user_id", 7)

      expect(formatVerbose(err)).toBe(
        'code=internal msg="load user"\nctx: user_id=7\ncause: dial tcp',
      )
    })

    it("renders interrupts with their sentinel", () => {
      expect(formatVerbose(interrupt("shutdown"))).toBe(
        'code=interrupt msg="shutdown"\ncause: operation canceled',
      )
    })

    it("renders defect frames", () => {
      const rendered = formatVerbose(defect(new Error("boom")).replaceMessage("invariant broken"))

      expect(
        rendered.startsWith('code=defect msg="defect: invariant broken"\ncause: boom\nstack:\n  '),
      ).toBe(true)
      expect(rendered).toContain("format.test.ts:")
    })

    it("falls back to the cause for a defect without a message", () => {
      const rendered = formatVerbose(defect(new Error("boom")))

      expect(rendered.split("\n").slice(0, 2)).toEqual(['code=defect msg="defect: boom"', "cause: boom"])
    })

    it("renders each child of a join", () => {
      const err = join(notFound("user", 1), new Error("disk full"))

      expect(formatVerbose(err)).toBe(
        'code=not_found msg="user not found"\nctx: entity=user id=1\ndisk full',
      )
    })

    it("marks a cycle on the cause path", () => {
      const a = new Error("a")
      const b = new Error("b", { cause: a })
      a.cause = b

      expect(formatVerbose(b)).toBe("b\ncause: a\ncause: <cycle>")
    })

    it("truncates very deep chains", () => {
      let err: Error = new Error("bottom")
      for (let i = 0; i < MAX_RENDER_DEPTH + 10; i++) {
        err = new Error(`level ${i}`, { cause: err })
      }

      const lines = formatVerbose(err).split("\n")

      expect(lines).toHaveLength(MAX_RENDER_DEPTH + 1)
      expect(lines[lines.length - 1]).toBe("cause: <truncated>")
    })

    it("renders non-objects as values", () => {
      expect(formatVerbose(42)).toBe("42")
    })

    it("backs util.inspect", () => {
      expect(inspect(unavailable("db"))).toBe('code=unavailable msg="unavailable"\nctx: service=db')
    })
  })

  describe("formatValue", () => {
    it("renders each kind of value", () => {
      function handler() {}
      const circular: Record<string, unknown> = {}
      circular.self = circular

      expect(formatValue("raw")).toBe("raw")
      expect(formatValue(42)).toBe("42")
      expect(formatValue(10n)).toBe("10")
      expect(formatValue(null)).toBe("null")
      expect(formatValue(undefined)).toBe("undefined")
      expect(formatValue(handler)).toBe("[function handler]")
      expect(formatValue({ a: 1, b: [true] })).toBe('{"a":1,"b":[true]}')
      expect(formatValue(new Date("2024-01-02T03:04:05.000Z"))).toBe("2024-01-02T03:04:05.000Z")
      expect(formatValue(notFound("user", 1))).toBe("not_found: user not found")
      expect(formatValue(circular)).toBe("[object Object]")
    })

    it("renders an unserializable object without a prototype", () => {
      const bare: Record<string, unknown> = Object.create(null)
      bare.size = 10n

      expect(formatValue(bare)).toBe("[object Object]")
      expect(formatVerbose(notFound("user", 1).withField("meta", bare))).toBe(
        'code=not_found msg="user not found"\nctx: entity=user id=1 meta=[object Object]',
      )
    })
  })
})
