import { captureFrames, DEFAULT_STACK_DEPTH, parseStack } from "../stack"

function captureHere() {
  return captureFrames()
}

function innerHelper() {
  return captureFrames({ skip: 1 })
}

function outerCaller() {
  return innerHelper()
}

describe("captureFrames", () => {
  it("starts at the caller", () => {
    const frames = captureHere()

    expect(frames[0]?.function).toContain("captureHere")
    expect(frames[0]?.file).toContain("stack.test.ts")
    expect(frames[0]?.line).toBeGreaterThan(0)
  })

  it("skips additional frames on request", () => {
    const frames = outerCaller()

    expect(frames[0]?.function).toContain("outerCaller")
  })

  it("bounds the number of frames", () => {
    const recurse = (n: number): ReturnType<typeof captureFrames> =>
      n === 0 ? captureFrames({ maxDepth: 5 }) : recurse(n - 1)

    expect(recurse(20)).toHaveLength(5)
  })

  it("defaults to 64 frames", () => {
    const recurse = (n: number): ReturnType<typeof captureFrames> =>
      n === 0 ? captureFrames() : recurse(n - 1)

    expect(DEFAULT_STACK_DEPTH).toBe(64)
    expect(recurse(100)).toHaveLength(64)
  })

  it("restores the global stack trace limit", () => {
    const before = Error.stackTraceLimit
    captureFrames({ maxDepth: 3 })

    expect(Error.stackTraceLimit).toBe(before)
  })

  it("returns frozen frames", () => {
    const frames = captureHere()

    expect(Object.isFrozen(frames)).toBe(true)
    expect(Object.isFrozen(frames[0])).toBe(true)
  })
})

describe("parseStack", () => {
  it("parses named, anonymous and async call sites", () => {
    const text = [
      "Error: boom",
      "    at loadUser (/srv/app/users.ts:10:5)",
      "    at /srv/app/index.ts:3:1",
      "    at async Promise.all (index 0)",
      "    at new Repository (/srv/app/repo.ts:7:12)",
    ].join("\n")

    expect(parseStack(text)).toEqual([
      { function: "loadUser", file: "/srv/app/users.ts", line: 10, column: 5 },
      { function: "<anonymous>", file: "/srv/app/index.ts", line: 3, column: 1 },
      { function: "Promise.all", file: "index 0", line: 0, column: 0 },
      { function: "new Repository", file: "/srv/app/repo.ts", line: 7, column: 12 },
    ])
  })

  it("ignores text without call sites", () => {
    expect(parseStack("just a message")).toEqual([])
  })
})
