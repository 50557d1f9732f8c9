import { afterEach, describe, it, expect, vi } from "vitest"
import { errorFields, logEvent } from "./log"

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

describe("logEvent", () => {
  it("writes one JSON line with msg, level, fields and ts", () => {
    vi.stubEnv("LOG_LEVEL", "info")
    const out = vi.spyOn(console, "log").mockImplementation(() => {})
    logEvent("info", "search_done", { requestId: "req-1", kind: "stats" })
    expect(out).toHaveBeenCalledTimes(1)
    const line = JSON.parse(String(out.mock.calls[0][0]))
    expect(line).toMatchObject({ msg: "search_done", level: "info", requestId: "req-1", kind: "stats" })
    expect(typeof line.ts).toBe("string")
  })

  it("sends warnings and errors to stderr", () => {
    vi.stubEnv("LOG_LEVEL", "info")
    const err = vi.spyOn(console, "error").mockImplementation(() => {})
    logEvent("warn", "oracle_fallback")
    expect(JSON.parse(String(err.mock.calls[0][0]))).toMatchObject({ msg: "oracle_fallback", level: "warn" })
  })

  it("drops lines below LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn")
    const out = vi.spyOn(console, "log").mockImplementation(() => {})
    logEvent("info", "quiet")
    expect(out).not.toHaveBeenCalled()
  })
})

describe("errorFields", () => {
  it("describes errors and other thrown values", () => {
    expect(errorFields(new TypeError("bad"))).toEqual({ err: "bad", errName: "TypeError" })
    expect(errorFields("nope")).toEqual({ err: "nope" })
  })
})
