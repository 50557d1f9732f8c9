import { afterEach, describe, it, expect, vi } from "vitest"
import type { InterpretQueryInput } from "../core/llm/adapter"
import { OpenAIQueryOracle } from "./openai-query-oracle"

const input: InterpretQueryInput = {
  text: "python engineers at Acme",
  schemaVersion: "1.0",
  promptVersion: "p-test",
}

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

function stubFetch(...responses: Array<Response | (() => Promise<Response>)>) {
  const queue = [...responses]
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    const next = queue.shift()
    if (!next) throw new Error("unexpected fetch")
    return typeof next === "function" ? next() : next
  })
  vi.stubGlobal("fetch", fetchMock)
  return fetchMock
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe("OpenAIQueryOracle", () => {
  it("posts a strict json_schema request and returns the parsed output", async () => {
    const fetchMock = stubFetch(
      json({ output_parsed: { organization: "Acme", terms: ["engineer"] }, usage: { input_tokens: 10, output_tokens: 5, total_tokens: 15 } })
    )
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret", baseUrl: "http://oracle.test/v1" })

    const out = await oracle.interpretQuery(input)

    expect(out.interpretation).toEqual({ organization: "Acme", terms: ["engineer"] })
    expect(out.modelUsed).toBe("gpt-4o-mini")
    expect(out.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 })

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe("http://oracle.test/v1/responses")
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret")
    const body = JSON.parse(String(init?.body))
    expect(body.model).toBe("gpt-4o-mini")
    expect(body.temperature).toBe(0)
    expect(body.text.format).toMatchObject({ type: "json_schema", name: "StructuredQuery", strict: true })
    expect(body.input[1].content).toContain("python engineers at Acme")
  })

  it("reads JSON from output text when output_parsed is absent", async () => {
    stubFetch(json({ output: [{ content: [{ type: "output_text", text: ' {"terms":["engineer"]} ' }] }] }))
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret" })
    expect((await oracle.interpretQuery(input)).interpretation).toEqual({ terms: ["engineer"] })
  })

  it("retries a retryable status", async () => {
    const fetchMock = stubFetch(json({ error: { message: "overloaded" } }, 503), json({ output_parsed: { terms: ["analyst"] } }))
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret", maxAttempts: 2 })
    const out = await oracle.interpretQuery(input)
    expect(out.interpretation).toEqual({ terms: ["analyst"] })
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it("surfaces the API error message for non-retryable statuses", async () => {
    const fetchMock = stubFetch(json({ error: { message: "bad schema" } }, 400))
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret", maxAttempts: 3 })
    await expect(oracle.interpretQuery(input)).rejects.toThrow("OPENAI_ERROR_400: bad schema")
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })

  it("rejects a non-JSON body", async () => {
    stubFetch(new Response("<html>oops</html>", { status: 200 }))
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret" })
    await expect(oracle.interpretQuery(input)).rejects.toThrow("OPENAI_NON_JSON_RESPONSE")
  })

  it("rejects a response without structured output", async () => {
    stubFetch(json({ output: [{ content: [{ type: "output_text", text: "sorry" }] }] }))
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret" })
    await expect(oracle.interpretQuery(input)).rejects.toThrow("LLM_INTERPRET_QUERY_FAILED_SCHEMA")
  })

  it("times out a hanging request", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              const err = new Error("aborted")
              err.name = "AbortError"
              reject(err)
            })
          })
      )
    )
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret", timeoutMs: 20, maxAttempts: 1 })
    await expect(oracle.interpretQuery(input)).rejects.toThrow("OPENAI_TIMEOUT")
  })

  it("does not call out when the caller already aborted", async () => {
    const fetchMock = stubFetch()
    const controller = new AbortController()
    controller.abort()
    const oracle = new OpenAIQueryOracle({ apiKey: "test-secret" })
    await expect(oracle.interpretQuery({ ...input, signal: controller.signal })).rejects.toThrow("OPENAI_ABORTED")
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
