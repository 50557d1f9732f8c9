import type {
  QueryOracle,
  InterpretQueryInput,
  InterpretQueryOutput,
  LLMModel,
  LLMUsage,
} from "../core/llm/adapter"

import { structuredQuerySchema } from "../core/llm/schemas/structuredQuerySchema"
import { buildTranslateQuerySystemPrompt, buildTranslateQueryUserPrompt } from "../core/llm/prompts/translateQuery"

export type OpenAIQueryOracleOptions = {
  apiKey: string
  baseUrl?: string
  model?: LLMModel
  timeoutMs?: number
  maxAttempts?: number
}

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms))
}

function jitter(ms: number) {
  const j = Math.floor(Math.random() * Math.min(250, ms))
  return ms + j
}

function isRetryableStatus(status: number) {
  return status === 429 || status === 408 || (status >= 500 && status <= 599)
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function parseOpenAIErrorMessage(bodyText: string): string | null {
  try {
    const j: unknown = JSON.parse(bodyText)
    if (isRecord(j) && isRecord(j.error) && typeof j.error.message === "string") return j.error.message
    return null
  } catch {
    return null
  }
}

function isNetworkError(e: unknown) {
  if (!(e instanceof Error)) return false
  return ["fetch failed", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT"].some((s) => e.message.includes(s))
}

export class OpenAIQueryOracle implements QueryOracle {
  private apiKey: string
  private baseUrl: string
  private model: LLMModel
  private timeoutMs: number
  private maxAttempts: number

  constructor(opts: OpenAIQueryOracleOptions) {
    this.apiKey = opts.apiKey
    this.baseUrl = opts.baseUrl ?? "https://api.openai.com/v1"
    this.model = opts.model ?? "gpt-4o-mini"
    this.timeoutMs = opts.timeoutMs ?? 4000
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 2)
  }

  async interpretQuery(input: InterpretQueryInput): Promise<InterpretQueryOutput> {
    const started = Date.now()

    const payload = {
      model: this.model,
      temperature: 0,
      input: [
        { role: "system", content: buildTranslateQuerySystemPrompt() },
        { role: "user", content: buildTranslateQueryUserPrompt(input.text, input.promptVersion, input.hints) },
      ],
      text: {
        format: {
          type: "json_schema",
          name: structuredQuerySchema.name,
          strict: true,
          schema: structuredQuerySchema.schema,
        },
      },
    }

    const resp = await this.callResponses(payload, input.signal)
    const interpretation = this.extractParsedJson(resp)
    if (interpretation === null) {
      // Caller decides fallback
      throw new Error("LLM_INTERPRET_QUERY_FAILED_SCHEMA")
    }

    return {
      interpretation,
      modelUsed: this.model,
      usage: isRecord(resp) ? this.mapUsage(resp.usage) : undefined,
      latencyMs: Date.now() - started,
    }
  }

  private async callResponses(body: unknown, signal?: AbortSignal): Promise<unknown> {
    let lastErr: unknown = null

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) throw new Error("OPENAI_ABORTED")

      const controller = new AbortController()
      const t = setTimeout(() => controller.abort(), this.timeoutMs)
      const onAbort = () => controller.abort()
      signal?.addEventListener("abort", onAbort, { once: true })

      try {
        const res = await fetch(`${this.baseUrl}/responses`, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        })

        const text = await res.text()

        if (!res.ok) {
          const msg = parseOpenAIErrorMessage(text)
          const errStr = `OPENAI_ERROR_${res.status}: ${(msg ?? text).slice(0, 400)}`

          // Retry only if status is retryable
          if (isRetryableStatus(res.status) && attempt < this.maxAttempts) {
            // exponential backoff: 500ms, 1000ms, 2000ms (+ jitter)
            await sleep(jitter(500 * Math.pow(2, attempt - 1)))
            continue
          }

          throw new Error(errStr)
        }

        try {
          return JSON.parse(text)
        } catch {
          throw new Error("OPENAI_NON_JSON_RESPONSE")
        }
      } catch (e: unknown) {
        lastErr = e

        const isAbort = e instanceof Error && e.name === "AbortError"
        if (isAbort && signal?.aborted) throw new Error("OPENAI_ABORTED")

        // Retry timeouts and transient network errors
        if ((isAbort || isNetworkError(e)) && attempt < this.maxAttempts) {
          await sleep(jitter(500 * Math.pow(2, attempt - 1)))
          continue
        }

        if (isAbort) throw new Error("OPENAI_TIMEOUT")

        throw e
      } finally {
        clearTimeout(t)
        signal?.removeEventListener("abort", onAbort)
      }
    }

    throw lastErr instanceof Error ? lastErr : new Error("OPENAI_UNKNOWN_ERROR")
  }

  /**
   * Parsed JSON from a Responses API result: `output_parsed` when present,
   * otherwise the first JSON object found in the output text.
   */
  private extractParsedJson(resp: unknown): unknown | null {
    if (!isRecord(resp)) return null
    if (resp.output_parsed) return resp.output_parsed

    const items = resp.output
    if (!Array.isArray(items)) return null

    for (const item of items) {
      const content = isRecord(item) ? item.content : null
      if (!Array.isArray(content)) continue
      for (const c of content) {
        const txt = isRecord(c) ? c.text : null
        if (typeof txt !== "string") continue
        const trimmed = txt.trim()
        if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
          try {
            return JSON.parse(trimmed)
          } catch {
            continue
          }
        }
      }
    }
    return null
  }

  private mapUsage(u: unknown): LLMUsage | undefined {
    if (!isRecord(u)) return undefined
    const num = (v: unknown) => (typeof v === "number" ? v : undefined)
    return {
      inputTokens: num(u.input_tokens),
      outputTokens: num(u.output_tokens),
      totalTokens: num(u.total_tokens),
    }
  }
}
