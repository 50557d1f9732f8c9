// ---- Config ----
// Read once at boot. Every knob has a default so the gateway starts with no env at all;
// without OPENAI_API_KEY natural-language search runs on the keyword fallback only.

import type { LLMModel } from "../core/llm/adapter"

export type AppConfig = {
  port: number
  jsonBodyLimit: string
  seedResumesPath: string | null
  openai: {
    apiKey: string | null
    baseUrl: string
    model: LLMModel
    maxAttempts: number
  }
  oracleTimeoutMs: number
  maxPageSize: number
  defaultPageSize: number
  defaultSimilarLimit: number
  maxSimilarLimit: number
}

const MODELS: readonly LLMModel[] = ["gpt-4o-mini", "gpt-4o", "gpt-4.1"]

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === "") return fallback
  const n = Number(raw)
  if (!Number.isInteger(n) || n <= 0) throw new Error(`CONFIG_INVALID: ${name} must be a positive integer, got "${raw}"`)
  return n
}

function modelFrom(raw: string | undefined): LLMModel {
  if (!raw) return "gpt-4o-mini"
  const m = MODELS.find((x) => x === raw)
  if (!m) throw new Error(`CONFIG_INVALID: OPENAI_MODEL must be one of ${MODELS.join(", ")}`)
  return m
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const maxPageSize = positiveInt(env, "MAX_PAGE_SIZE", 100)
  const maxSimilarLimit = positiveInt(env, "MAX_SIMILAR_LIMIT", 100)

  return {
    port: positiveInt(env, "PORT", 8080),
    jsonBodyLimit: env.JSON_BODY_LIMIT || "6mb",
    seedResumesPath: env.SEED_RESUMES_PATH?.trim() || null,
    openai: {
      apiKey: env.OPENAI_API_KEY?.trim() || null,
      baseUrl: env.OPENAI_BASE_URL?.trim() || "https://api.openai.com/v1",
      model: modelFrom(env.OPENAI_MODEL?.trim()),
      maxAttempts: positiveInt(env, "OPENAI_MAX_ATTEMPTS", 2),
    },
    oracleTimeoutMs: positiveInt(env, "ORACLE_TIMEOUT_MS", 4000),
    maxPageSize,
    defaultPageSize: Math.min(positiveInt(env, "DEFAULT_PAGE_SIZE", 20), maxPageSize),
    defaultSimilarLimit: Math.min(positiveInt(env, "DEFAULT_SIMILAR_LIMIT", 20), maxSimilarLimit),
    maxSimilarLimit,
  }
}
