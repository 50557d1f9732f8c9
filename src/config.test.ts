import { describe, it, expect } from "vitest"
import { loadConfig } from "./config"

describe("loadConfig", () => {
  it("starts with defaults and no oracle", () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      jsonBodyLimit: "6mb",
      seedResumesPath: null,
      openai: { apiKey: null, baseUrl: "https://api.openai.com/v1", model: "gpt-4o-mini", maxAttempts: 2 },
      oracleTimeoutMs: 4000,
      maxPageSize: 100,
      defaultPageSize: 20,
      defaultSimilarLimit: 20,
      maxSimilarLimit: 100,
    })
  })

  it("reads overrides and keeps defaults inside their maximums", () => {
    const c = loadConfig({
      PORT: "9090",
      OPENAI_API_KEY: "test-secret",
      OPENAI_MODEL: "gpt-4o",
      ORACLE_TIMEOUT_MS: "1500",
      MAX_PAGE_SIZE: "10",
      DEFAULT_PAGE_SIZE: "50",
      SEED_RESUMES_PATH: " ./seed.json ",
    })
    expect(c.port).toBe(9090)
    expect(c.openai.apiKey).toBe("test-secret")
    expect(c.openai.model).toBe("gpt-4o")
    expect(c.oracleTimeoutMs).toBe(1500)
    expect(c.defaultPageSize).toBe(10)
    expect(c.seedResumesPath).toBe("./seed.json")
  })

  it("rejects malformed values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("CONFIG_INVALID: PORT")
    expect(() => loadConfig({ ORACLE_TIMEOUT_MS: "-5" })).toThrow("CONFIG_INVALID: ORACLE_TIMEOUT_MS")
    expect(() => loadConfig({ OPENAI_MODEL: "gpt-2" })).toThrow("CONFIG_INVALID: OPENAI_MODEL")
  })
})
