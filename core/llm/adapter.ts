export type LLMModel = "gpt-4o-mini" | "gpt-4o" | "gpt-4.1"

export interface LLMUsage {
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
}

export interface VocabularyHints {
  organizations: string[]
  departments: string[]
  skills: string[]
}

export interface InterpretQueryInput {
  text: string
  schemaVersion: "1.0"
  promptVersion: string
  hints?: VocabularyHints
  signal?: AbortSignal
}

export interface InterpretQueryOutput {
  interpretation: unknown // untrusted; validated by the translator before use
  modelUsed: LLMModel
  usage?: LLMUsage
  latencyMs?: number
}

/** External natural-language → structured query service. May be slow, wrong or down. */
export interface QueryOracle {
  interpretQuery(input: InterpretQueryInput): Promise<InterpretQueryOutput>
}
