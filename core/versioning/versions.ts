export const ENGINE_VERSION = "search-engine-1.2.0"
export const QUERY_SCHEMA_VERSION = "1.0"
export const PROMPT_TRANSLATE_VERSION = "translate-query-2026-10-01"
