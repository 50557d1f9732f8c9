function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

/**
 * Light repair of oracle output before validation: trims strings, drops nulls
 * and empty values. Anything still malformed is left for the validator to reject.
 */
export function postProcessInterpretation(raw: unknown): unknown {
  if (!isRecord(raw)) return raw

  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(raw)) {
    const v = repair(value)
    if (v !== undefined) out[key] = v
  }
  return out
}

function repair(value: unknown): unknown {
  if (value === null || value === undefined) return undefined
  if (typeof value === "string") return value.trim() || undefined
  if (Array.isArray(value)) {
    // Keep non-string entries so validation can reject them.
    const items = value.map((v) => (typeof v === "string" ? v.trim() : v))
    return items.length ? items : undefined
  }
  if (isRecord(value)) {
    const inner = postProcessInterpretation(value)
    return isRecord(inner) && Object.keys(inner).length ? inner : undefined
  }
  return value
}
