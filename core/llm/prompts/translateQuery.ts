import { QUERY_SCHEMA_VERSION } from "../../versioning/versions"
import type { VocabularyHints } from "../adapter"

export function buildTranslateQuerySystemPrompt(): string {
  return [
    "You translate recruiter search requests into a structured candidate filter.",
    "Return JSON that matches the provided schema EXACTLY.",
    "",
    "Rules:",
    "- Do NOT invent filters the request does not ask for. Use null for anything not mentioned.",
    "- organization: a single employer name, as written in the request.",
    "- department: a team or department label (e.g. Engineering, Sales).",
    "- skills: concrete skills or technologies, one per entry. skillMode is \"any\" only if the request says either/or.",
    "- dateRange: years or YYYY-MM strings. \"in 2020\" means from 2020 to 2020.",
    "- seniority: one of junior, mid, senior, lead.",
    "- terms: role words that fit nowhere else (e.g. \"engineer\", \"recruiter\"), singular, lower-case.",
    "- Output MUST be valid JSON matching the schema. No extra keys, no commentary."
  ].join("\n")
}

export function buildTranslateQueryUserPrompt(text: string, promptVersion: string, hints?: VocabularyHints): string {
  const lines = [
    `Schema version: ${QUERY_SCHEMA_VERSION}`,
    `Prompt version: ${promptVersion}`,
  ]
  if (hints) {
    lines.push(
      "",
      "Known values in the corpus (prefer these spellings when they match):",
      `Organizations: ${hints.organizations.join(", ") || "(none)"}`,
      `Departments: ${hints.departments.join(", ") || "(none)"}`,
      `Skills: ${hints.skills.join(", ") || "(none)"}`
    )
  }
  lines.push("", "Request (verbatim):", "-----", text, "-----", "", "Return only the JSON object.")
  return lines.join("\n")
}
