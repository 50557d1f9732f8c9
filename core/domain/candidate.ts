/*
Canonical records produced by the normalizer. Everything downstream
(similarity, network, queries) reads only these shapes, never raw parser output.

Nullable where the resume may simply not say; warnings record what was degraded.
*/
import type { DatePrecision } from "./dates"

export type SeniorityTier = "junior" | "mid" | "senior" | "lead"

export const SENIORITY_TIERS: readonly SeniorityTier[] = ["junior", "mid", "senior", "lead"]

export interface Experience {
  organization: string | null
  organizationKey: string | null
  department: string | null
  departmentKey: string | null
  title: string | null
  start: string | null                  // ISO "YYYY-MM-DD"
  end: string | null                    // null = current (or unparseable, see warnings)
  datePrecision: DatePrecision
  keywords: string[]                    // canonical skill tokens from the description
  colleagues: string[]                  // names mentioned alongside the role
}

export interface Candidate {
  id: string
  name: string | null
  summary: string | null
  experiences: Experience[]             // most recent first
  skills: string[]                      // canonical, sorted, deduped
  totalExperienceMonths: number
  seniority: SeniorityTier
  extraSections: Record<string, string> // unmatched sections, opaque
  warnings: string[]
}

export function isSeniorityTier(v: unknown): v is SeniorityTier {
  return SENIORITY_TIERS.some((t) => t === v)
}
