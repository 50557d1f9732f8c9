// core/domain/seniority.ts
import type { Experience, SeniorityTier } from "./candidate";
import { SENIORITY_TIERS } from "./candidate";

export type SeniorityThresholds = {
  // minimum years for each tier above junior
  mid: number;
  senior: number;
  lead: number;
};

export const DEFAULT_SENIORITY_THRESHOLDS: SeniorityThresholds = { mid: 2, senior: 5, lead: 10 };

const LEAD_WORDS = /\b(lead|principal|staff|head|director|vp|vice president|chief|cto|ceo|cfo|coo|manager)\b/i;
const SENIOR_WORDS = /\b(senior|sr)\b/i;
const JUNIOR_WORDS = /\b(junior|jr|intern|internship|trainee|entry[- ]level|graduate|apprentice)\b/i;

export function tierIndex(tier: SeniorityTier): number {
  return SENIORITY_TIERS.indexOf(tier);
}

export function tierFromYears(years: number, t: SeniorityThresholds = DEFAULT_SENIORITY_THRESHOLDS): SeniorityTier {
  if (years >= t.lead) return "lead";
  if (years >= t.senior) return "senior";
  if (years >= t.mid) return "mid";
  return "junior";
}

/**
 * Tenure gives the base tier; the most recent title can override it.
 * `experiences` must already be ordered most recent first.
 */
export function deriveSeniority(
  totalMonths: number,
  experiences: readonly Experience[],
  t: SeniorityThresholds = DEFAULT_SENIORITY_THRESHOLDS
): SeniorityTier {
  const base = tierFromYears(totalMonths / 12, t);
  const title = experiences.find((e) => e.title)?.title ?? "";

  if (LEAD_WORDS.test(title)) return "lead";
  if (SENIOR_WORDS.test(title)) return tierIndex(base) >= tierIndex("senior") ? base : "senior";
  if (JUNIOR_WORDS.test(title)) return "junior";
  return base;
}

export const SENIORITY_TITLE_WORDS = new Set([
  "lead", "principal", "staff", "head", "senior", "sr", "junior", "jr", "intern", "trainee",
]);
