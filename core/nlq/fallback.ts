// core/nlq/fallback.ts
// Deterministic keyword translator used whenever the oracle cannot be trusted.

import type { SeniorityTier } from "../domain/candidate";
import { MAX_YEAR, MIN_YEAR, validYear } from "../domain/dates";
import { normalizeDepartment } from "../domain/organizations";
import type { StructuredQuery } from "../domain/query";
import { validateStructuredQuery } from "../domain/query";
import { canonicalSkill, type SkillMatcher } from "../domain/skills";
import type { QueryVocabulary } from "./vocabulary";

const STOPWORDS = new Set([
  "find", "show", "list", "get", "search", "me", "all", "any", "some", "who", "whom", "that", "with",
  "and", "or", "the", "a", "an", "at", "in", "on", "of", "for", "from", "to", "by", "people", "person",
  "candidates", "candidate", "someone", "anyone", "worked", "work", "working", "works", "know", "knows",
  "experience", "experienced", "skilled", "between", "since", "before", "after", "until",
]);

const SENIORITY_PATTERNS: Array<[RegExp, SeniorityTier]> = [
  [/\b(junior|jr|entry[- ]level|graduate)\b/, "junior"],
  [/\b(mid[- ]level|intermediate)\b/, "mid"],
  [/\b(senior|sr)\b/, "senior"],
  [/\b(lead|leads|principal|staff|head of|director|directors)\b/, "lead"],
];

function fold(text: string): string {
  return ` ${text.toLowerCase().replace(/&/g, " and ").replace(/[^a-z0-9+#]+/g, " ").trim()} `;
}

function singularize(word: string): string {
  if (word.length > 4 && word.endsWith("ies")) return word.slice(0, -3) + "y";
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) return word.slice(0, -1);
  return word;
}

/** Longest key found as a whole phrase in the folded text. */
function longestPhrase(folded: string, keys: Iterable<string>): string | null {
  let best: string | null = null;
  for (const key of keys) {
    if (!key || !folded.includes(` ${key} `)) continue;
    if (!best || key.length > best.length || (key.length === best.length && key < best)) best = key;
  }
  return best;
}

function yearBound(year: string, warnings: string[]): string | undefined {
  if (validYear(Number(year))) return year;
  warnings.push(`Year ${year} is outside ${MIN_YEAR}-${MAX_YEAR}; ignored`);
  return undefined;
}

// Bounds are calendar years, both inclusive.
function dateRangeFrom(lower: string, warnings: string[]): { from?: string; to?: string } | null {
  let from: string | undefined;
  let to: string | undefined;
  const between = lower.match(/\bbetween\s+(\d{4})\s+and\s+(\d{4})\b/);
  const during = lower.match(/\b(?:in|during)\s+(\d{4})\b/);
  if (between) {
    const [lo, hi] = Number(between[1]) <= Number(between[2]) ? [between[1], between[2]] : [between[2], between[1]];
    from = yearBound(lo, warnings);
    to = yearBound(hi, warnings);
  } else if (during) {
    from = to = yearBound(during[1], warnings);
  } else {
    const since = lower.match(/\b(?:since|after|from)\s+(\d{4})\b/);
    if (since) from = yearBound(since[1], warnings);
    const before = lower.match(/\b(?:before|until|prior to)\s+(\d{4})\b/);
    if (before) to = yearBound(String(Number(before[1]) - 1), warnings);
  }

  if (from && to && Number(from) > Number(to)) {
    warnings.push(`Years ${from} to ${to} leave an empty window; ignored`);
    return null;
  }
  if (!from && !to) return null;
  return { ...(from ? { from } : {}), ...(to ? { to } : {}) };
}

// "good at Python" is a skill, not an employer
function namesSkillOrDepartment(phrase: string, vocabulary: QueryVocabulary, matcher: SkillMatcher): boolean {
  const skill = canonicalSkill(phrase, matcher.synonyms);
  if (skill && vocabulary.skills.has(skill)) return true;
  return vocabulary.departments.has(normalizeDepartment(phrase));
}

export type FallbackTranslation = {
  query: StructuredQuery;
  warnings: string[];
};

export function fallbackTranslate(text: string, vocabulary: QueryVocabulary, matcher: SkillMatcher): FallbackTranslation {
  const lower = text.toLowerCase();
  const folded = fold(text);
  const warnings: string[] = [];
  const raw: Record<string, unknown> = {};
  const consumed = new Set<string>();

  // 1) organization: known keys first, then "at <Capitalized Name>"
  const orgKey = longestPhrase(folded, vocabulary.organizations.keys());
  if (orgKey) {
    raw.organization = vocabulary.organizations.get(orgKey) ?? orgKey;
    orgKey.split(" ").forEach((w) => consumed.add(w));
  } else {
    const at = text.match(/\bat\s+([A-Z][\w&.'-]*(?:\s+[A-Z][\w&.'-]*)*)/);
    if (at && !namesSkillOrDepartment(at[1], vocabulary, matcher)) {
      raw.organization = at[1];
      warnings.push(`Organization "${at[1]}" is not in the current pool`);
      fold(at[1]).trim().split(" ").forEach((w) => consumed.add(w));
    }
  }

  // 2) department
  const deptKey = longestPhrase(folded, vocabulary.departments.keys());
  if (deptKey) {
    raw.department = deptKey;
    deptKey.split(" ").forEach((w) => consumed.add(w));
  }

  // 3) skills
  const skills = matcher.extract(text).filter((s) => vocabulary.skills.has(s));
  if (skills.length) {
    raw.skills = skills;
    if (skills.length > 1 && /\bor\b/.test(lower)) raw.skillMode = "any";
    skills.forEach((s) => s.split(" ").forEach((w) => consumed.add(w)));
  }

  // 4) seniority
  for (const [re, tier] of SENIORITY_PATTERNS) {
    const m = lower.match(re);
    if (m) {
      raw.seniority = tier;
      m[1].split(/[\s-]+/).forEach((w) => consumed.add(w));
      break;
    }
  }

  // 5) tenure window
  const range = dateRangeFrom(lower, warnings);
  if (range) raw.dateRange = range;

  // 6) leftover role words become free-text terms
  const terms: string[] = [];
  for (const word of folded.trim().split(" ")) {
    if (!word || STOPWORDS.has(word) || consumed.has(word) || /^\d+$/.test(word)) continue;
    const single = singularize(word);
    if (vocabulary.roles.has(single) && !terms.includes(single)) terms.push(single);
    else if (vocabulary.roles.has(word) && !terms.includes(word)) terms.push(word);
  }
  if (terms.length) raw.terms = terms;

  if (Object.keys(raw).length === 0) warnings.push("No known organization, department, skill or role found in request");

  return { query: validateStructuredQuery(raw, matcher.synonyms), warnings };
}
