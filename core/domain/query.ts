// core/domain/query.ts
import type { Candidate, Experience, SeniorityTier } from "./candidate";
import { isSeniorityTier } from "./candidate";
import { isoDay, nextPeriod, parseDatePoint } from "./dates";
import { ValidationError } from "./errors";
import { normalizeDepartment, normalizeOrganization } from "./organizations";
import type { SkillSynonyms } from "./skills";
import { canonicalSkill, DEFAULT_SKILL_SYNONYMS } from "./skills";

export type SkillMode = "all" | "any";

export type DateRangeFilter = {
  from?: string; // ISO, inclusive
  to?: string; // ISO, exclusive
};

export type StructuredQuery = {
  organization?: string;
  department?: string;
  skills?: string[];
  skillMode?: SkillMode;
  dateRange?: DateRangeFilter;
  seniority?: SeniorityTier;
  terms?: string[];
};

export const DEFAULT_MAX_PAGE_SIZE = 100;

const QUERY_KEYS = new Set(["organization", "department", "skills", "skillMode", "dateRange", "seniority", "terms"]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optionalText(input: Record<string, unknown>, field: string): string | undefined {
  const v = input[field];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new ValidationError(field, `${field} must be a string`);
  const t = v.trim();
  return t || undefined;
}

function tokenList(input: Record<string, unknown>, field: string): string[] | undefined {
  const v = input[field];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v)) throw new ValidationError(field, `${field} must be an array of strings`);
  const out: string[] = [];
  v.forEach((item, i) => {
    if (typeof item !== "string" || !item.trim()) {
      throw new ValidationError(`${field}[${i}]`, `${field} entries must be non-empty strings`);
    }
    out.push(item.trim());
  });
  return out.length ? out : undefined;
}

/**
 * Date bounds accept the resume formats ("2020", "03/2021", "2021-06-15").
 * A year or month `to` is inclusive of that period, so it is widened to the next period start.
 */
function dateBound(value: unknown, field: string, isEnd: boolean): string | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  if (typeof value !== "string") throw new ValidationError(field, `${field} must be a date string`);
  const p = parseDatePoint(value);
  if (!p || p.kind !== "date") throw new ValidationError(field, `Unparseable date "${value}"`);
  return isEnd ? nextPeriod(p.iso, p.precision) : p.iso;
}

/** Validates untyped input (HTTP body, oracle output) into a StructuredQuery. */
export function validateStructuredQuery(input: unknown, synonyms: SkillSynonyms = DEFAULT_SKILL_SYNONYMS): StructuredQuery {
  if (!isRecord(input)) throw new ValidationError("query", "Query must be an object");

  for (const key of Object.keys(input)) {
    if (!QUERY_KEYS.has(key)) throw new ValidationError(key, `Unrecognized query field "${key}"`);
  }

  const q: StructuredQuery = {};

  const organization = optionalText(input, "organization");
  if (organization) q.organization = organization;
  const department = optionalText(input, "department");
  if (department) q.department = department;

  const skills = tokenList(input, "skills");
  if (skills) {
    const canonical = [...new Set(skills.map((s) => canonicalSkill(s, synonyms)).filter((s): s is string => s !== null))];
    if (canonical.length) q.skills = canonical;
  }

  if (input.skillMode !== undefined && input.skillMode !== null) {
    if (input.skillMode !== "all" && input.skillMode !== "any") {
      throw new ValidationError("skillMode", `skillMode must be "all" or "any"`);
    }
    q.skillMode = input.skillMode;
  }

  if (input.dateRange !== undefined && input.dateRange !== null) {
    if (!isRecord(input.dateRange)) throw new ValidationError("dateRange", "dateRange must be an object");
    for (const key of Object.keys(input.dateRange)) {
      if (key !== "from" && key !== "to") throw new ValidationError(`dateRange.${key}`, `Unrecognized dateRange field "${key}"`);
    }
    const from = dateBound(input.dateRange.from, "dateRange.from", false);
    const to = dateBound(input.dateRange.to, "dateRange.to", true);
    if (from && to && from >= to) throw new ValidationError("dateRange", "dateRange.from must be before dateRange.to");
    if (from || to) q.dateRange = { ...(from ? { from } : {}), ...(to ? { to } : {}) };
  }

  if (input.seniority !== undefined && input.seniority !== null) {
    if (!isSeniorityTier(input.seniority)) {
      throw new ValidationError("seniority", "seniority must be one of junior, mid, senior, lead");
    }
    q.seniority = input.seniority;
  }

  const terms = tokenList(input, "terms");
  if (terms) q.terms = [...new Set(terms.map((t) => t.toLowerCase()))];

  return q;
}

// ---- execution ----

export type QueryMatch = {
  candidateId: string;
  matchedDimensions: number;
  skillOverlap: number;
  matchedSkills: string[];
  matchedExperience: Experience | null;
};

export type QueryPage = {
  items: QueryMatch[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
};

export type ExecuteOptions = {
  now: string;
  maxPageSize?: number;
};

function searchText(c: Candidate): string {
  return [
    c.name ?? "",
    ...c.experiences.flatMap((e) => [e.title ?? "", e.organization ?? "", e.department ?? ""]),
    ...c.skills,
    ...Object.values(c.extraSections),
  ]
    .join("\n")
    .toLowerCase();
}

type ExperienceFilter = {
  organizationKey?: string;
  departmentKey?: string;
  dateRange?: DateRangeFilter;
  today: string;
};

function experienceMatches(e: Experience, f: ExperienceFilter): boolean {
  if (f.organizationKey !== undefined && e.organizationKey !== f.organizationKey) return false;
  if (f.departmentKey !== undefined && !(e.departmentKey ?? "").includes(f.departmentKey)) return false;
  if (f.dateRange) {
    if (!e.start) return false;
    const end = e.end ?? f.today;
    if (f.dateRange.to !== undefined && !(e.start < f.dateRange.to)) return false;
    if (f.dateRange.from !== undefined && !(f.dateRange.from < end)) return false;
  }
  return true;
}

function matchCandidate(c: Candidate, q: StructuredQuery, f: ExperienceFilter | null): QueryMatch | null {
  let dimensions = 0;

  let matchedExperience: Experience | null = null;
  if (f) {
    matchedExperience = c.experiences.find((e) => experienceMatches(e, f)) ?? null;
    if (!matchedExperience) return null;
    dimensions += (q.organization ? 1 : 0) + (q.department ? 1 : 0) + (q.dateRange ? 1 : 0);
  }

  let matchedSkills: string[] = [];
  if (q.skills) {
    const have = new Set(c.skills);
    matchedSkills = q.skills.filter((s) => have.has(s));
    const ok = q.skillMode === "any" ? matchedSkills.length > 0 : matchedSkills.length === q.skills.length;
    if (!ok) return null;
    dimensions++;
  }

  if (q.seniority) {
    if (c.seniority !== q.seniority) return null;
    dimensions++;
  }

  if (q.terms) {
    const text = searchText(c);
    if (!q.terms.some((t) => text.includes(t))) return null;
    dimensions++;
  }

  return {
    candidateId: c.id,
    matchedDimensions: dimensions,
    skillOverlap: matchedSkills.length,
    matchedSkills,
    matchedExperience,
  };
}

function checkPaging(page: number, pageSize: number) {
  if (!Number.isInteger(page) || page < 0) throw new ValidationError("page", "page must be a non-negative integer");
  if (!Number.isInteger(pageSize) || pageSize < 1) throw new ValidationError("pageSize", "pageSize must be a positive integer");
}

/** All matches in their stable order: dimensions desc, skill overlap desc, id asc. */
export function matchAll(query: StructuredQuery, pool: readonly Candidate[], now: string): QueryMatch[] {
  const hasExperienceFilter = Boolean(query.organization || query.department || query.dateRange);
  const filter: ExperienceFilter | null = hasExperienceFilter
    ? {
        organizationKey: query.organization ? normalizeOrganization(query.organization) : undefined,
        departmentKey: query.department ? normalizeDepartment(query.department) : undefined,
        dateRange: query.dateRange,
        today: isoDay(now),
      }
    : null;

  const matches: QueryMatch[] = [];
  for (const c of pool) {
    const m = matchCandidate(c, query, filter);
    if (m) matches.push(m);
  }
  return matches.sort(
    (a, b) =>
      b.matchedDimensions - a.matchedDimensions ||
      b.skillOverlap - a.skillOverlap ||
      (a.candidateId < b.candidateId ? -1 : a.candidateId > b.candidateId ? 1 : 0)
  );
}

export function execute(
  query: StructuredQuery,
  pool: readonly Candidate[],
  page: number,
  pageSize: number,
  opts: ExecuteOptions
): QueryPage {
  checkPaging(page, pageSize);
  const size = Math.min(pageSize, opts.maxPageSize ?? DEFAULT_MAX_PAGE_SIZE);
  const all = matchAll(query, pool, opts.now);
  const offset = page * size;

  return {
    items: all.slice(offset, offset + size),
    total: all.length,
    page,
    pageSize: size,
    totalPages: Math.ceil(all.length / size),
  };
}
