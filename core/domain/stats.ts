// core/domain/stats.ts
import type { Candidate, SeniorityTier } from "./candidate";

export type CountEntry = { value: string; count: number };

export type PoolStatistics = {
  candidates: number;
  uniqueOrganizations: number;
  uniqueDepartments: number;
  uniqueSkills: number;
  averageExperienceYears: number;
  seniority: Record<SeniorityTier, number>;
  topSkills: CountEntry[];
  topOrganizations: CountEntry[];
  topDepartments: CountEntry[];
};

/** Counts each value at most once per candidate. */
function tally(pool: readonly Candidate[], valuesOf: (c: Candidate) => Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const c of pool) {
    for (const v of new Set(valuesOf(c))) counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  return counts;
}

function top(counts: Map<string, number>, limit: number): CountEntry[] {
  return [...counts]
    .map(([value, count]) => ({ value, count }))
    .sort((x, y) => y.count - x.count || (x.value < y.value ? -1 : x.value > y.value ? 1 : 0))
    .slice(0, Math.max(0, limit));
}

export function poolStatistics(pool: readonly Candidate[], limit = 10): PoolStatistics {
  const skills = tally(pool, (c) => c.skills);
  const organizations = tally(pool, (c) => c.experiences.flatMap((e) => (e.organizationKey ? [e.organizationKey] : [])));
  const departments = tally(pool, (c) => c.experiences.flatMap((e) => (e.departmentKey ? [e.departmentKey] : [])));

  const seniority: Record<SeniorityTier, number> = { junior: 0, mid: 0, senior: 0, lead: 0 };
  for (const c of pool) seniority[c.seniority]++;

  const totalMonths = pool.reduce((sum, c) => sum + c.totalExperienceMonths, 0);

  return {
    candidates: pool.length,
    uniqueOrganizations: organizations.size,
    uniqueDepartments: departments.size,
    uniqueSkills: skills.size,
    averageExperienceYears: pool.length ? Math.round((totalMonths / pool.length / 12) * 10) / 10 : 0,
    seniority,
    topSkills: top(skills, limit),
    topOrganizations: top(organizations, limit),
    topDepartments: top(departments, limit),
  };
}
