// core/nlq/vocabulary.ts
import type { Candidate } from "../domain/candidate";
import { titleTokens } from "../domain/similarity";
import { KNOWN_SKILLS } from "../domain/skills";

export type QueryVocabulary = {
  organizations: ReadonlyMap<string, string>; // key -> display name
  departments: ReadonlyMap<string, string>; // key -> display label
  skills: ReadonlySet<string>;
  roles: ReadonlySet<string>;
};

export const ROLE_WORDS = [
  "engineer", "developer", "programmer", "architect", "designer", "manager", "director", "analyst",
  "scientist", "researcher", "recruiter", "consultant", "accountant", "marketer", "salesperson",
  "administrator", "specialist", "coordinator", "strategist", "writer", "editor", "trader",
  "founder", "executive", "intern", "technician", "lawyer", "nurse", "teacher",
];

export const DEPARTMENT_WORDS = [
  "engineering", "sales", "marketing", "finance", "product", "design", "operations",
  "human resources", "legal", "research and development", "data science", "customer success",
  "support", "information technology", "business development", "quality assurance", "trading",
];

/** Vocabulary for the keyword translator, built from one snapshot. Deterministic for a given pool. */
export function buildVocabulary(candidates: readonly Candidate[]): QueryVocabulary {
  const organizations = new Map<string, string>();
  const departments = new Map<string, string>(DEPARTMENT_WORDS.map((d) => [d, d]));
  const skills = new Set<string>(KNOWN_SKILLS);
  const roles = new Set<string>(ROLE_WORDS);

  for (const c of candidates) {
    for (const s of c.skills) skills.add(s);
    for (const t of titleTokens(c)) if (/^[a-z]{3,}$/.test(t)) roles.add(t);
    for (const e of c.experiences) {
      if (e.organizationKey && e.organization && !organizations.has(e.organizationKey)) {
        organizations.set(e.organizationKey, e.organization);
      }
      if (e.departmentKey && e.department && !departments.has(e.departmentKey)) {
        departments.set(e.departmentKey, e.department);
      }
    }
  }

  return { organizations, departments, skills, roles };
}
