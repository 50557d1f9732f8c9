// Raw resume builders shared by the domain, engine and gateway tests.
import type { Candidate } from "../domain/candidate";
import { normalizeResume } from "../domain/normalize";

export const NOW = "2026-10-18T00:00:00Z";

export type Stint = {
  org: string;
  dept?: string;
  title?: string;
  dates?: string;
  start?: string;
  end?: string;
};

export function resume(id: string, name: string, stints: Stint[], skills = ""): Record<string, unknown> {
  return {
    id,
    name,
    sections: {
      Experience: stints.map((s) => ({
        company: s.org,
        department: s.dept,
        title: s.title ?? "Engineer",
        dates: s.dates,
        start: s.start,
        end: s.end,
      })),
      ...(skills ? { Skills: skills } : {}),
    },
  };
}

export function candidate(id: string, stints: Stint[], skills = ""): Candidate {
  return normalizeResume(resume(id, id, stints, skills), { now: NOW });
}

/** A and B overlap at Acme during 2020; C never shares an employer with anyone. */
export function scenarioResumes(): Record<string, unknown>[] {
  return [
    resume("A", "Ada", [{ org: "Acme", dept: "Eng", dates: "2019–2021" }], "python, sql"),
    resume("B", "Ben", [{ org: "Acme", dept: "Eng", dates: "2020–2022" }], "python, go"),
    resume("C", "Cy", [{ org: "Globex", dept: "Sales", title: "Account Executive", dates: "2019–2021" }], "excel"),
  ];
}

export function scenarioPool(): Candidate[] {
  return scenarioResumes().map((r) => normalizeResume(r, { now: NOW }));
}
