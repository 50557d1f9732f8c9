// core/domain/normalize.ts
// Raw parser output is untyped. It is validated here once; nothing downstream
// looks at raw shapes again.

import { createHash } from "node:crypto";
import type { Candidate, Experience } from "./candidate";
import type { DatePrecision } from "./dates";
import { daysBetween, isoDay, parseDatePoint, parseDateRange, toEpochMs } from "./dates";
import { NormalizationError } from "./errors";
import { normalizeDepartment, normalizeOrganization } from "./organizations";
import type { SeniorityThresholds } from "./seniority";
import { deriveSeniority } from "./seniority";
import type { SkillMatcher, SkillSynonyms } from "./skills";
import { createSkillMatcher, DEFAULT_SKILL_SYNONYMS, normalizeSkills, splitSkillText } from "./skills";

export type NormalizeOptions = {
  now: string;
  synonyms?: SkillSynonyms;
  skillMatcher?: SkillMatcher;
  seniorityThresholds?: SeniorityThresholds;
};

type SectionKind = "name" | "experience" | "skills" | "summary";

const SECTION_ALIASES: Record<SectionKind, string[]> = {
  name: ["name", "fullname", "candidatename", "candidate"],
  experience: [
    "experience", "workexperience", "workhistory", "employment", "employmenthistory",
    "professionalexperience", "careerhistory", "positions", "professionalbackground", "work", "jobs",
  ],
  skills: [
    "skills", "technicalskills", "coreskills", "corecompetencies", "competencies", "technologies",
    "toolsandtechnologies", "expertise", "keyskills", "skillset",
  ],
  summary: ["summary", "professionalsummary", "profile", "objective", "careerobjective", "about", "aboutme"],
};

const SECTION_KINDS: readonly SectionKind[] = ["name", "experience", "skills", "summary"];

const SECTION_LOOKUP = new Map<string, SectionKind>(
  SECTION_KINDS.flatMap((kind) => SECTION_ALIASES[kind].map((a) => [singular(a), kind] as const))
);

function singular(key: string) {
  return key.length > 3 && key.endsWith("s") ? key.slice(0, -1) : key;
}

export function sectionKind(key: string): SectionKind | null {
  const k = key.toLowerCase().replace(/[^a-z]/g, "");
  return SECTION_LOOKUP.get(singular(k)) ?? null;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function trimOrNull(v: unknown): string | null {
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  if (typeof v !== "string") return null;
  const t = v.replace(/\s+/g, " ").trim();
  return t || null;
}

function pick(o: Record<string, unknown>, keys: string[]): string | null {
  for (const k of keys) {
    const v = trimOrNull(o[k]);
    if (v) return v;
  }
  return null;
}

/** Flattens any nested parser content to plain text. */
export function textOf(content: unknown): string {
  if (typeof content === "string") return content.trim();
  if (typeof content === "number" || typeof content === "boolean") return String(content);
  if (Array.isArray(content)) return content.map(textOf).filter(Boolean).join("\n");
  if (isRecord(content)) {
    return Object.entries(content)
      .map(([k, v]) => {
        const t = textOf(v);
        return t ? `${k}: ${t}` : "";
      })
      .filter(Boolean)
      .join("\n");
  }
  return "";
}

function collectSections(raw: Record<string, unknown>): Array<{ key: string; content: unknown }> {
  const out: Array<{ key: string; content: unknown }> = [];
  const sections = raw.sections;

  if (Array.isArray(sections)) {
    for (const s of sections) {
      if (!isRecord(s)) continue;
      const key = pick(s, ["title", "heading", "name", "key"]);
      if (key) out.push({ key, content: s.content ?? s.text ?? s.body ?? s.items });
    }
  } else if (isRecord(sections)) {
    for (const [key, content] of Object.entries(sections)) out.push({ key, content });
  }

  // Some parsers put sections at the top level.
  for (const [key, content] of Object.entries(raw)) {
    if (key === "id" || key === "name" || key === "sections") continue;
    out.push({ key, content });
  }
  return out;
}

// ---- experiences ----

type DraftExperience = {
  organization: string | null;
  title: string | null;
  department: string | null;
  description: string;
  colleagues: string[];
  dates: { start: string | null; end: string | null; current: boolean; combined: string | null };
};

type ResolvedDates = { start: string | null; end: string | null; precision: DatePrecision };

function resolveDates(d: DraftExperience["dates"], label: string, warnings: string[]): ResolvedDates {
  const none: ResolvedDates = { start: null, end: null, precision: "unknown" };

  if (d.start) {
    const sp = parseDatePoint(d.start);
    if (!sp || sp.kind !== "date") {
      warnings.push(`Unparseable start date "${d.start}" for ${label}`);
      return none;
    }
    if (d.current || !d.end) return { start: sp.iso, end: null, precision: sp.precision };
    const ep = parseDatePoint(d.end);
    if (!ep) {
      warnings.push(`Unparseable end date "${d.end}" for ${label}; treated as open-ended`);
      return { start: sp.iso, end: null, precision: sp.precision };
    }
    if (ep.kind === "present") return { start: sp.iso, end: null, precision: sp.precision };
    return { start: sp.iso, end: ep.iso, precision: coarser(sp.precision, ep.precision) };
  }

  if (d.combined) {
    const range = parseDateRange(d.combined);
    if (!range) {
      warnings.push(`Unparseable dates "${d.combined}" for ${label}`);
      return none;
    }
    return { start: range.start, end: d.current ? null : range.end, precision: range.precision };
  }

  warnings.push(`No dates for ${label}`);
  return none;
}

function coarser(a: DatePrecision, b: DatePrecision): DatePrecision {
  if (a === "year" || b === "year") return "year";
  if (a === "month" || b === "month") return "month";
  return "exact";
}

function draftFromObject(o: Record<string, unknown>): DraftExperience | null {
  const description = [o.description, o.summary, o.responsibilities, o.achievements, o.highlights]
    .map(textOf)
    .filter(Boolean)
    .join("\n");
  const colleagues = Array.isArray(o.colleagues)
    ? o.colleagues.map(trimOrNull).filter((c): c is string => c !== null)
    : [];

  const organization = pick(o, ["organization", "company", "employer", "org", "companyName", "company_name"]);
  const title = pick(o, ["title", "position", "role", "jobTitle", "job_title"]);
  if (!organization && !title) return null;

  return {
    organization,
    title,
    department: pick(o, ["department", "team", "desk", "division", "group"]),
    description,
    colleagues,
    dates: {
      start: pick(o, ["start", "startDate", "start_date", "from"]),
      end: pick(o, ["end", "endDate", "end_date", "to"]),
      current: o.current === true || o.is_current === true || o.isCurrent === true,
      combined: pick(o, ["dates", "period", "duration", "date", "tenure"]),
    },
  };
}

const BULLET = /^\s*[-•*·▪◦]\s+/;
const LABELED = /^(department|team|desk|dates|period|colleagues|company|organization|title|role)\s*:\s*(.+)$/i;

function draftFromBlock(block: string[]): DraftExperience | null {
  const [header, ...rest] = block;
  const draft: DraftExperience = {
    organization: null,
    title: null,
    department: null,
    description: "",
    colleagues: [],
    dates: { start: null, end: null, current: false, combined: null },
  };

  let segments = header.split(/\s*\|\s*/).map((s) => s.trim()).filter(Boolean);
  if (segments.length === 1) {
    let h = segments[0];
    const paren = h.match(/\(([^)]*)\)\s*$/);
    if (paren && parseDateRange(paren[1])) {
      draft.dates.combined = paren[1].trim();
      h = h.slice(0, paren.index).trim();
    }
    const at = h.split(/\s+at\s+/i);
    segments = at.length === 2 ? [at[0], ...at[1].split(/\s*,\s*/)] : h.split(/\s*,\s*/);
  }

  const plain: string[] = [];
  for (const seg of segments) {
    if (!draft.dates.combined && parseDateRange(seg)) draft.dates.combined = seg;
    else plain.push(seg);
  }
  // "Title | Org | Dept | Dates": a fourth segment is meant as dates even when it does not parse.
  if (!draft.dates.combined && plain.length >= 4) draft.dates.combined = plain.splice(3, 1)[0];
  draft.title = plain[0] ?? null;
  draft.organization = plain[1] ?? null;
  draft.department = plain[2] ?? null;

  const description: string[] = [];
  for (const line of rest) {
    const labeled = line.match(LABELED);
    if (labeled) {
      const value = labeled[2].trim();
      switch (labeled[1].toLowerCase()) {
        case "department":
        case "team":
        case "desk":
          draft.department = value;
          break;
        case "dates":
        case "period":
          draft.dates.combined = value;
          break;
        case "colleagues":
          draft.colleagues = value.split(/\s*[,;]\s*/).filter(Boolean);
          break;
        case "company":
        case "organization":
          draft.organization = value;
          break;
        default:
          draft.title = value;
      }
      continue;
    }
    if (!draft.dates.combined && !BULLET.test(line) && parseDateRange(line)) {
      draft.dates.combined = line;
      continue;
    }
    description.push(line.replace(BULLET, ""));
  }
  draft.description = description.join("\n");

  return draft.organization || draft.title ? draft : null;
}

function draftsFromText(text: string): DraftExperience[] {
  const blocks: string[][] = [];
  let current: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      if (current.length) blocks.push(current);
      current = [];
      continue;
    }
    if (!current.length && BULLET.test(line) && blocks.length) {
      // bullets after a blank line still belong to the previous role
      current = blocks.pop() ?? [];
    }
    current.push(line);
  }
  if (current.length) blocks.push(current);

  return blocks.map(draftFromBlock).filter((d): d is DraftExperience => d !== null);
}

function draftsFrom(content: unknown): DraftExperience[] {
  if (typeof content === "string") return draftsFromText(content);
  if (Array.isArray(content)) {
    return content.flatMap((item) => {
      if (isRecord(item)) return draftFromObject(item) ?? [];
      if (typeof item === "string") return draftsFromText(item);
      return [];
    });
  }
  if (isRecord(content)) return draftFromObject(content) ?? [];
  return [];
}

function toExperience(d: DraftExperience, matcher: SkillMatcher, warnings: string[]): Experience {
  const label = d.organization ?? d.title ?? "unnamed role";
  let { start, end, precision } = resolveDates(d.dates, label, warnings);
  if (start && end && start > end) {
    warnings.push(`Start after end for ${label}; dates swapped`);
    [start, end] = [end, start];
  }

  const organizationKey = d.organization ? normalizeOrganization(d.organization) || null : null;
  const departmentKey = d.department ? normalizeDepartment(d.department) || null : null;

  return {
    organization: d.organization,
    organizationKey,
    department: d.department,
    departmentKey,
    title: d.title,
    start,
    end,
    datePrecision: precision,
    keywords: matcher.extract(d.description),
    colleagues: d.colleagues,
  };
}

function recencyRank(e: Experience): [number, number, number] {
  if (!e.start) return [1, 0, 0];
  return [0, e.end ? -toEpochMs(e.end) : -Infinity, -toEpochMs(e.start)];
}

export function compareRecency(a: Experience, b: Experience): number {
  const ra = recencyRank(a);
  const rb = recencyRank(b);
  for (let i = 0; i < ra.length; i++) {
    if (ra[i] !== rb[i]) return ra[i] < rb[i] ? -1 : 1;
  }
  return (a.organizationKey ?? "").localeCompare(b.organizationKey ?? "") || (a.title ?? "").localeCompare(b.title ?? "");
}

/** Months covered by the union of all dated roles, open ends clipped at `now`. */
export function totalExperienceMonths(experiences: readonly Experience[], now: string): number {
  const today = isoDay(now);
  const intervals = experiences
    .filter((e): e is Experience & { start: string } => e.start !== null && e.start < today)
    .map((e): [string, string] => [e.start, e.end === null || e.end > today ? today : e.end])
    .filter(([s, e]) => s < e)
    .sort((a, b) => a[0].localeCompare(b[0]));

  let days = 0;
  let cur: [string, string] | null = null;
  for (const iv of intervals) {
    if (cur && iv[0] <= cur[1]) {
      if (iv[1] > cur[1]) cur[1] = iv[1];
      continue;
    }
    if (cur) days += daysBetween(cur[0], cur[1]);
    cur = [iv[0], iv[1]];
  }
  if (cur) days += daysBetween(cur[0], cur[1]);
  return Math.round(days / 30.44);
}

function deriveId(name: string | null, experiences: readonly Experience[]): string {
  const basis = [name ?? "", ...experiences.map((e) => `${e.organizationKey ?? ""}:${e.title ?? ""}:${e.start ?? ""}`)].join("|");
  return "cand_" + createHash("sha256").update(basis.toLowerCase()).digest("hex").slice(0, 16);
}

export function normalizeResume(raw: unknown, opts: NormalizeOptions): Candidate {
  if (!isRecord(raw)) throw new NormalizationError("Resume input must be an object of sections");

  const synonyms = opts.synonyms ?? DEFAULT_SKILL_SYNONYMS;
  const matcher = opts.skillMatcher ?? createSkillMatcher(synonyms);
  const warnings: string[] = [];

  let name = trimOrNull(raw.name);
  let summary: string | null = null;
  const drafts: DraftExperience[] = [];
  const skillTokens: string[] = [];
  const extraSections: Record<string, string> = {};

  for (const { key, content } of collectSections(raw)) {
    switch (sectionKind(key)) {
      case "name":
        name = name ?? trimOrNull(textOf(content).split("\n")[0]);
        break;
      case "experience":
        drafts.push(...draftsFrom(content));
        break;
      case "skills":
        skillTokens.push(...splitSkillText(textOf(content)));
        break;
      case "summary":
        summary = summary ?? (textOf(content) || null);
        break;
      default: {
        const text = textOf(content);
        if (text) extraSections[key] = text;
      }
    }
  }

  const experiences = drafts.map((d) => toExperience(d, matcher, warnings)).sort(compareRecency);

  if (!name && experiences.length === 0) {
    throw new NormalizationError("Resume has no name and no parseable experience");
  }

  const skills = normalizeSkills([...skillTokens, ...experiences.flatMap((e) => e.keywords)], synonyms);
  const totalMonths = totalExperienceMonths(experiences, opts.now);
  const rawId = trimOrNull(raw.id);

  return {
    id: rawId ?? deriveId(name, experiences),
    name,
    summary,
    experiences,
    skills,
    totalExperienceMonths: totalMonths,
    seniority: deriveSeniority(totalMonths, experiences, opts.seniorityThresholds),
    extraSections,
    warnings,
  };
}
