// core/domain/skills.ts
import skillData from "../data/skill-synonyms.json";

export type SkillSynonyms = Readonly<Record<string, string>>;

export const DEFAULT_SKILL_SYNONYMS: SkillSynonyms = Object.freeze({ ...skillData.synonyms });
export const KNOWN_SKILLS: readonly string[] = Object.freeze([...skillData.vocabulary]);

// Too ambiguous in prose ("go to market", "REST of the team") to lift from descriptions.
const PROSE_AMBIGUOUS = new Set(["c", "r", "go", "rest", "express", "spring", "swift", "rails"]);

export function canonicalSkill(raw: string, synonyms: SkillSynonyms = DEFAULT_SKILL_SYNONYMS): string | null {
  const t = raw
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/^[\s\-•*·:()"']+|[\s\-•*·:,;()"'.]+$/g, "")
    .trim();
  if (!t) return null;
  return synonyms[t] ?? t;
}

/** Splits a skills section ("Languages: Python, Go | SQL") into raw tokens. */
export function splitSkillText(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*[\-•*·]\s*/, "").replace(/^[A-Za-z /&]{2,30}:\s+/, ""))
    .flatMap((line) => line.split(/[,;|•·]/))
    .map((s) => s.trim())
    .filter(Boolean);
}

export function normalizeSkills(values: Iterable<string>, synonyms: SkillSynonyms = DEFAULT_SKILL_SYNONYMS): string[] {
  const out = new Set<string>();
  for (const v of values) {
    const c = canonicalSkill(v, synonyms);
    if (c) out.add(c);
  }
  return [...out].sort();
}

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export type SkillMatcher = {
  synonyms: SkillSynonyms;
  /** Canonical skills mentioned in free text, in order of first mention. */
  extract(text: string): string[];
};

export function createSkillMatcher(
  synonyms: SkillSynonyms = DEFAULT_SKILL_SYNONYMS,
  vocabulary: Iterable<string> = KNOWN_SKILLS
): SkillMatcher {
  const surfaces = new Map<string, string>(); // surface form -> canonical
  for (const v of vocabulary) {
    const c = canonicalSkill(v, synonyms);
    if (c) surfaces.set(c, c);
  }
  for (const [alias, canonical] of Object.entries(synonyms)) surfaces.set(alias, canonical);

  const patterns = [...surfaces.entries()]
    .filter(([surface]) => surface.length > 1 && !PROSE_AMBIGUOUS.has(surface))
    .map(([surface, canonical]) => ({
      canonical,
      re: new RegExp(`(?<![a-z0-9+#])${escapeRegExp(surface)}(?![a-z0-9+#])`),
    }));

  return {
    synonyms,
    extract(text: string): string[] {
      const lower = text.toLowerCase();
      const hits: Array<{ canonical: string; index: number }> = [];
      for (const p of patterns) {
        const m = p.re.exec(lower);
        if (m) hits.push({ canonical: p.canonical, index: m.index });
      }
      hits.sort((a, b) => a.index - b.index || a.canonical.localeCompare(b.canonical));
      return [...new Set(hits.map((h) => h.canonical))];
    },
  };
}
