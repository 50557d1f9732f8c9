// core/domain/similarity.ts
import type { Candidate } from "./candidate";
import { SENIORITY_TITLE_WORDS, tierIndex } from "./seniority";

export type SimilarityWeights = {
  skills: number;
  organization: number;
  seniority: number;
  title: number;
};

/**
 * Default feature weights. Skills dominate; a shared employer and a similar
 * level matter about equally; title wording is the weakest signal.
 * Override per call through FindSimilarOptions.weights.
 */
export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
  skills: 0.45,
  organization: 0.2,
  seniority: 0.2,
  title: 0.15,
};

/** Score lost per tier of seniority distance. */
export const SENIORITY_DECAY = 0.5;

export const DEFAULT_SIMILAR_LIMIT = 20;
export const MAX_SIMILAR_LIMIT = 100;

export type SimilarityBreakdown = {
  skills: number;
  organization: number;
  seniority: number;
  title: number;
  sharedSkills: string[];
  sharedOrganizations: string[];
};

export type SimilarMatch = {
  candidateId: string;
  score: number; // 0..1
  breakdown: SimilarityBreakdown;
};

export type SimilarityResult = {
  referenceId: string;
  results: SimilarMatch[];
};

export type FindSimilarOptions = {
  limit?: number;
  maxLimit?: number;
  minScore?: number;
  weights?: Partial<SimilarityWeights>;
};

const TITLE_STOPWORDS = new Set(["of", "and", "the", "a", "an", "for", "to", "in", "at", "i", "ii", "iii", "iv"]);

function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let inter = 0;
  for (const x of a) if (b.has(x)) inter++;
  return inter / (a.size + b.size - inter);
}

function intersect<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): T[] {
  return [...a].filter((x) => b.has(x));
}

export function titleTokens(c: Candidate): Set<string> {
  const out = new Set<string>();
  for (const e of c.experiences) {
    for (const w of (e.title ?? "").toLowerCase().split(/[^a-z0-9+#]+/)) {
      if (w && !TITLE_STOPWORDS.has(w) && !SENIORITY_TITLE_WORDS.has(w)) out.add(w);
    }
  }
  return out;
}

function organizationKeys(c: Candidate): Set<string> {
  const out = new Set<string>();
  for (const e of c.experiences) if (e.organizationKey) out.add(e.organizationKey);
  return out;
}

type Features = { skills: Set<string>; orgs: Set<string>; titles: Set<string>; tier: number };

function features(c: Candidate): Features {
  return {
    skills: new Set(c.skills),
    orgs: organizationKeys(c),
    titles: titleTokens(c),
    tier: tierIndex(c.seniority),
  };
}

function clamp01(x: number): number {
  if (Number.isNaN(x)) return 0;
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}

function resolveWeights(overrides: Partial<SimilarityWeights> | undefined): SimilarityWeights {
  const w = { ...DEFAULT_SIMILARITY_WEIGHTS, ...overrides };
  for (const [k, v] of Object.entries(w)) {
    if (!Number.isFinite(v) || v < 0) throw new RangeError(`Similarity weight "${k}" must be a non-negative number`);
  }
  return w;
}

export function scorePair(
  ref: Features,
  other: Features,
  weights: SimilarityWeights
): { score: number; breakdown: SimilarityBreakdown } {
  const sharedSkills = intersect(ref.skills, other.skills).sort();
  const sharedOrganizations = intersect(ref.orgs, other.orgs).sort();

  const breakdown: SimilarityBreakdown = {
    skills: jaccard(ref.skills, other.skills),
    organization: sharedOrganizations.length > 0 ? 1 : 0,
    seniority: Math.max(0, 1 - Math.abs(ref.tier - other.tier) * SENIORITY_DECAY),
    title: jaccard(ref.titles, other.titles),
    sharedSkills,
    sharedOrganizations,
  };

  const total = weights.skills + weights.organization + weights.seniority + weights.title;
  const weighted =
    breakdown.skills * weights.skills +
    breakdown.organization * weights.organization +
    breakdown.seniority * weights.seniority +
    breakdown.title * weights.title;

  const score = total > 0 ? clamp01(weighted / total) : 0;
  return { score: Math.round(score * 10000) / 10000, breakdown };
}

/**
 * Ranks `pool` by similarity to `reference`. Pure: same inputs, same output.
 * Ties: higher skill overlap, then candidate id ascending.
 */
export function findSimilar(
  reference: Candidate,
  pool: readonly Candidate[],
  opts: FindSimilarOptions = {}
): SimilarityResult {
  const maxLimit = opts.maxLimit ?? MAX_SIMILAR_LIMIT;
  const limit = Math.max(0, Math.min(Math.floor(opts.limit ?? DEFAULT_SIMILAR_LIMIT), maxLimit));
  const minScore = opts.minScore ?? 0;
  const weights = resolveWeights(opts.weights);

  const ref = features(reference);
  const scored: SimilarMatch[] = [];

  for (const c of pool) {
    if (c.id === reference.id) continue;
    const { score, breakdown } = scorePair(ref, features(c), weights);
    if (score < minScore) continue;
    scored.push({ candidateId: c.id, score, breakdown });
  }

  scored.sort(
    (a, b) =>
      b.score - a.score ||
      b.breakdown.skills - a.breakdown.skills ||
      (a.candidateId < b.candidateId ? -1 : a.candidateId > b.candidateId ? 1 : 0)
  );

  return { referenceId: reference.id, results: scored.slice(0, limit) };
}
