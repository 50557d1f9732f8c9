import type { Candidate, SeniorityTier } from "../../core/domain/candidate"
import { isoDay } from "../../core/domain/dates"
import { InternalInconsistency, isSearchError, NotFound, ValidationError } from "../../core/domain/errors"
import type { ColleagueEdge, NetworkGraph, NetworkStats, PathResult } from "../../core/domain/network"
import {
  assertSymmetric,
  buildEdges,
  buildGraph,
  connectedComponents,
  keyConnectors,
  neighborhood,
  neighbors,
  networkStats,
  shortestPath,
} from "../../core/domain/network"
import type { QueryMatch, StructuredQuery } from "../../core/domain/query"
import { execute, validateStructuredQuery } from "../../core/domain/query"
import type { SimilarMatch } from "../../core/domain/similarity"
import { findSimilar } from "../../core/domain/similarity"
import type { SkillMatcher } from "../../core/domain/skills"
import { createSkillMatcher } from "../../core/domain/skills"
import type { PoolSnapshot } from "../../core/domain/snapshot"
import type { PoolStatistics } from "../../core/domain/stats"
import { poolStatistics } from "../../core/domain/stats"
import type { QueryOracle } from "../../core/llm/adapter"
import type { TranslationProvenance } from "../../core/nlq/translate"
import { translate } from "../../core/nlq/translate"
import type { QueryVocabulary } from "../../core/nlq/vocabulary"
import { buildVocabulary } from "../../core/nlq/vocabulary"
import { ENGINE_VERSION } from "../../core/versioning/versions"
import { errorFields, logEvent } from "../lib/log"

// ---- Requests ----

export type SearchRequest =
  | { kind: "similar"; candidateId: string; limit?: number; minScore?: number }
  | { kind: "structured"; query: StructuredQuery; page?: number; pageSize?: number }
  | { kind: "natural"; text: string; page?: number; pageSize?: number }
  | { kind: "colleagues"; candidateId: string; depth?: number; minOverlapMonths?: number }
  | { kind: "path"; from: string; to: string; minOverlapMonths?: number }
  | { kind: "network_analysis"; candidateIds?: string[]; limit?: number; minOverlapMonths?: number }
  | { kind: "stats"; limit?: number }

export type SearchKind = SearchRequest["kind"]

export const SEARCH_KINDS: readonly SearchKind[] = [
  "similar",
  "structured",
  "natural",
  "colleagues",
  "path",
  "network_analysis",
  "stats",
]

export const MAX_NETWORK_DEPTH = 3

export type SearchSettings = {
  oracleTimeoutMs: number
  maxPageSize: number
  defaultPageSize: number
  defaultSimilarLimit: number
  maxSimilarLimit: number
}

export type SearchContext = {
  snapshot: PoolSnapshot
  oracle: QueryOracle | null
  settings: SearchSettings
  now: string
  requestId?: string
}

// ---- Responses ----

type Envelope<K extends SearchKind> = {
  ok: true
  kind: K
  engineVersion: string
  snapshotVersion: number
}

export type QueryHit = QueryMatch & { name: string | null; seniority: SeniorityTier }
export type SimilarHit = SimilarMatch & { name: string | null }

type PageFields = {
  query: StructuredQuery
  items: QueryHit[]
  total: number
  page: number
  pageSize: number
  totalPages: number
}

export type SimilarResponse = Envelope<"similar"> & { found: boolean; referenceId: string; results: SimilarHit[] }
export type StructuredResponse = Envelope<"structured"> & PageFields
export type NaturalResponse = Envelope<"natural"> &
  PageFields & {
    provenance: TranslationProvenance
    warnings: string[]
    oracleError?: string
  }
export type ColleaguesResponse = Envelope<"colleagues"> & {
  found: boolean
  candidateId: string
  colleagues: Array<{ candidateId: string; name: string | null; edges: ColleagueEdge[] }>
  network: Array<{ candidateId: string; distance: number }>
}
export type PathResponse = Envelope<"path"> & { found: boolean; from: string; to: string } & PathResult
export type NetworkAnalysisResponse = Envelope<"network_analysis"> & {
  stats: NetworkStats
  components: string[][]
  keyConnectors: Array<{ candidateId: string; connections: number }>
  missing: string[]
}
export type StatsResponse = Envelope<"stats"> & { pool: PoolStatistics; network: NetworkStats }

export type SearchFailure = {
  ok: false
  kind: SearchKind | null
  error: { code: string; message: string; field?: string }
}

export type SearchResponse =
  | SimilarResponse
  | StructuredResponse
  | NaturalResponse
  | ColleaguesResponse
  | PathResponse
  | NetworkAnalysisResponse
  | StatsResponse
  | SearchFailure

// ---- Request parsing ----

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

function isSearchKind(v: unknown): v is SearchKind {
  return SEARCH_KINDS.some((k) => k === v)
}

const KIND_FIELDS: Record<SearchKind, readonly string[]> = {
  similar: ["candidateId", "limit", "minScore"],
  structured: ["query", "page", "pageSize"],
  natural: ["text", "page", "pageSize"],
  colleagues: ["candidateId", "depth", "minOverlapMonths"],
  path: ["from", "to", "minOverlapMonths"],
  network_analysis: ["candidateIds", "limit", "minOverlapMonths"],
  stats: ["limit"],
}

function requiredId(body: Record<string, unknown>, field: string): string {
  const v = body[field]
  if (typeof v !== "string" || !v.trim()) throw new ValidationError(field, `${field} must be a non-empty string`)
  return v.trim()
}

function optionalInt(body: Record<string, unknown>, field: string, min: number, max = Number.MAX_SAFE_INTEGER): number | undefined {
  const v = body[field]
  if (v === undefined || v === null) return undefined
  if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
    throw new ValidationError(field, `${field} must be an integer between ${min} and ${max}`)
  }
  return v
}

function optionalNumber(body: Record<string, unknown>, field: string, min: number, max: number): number | undefined {
  const v = body[field]
  if (v === undefined || v === null) return undefined
  if (typeof v !== "number" || !Number.isFinite(v) || v < min || v > max) {
    throw new ValidationError(field, `${field} must be a number between ${min} and ${max}`)
  }
  return v
}

function optionalIdList(body: Record<string, unknown>, field: string): string[] | undefined {
  const v = body[field]
  if (v === undefined || v === null) return undefined
  if (!Array.isArray(v)) throw new ValidationError(field, `${field} must be an array of strings`)
  return v.map((item, i) => {
    if (typeof item !== "string" || !item.trim()) throw new ValidationError(`${field}[${i}]`, "ids must be non-empty strings")
    return item.trim()
  })
}

/** Transport body -> SearchRequest. Throws ValidationError naming the offending field. */
export function parseSearchRequest(body: unknown): SearchRequest {
  if (!isRecord(body)) throw new ValidationError("body", "Request body must be a JSON object")
  const kind = body.kind
  if (!isSearchKind(kind)) throw new ValidationError("kind", `kind must be one of ${SEARCH_KINDS.join(", ")}`)

  const allowed = KIND_FIELDS[kind]
  for (const key of Object.keys(body)) {
    if (key !== "kind" && !allowed.includes(key)) throw new ValidationError(key, `Unrecognized field "${key}" for ${kind}`)
  }

  const minOverlapMonths = optionalNumber(body, "minOverlapMonths", 0, 1200)

  switch (kind) {
    case "similar":
      return {
        kind,
        candidateId: requiredId(body, "candidateId"),
        limit: optionalInt(body, "limit", 1),
        minScore: optionalNumber(body, "minScore", 0, 1),
      }
    case "structured":
      return {
        kind,
        query: validateStructuredQuery(body.query ?? {}),
        page: optionalInt(body, "page", 0),
        pageSize: optionalInt(body, "pageSize", 1),
      }
    case "natural": {
      if (typeof body.text !== "string") throw new ValidationError("text", "text must be a string")
      return { kind, text: body.text, page: optionalInt(body, "page", 0), pageSize: optionalInt(body, "pageSize", 1) }
    }
    case "colleagues":
      return {
        kind,
        candidateId: requiredId(body, "candidateId"),
        depth: optionalInt(body, "depth", 1, MAX_NETWORK_DEPTH),
        minOverlapMonths,
      }
    case "path":
      return { kind, from: requiredId(body, "from"), to: requiredId(body, "to"), minOverlapMonths }
    case "network_analysis":
      return {
        kind,
        candidateIds: optionalIdList(body, "candidateIds"),
        limit: optionalInt(body, "limit", 0),
        minOverlapMonths,
      }
    case "stats":
      return { kind, limit: optionalInt(body, "limit", 0) }
  }
}

// ---- Per-snapshot memo ----
// Snapshots are immutable, so anything derived from one can live as long as it does.
// Only the unfiltered graph for one day is kept; thresholds filter its edges per request.

type Derived = {
  graph?: { day: string; graph: NetworkGraph }
  vocabulary?: { vocabulary: QueryVocabulary; matcher: SkillMatcher }
}

const derivedBySnapshot = new WeakMap<PoolSnapshot, Derived>()

function derived(snapshot: PoolSnapshot): Derived {
  let d = derivedBySnapshot.get(snapshot)
  if (!d) {
    d = {}
    derivedBySnapshot.set(snapshot, d)
  }
  return d
}

function checkedGraph(pool: readonly Candidate[], edges: readonly ColleagueEdge[]): NetworkGraph {
  const graph = buildGraph(pool, edges)
  assertSymmetric(graph)
  return graph
}

/** Open roles run to `now`, so the memo is replaced when the day changes. */
export function graphFor(snapshot: PoolSnapshot, now: string, minOverlapMonths = 0): NetworkGraph {
  const d = derived(snapshot)
  const day = isoDay(now)
  let memo = d.graph
  if (!memo || memo.day !== day) {
    memo = { day, graph: checkedGraph(snapshot.candidates, buildEdges(snapshot.candidates, { now })) }
    d.graph = memo
  }
  const base = memo.graph
  if (minOverlapMonths <= 0) return base
  return checkedGraph(snapshot.candidates, base.edges.filter((e) => e.overlapMonths >= minOverlapMonths))
}

function vocabularyFor(snapshot: PoolSnapshot) {
  const d = derived(snapshot)
  if (!d.vocabulary) {
    const vocabulary = buildVocabulary(snapshot.candidates)
    d.vocabulary = { vocabulary, matcher: createSkillMatcher(undefined, vocabulary.skills) }
  }
  return d.vocabulary
}

// ---- Handlers ----

function envelope<K extends SearchKind>(kind: K, ctx: SearchContext): Envelope<K> {
  return { ok: true, kind, engineVersion: ENGINE_VERSION, snapshotVersion: ctx.snapshot.version }
}

function requireCandidate(snapshot: PoolSnapshot, id: string): Candidate {
  const c = snapshot.byId.get(id)
  if (!c) throw new NotFound(id)
  return c
}

/** For ids the engine itself produced from this snapshot; a miss is a defect. */
function member(snapshot: PoolSnapshot, id: string): Candidate {
  const c = snapshot.byId.get(id)
  if (!c) throw new InternalInconsistency(`Result ${id} is missing from snapshot ${snapshot.version}`)
  return c
}

function toHit(snapshot: PoolSnapshot, m: QueryMatch): QueryHit {
  const c = member(snapshot, m.candidateId)
  return { ...m, name: c.name, seniority: c.seniority }
}

function runPage(query: StructuredQuery, page: number | undefined, pageSize: number | undefined, ctx: SearchContext): PageFields {
  const result = execute(query, ctx.snapshot.candidates, page ?? 0, pageSize ?? ctx.settings.defaultPageSize, {
    now: ctx.now,
    maxPageSize: ctx.settings.maxPageSize,
  })
  return { query, ...result, items: result.items.map((m) => toHit(ctx.snapshot, m)) }
}

function runSimilar(req: Extract<SearchRequest, { kind: "similar" }>, ctx: SearchContext): SimilarResponse {
  let reference: Candidate
  try {
    reference = requireCandidate(ctx.snapshot, req.candidateId)
  } catch (err) {
    if (!(err instanceof NotFound)) throw err
    return { ...envelope("similar", ctx), found: false, referenceId: req.candidateId, results: [] }
  }

  const out = findSimilar(reference, ctx.snapshot.candidates, {
    limit: req.limit ?? ctx.settings.defaultSimilarLimit,
    maxLimit: ctx.settings.maxSimilarLimit,
    minScore: req.minScore,
  })
  return {
    ...envelope("similar", ctx),
    found: true,
    referenceId: out.referenceId,
    results: out.results.map((r) => ({ ...r, name: member(ctx.snapshot, r.candidateId).name })),
  }
}

async function runNatural(req: Extract<SearchRequest, { kind: "natural" }>, ctx: SearchContext): Promise<NaturalResponse> {
  const { vocabulary, matcher } = vocabularyFor(ctx.snapshot)
  const t = await translate(req.text, {
    oracle: ctx.oracle,
    vocabulary,
    skillMatcher: matcher,
    timeoutMs: ctx.settings.oracleTimeoutMs,
  })

  if (t.provenance === "fallback" && ctx.oracle) {
    logEvent("warn", "oracle_fallback", { requestId: ctx.requestId, oracleError: t.oracleError })
  }

  return {
    ...envelope("natural", ctx),
    ...runPage(t.query, req.page, req.pageSize, ctx),
    provenance: t.provenance,
    warnings: t.warnings,
    ...(t.oracleError ? { oracleError: t.oracleError } : {}),
  }
}

function runColleagues(req: Extract<SearchRequest, { kind: "colleagues" }>, ctx: SearchContext): ColleaguesResponse {
  const graph = graphFor(ctx.snapshot, ctx.now, req.minOverlapMonths)
  const direct = neighbors(graph, req.candidateId)
  if (!direct) {
    return { ...envelope("colleagues", ctx), found: false, candidateId: req.candidateId, colleagues: [], network: [] }
  }

  const depth = req.depth ?? 1
  return {
    ...envelope("colleagues", ctx),
    found: true,
    candidateId: req.candidateId,
    colleagues: direct.map((n) => ({ ...n, name: member(ctx.snapshot, n.candidateId).name })),
    network: depth > 1 ? neighborhood(graph, req.candidateId, depth) : [],
  }
}

function runPath(req: Extract<SearchRequest, { kind: "path" }>, ctx: SearchContext): PathResponse {
  const graph = graphFor(ctx.snapshot, ctx.now, req.minOverlapMonths)
  const found = ctx.snapshot.byId.has(req.from) && ctx.snapshot.byId.has(req.to)
  return { ...envelope("path", ctx), found, from: req.from, to: req.to, ...shortestPath(graph, req.from, req.to) }
}

function runNetworkAnalysis(
  req: Extract<SearchRequest, { kind: "network_analysis" }>,
  ctx: SearchContext
): NetworkAnalysisResponse {
  let graph: NetworkGraph
  let missing: string[] = []

  if (req.candidateIds) {
    const ids = new Set(req.candidateIds)
    missing = [...ids].filter((id) => !ctx.snapshot.byId.has(id)).sort()
    const subset = ctx.snapshot.candidates.filter((c) => ids.has(c.id))
    graph = checkedGraph(subset, buildEdges(subset, { now: ctx.now, minOverlapMonths: req.minOverlapMonths }))
  } else {
    graph = graphFor(ctx.snapshot, ctx.now, req.minOverlapMonths)
  }

  return {
    ...envelope("network_analysis", ctx),
    stats: networkStats(graph),
    components: connectedComponents(graph).filter((c) => c.length > 1),
    keyConnectors: keyConnectors(graph, req.limit ?? 10),
    missing,
  }
}

function runStats(req: Extract<SearchRequest, { kind: "stats" }>, ctx: SearchContext): StatsResponse {
  return {
    ...envelope("stats", ctx),
    pool: poolStatistics(ctx.snapshot.candidates, req.limit ?? 10),
    network: networkStats(graphFor(ctx.snapshot, ctx.now)),
  }
}

async function dispatch(request: SearchRequest, ctx: SearchContext): Promise<SearchResponse> {
  switch (request.kind) {
    case "similar":
      return runSimilar(request, ctx)
    case "structured":
      return { ...envelope("structured", ctx), ...runPage(request.query, request.page, request.pageSize, ctx) }
    case "natural":
      return runNatural(request, ctx)
    case "colleagues":
      return runColleagues(request, ctx)
    case "path":
      return runPath(request, ctx)
    case "network_analysis":
      return runNetworkAnalysis(request, ctx)
    case "stats":
      return runStats(request, ctx)
  }
}

/**
 * Runs one request against the snapshot in `ctx`. Validation problems come back as
 * `ok: false`; anything else is a defect and is rethrown after logging.
 */
export async function runSearch(request: SearchRequest, ctx: SearchContext): Promise<SearchResponse> {
  const started = Date.now()
  try {
    const out = await dispatch(request, ctx)
    logEvent("info", "search_done", {
      requestId: ctx.requestId,
      kind: request.kind,
      snapshotVersion: ctx.snapshot.version,
      provenance: out.ok && out.kind === "natural" ? out.provenance : undefined,
      latencyMs: Date.now() - started,
    })
    return out
  } catch (err) {
    if (err instanceof ValidationError) {
      return failure(request.kind, err)
    }
    logEvent("error", "search_error", {
      requestId: ctx.requestId,
      kind: request.kind,
      code: isSearchError(err) ? err.code : "internal_error",
      ...errorFields(err),
    })
    throw err
  }
}

export function failure(kind: SearchKind | null, err: ValidationError): SearchFailure {
  return { ok: false, kind, error: { code: err.code, message: err.message, field: err.field } }
}
