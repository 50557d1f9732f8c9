import { describe, it, expect, vi } from "vitest"
import { InternalInconsistency, ValidationError } from "../../core/domain/errors"
import { buildEdges, buildGraph } from "../../core/domain/network"
import { SnapshotStore, type PoolSnapshot } from "../../core/domain/snapshot"
import type { QueryOracle } from "../../core/llm/adapter"
import { NOW, scenarioPool, scenarioResumes } from "../../core/testing/pool"
import { ENGINE_VERSION } from "../../core/versioning/versions"
import { graphFor, parseSearchRequest, runSearch, type SearchContext, type SearchSettings } from "./run_search"

const settings: SearchSettings = {
  oracleTimeoutMs: 100,
  maxPageSize: 100,
  defaultPageSize: 20,
  defaultSimilarLimit: 20,
  maxSimilarLimit: 100,
}

function context(oracle: QueryOracle | null = null): SearchContext {
  const store = new SnapshotStore([], NOW)
  store.ingest(scenarioResumes(), { now: NOW })
  return { snapshot: store.current(), oracle, settings, now: NOW, requestId: "req-test" }
}

function fieldOf(fn: () => unknown): string | null {
  try {
    fn()
    return null
  } catch (err) {
    return err instanceof ValidationError ? err.field : "unexpected"
  }
}

describe("parseSearchRequest", () => {
  it("validates the kind and its fields", () => {
    expect(fieldOf(() => parseSearchRequest([]))).toBe("body")
    expect(fieldOf(() => parseSearchRequest({ kind: "everything" }))).toBe("kind")
    expect(fieldOf(() => parseSearchRequest({ kind: "similar" }))).toBe("candidateId")
    expect(fieldOf(() => parseSearchRequest({ kind: "similar", candidateId: "A", extra: 1 }))).toBe("extra")
    expect(fieldOf(() => parseSearchRequest({ kind: "colleagues", candidateId: "A", depth: 4 }))).toBe("depth")
    expect(fieldOf(() => parseSearchRequest({ kind: "similar", candidateId: "A", minScore: 2 }))).toBe("minScore")
    expect(fieldOf(() => parseSearchRequest({ kind: "structured", query: { skills: [1] } }))).toBe("skills[0]")
    expect(fieldOf(() => parseSearchRequest({ kind: "network_analysis", candidateIds: ["A", ""] }))).toBe("candidateIds[1]")
  })

  it("returns a typed request with a validated query", () => {
    expect(parseSearchRequest({ kind: "structured", query: { skills: ["JS"] }, page: 1 })).toEqual({
      kind: "structured",
      query: { skills: ["javascript"] },
      page: 1,
    })
    expect(parseSearchRequest({ kind: "path", from: " A ", to: "B" })).toEqual({ kind: "path", from: "A", to: "B" })
  })
})

describe("runSearch", () => {
  it("ranks similar candidates and names them", async () => {
    const out = await runSearch({ kind: "similar", candidateId: "A" }, context())
    expect(out).toMatchObject({ ok: true, kind: "similar", found: true, engineVersion: ENGINE_VERSION, snapshotVersion: 2 })
    if (!out.ok || out.kind !== "similar") throw new Error("unexpected response")
    expect(out.results.map((r) => [r.candidateId, r.name, r.score])).toEqual([
      ["B", "Ben", 0.7],
      ["C", "Cy", 0.2],
    ])
  })

  it("reports an unknown reference as not found", async () => {
    const out = await runSearch({ kind: "similar", candidateId: "nobody" }, context())
    expect(out).toMatchObject({ ok: true, found: false, referenceId: "nobody", results: [] })
  })

  it("runs a structured query", async () => {
    const out = await runSearch({ kind: "structured", query: { skills: ["python"] } }, context())
    expect(out).toMatchObject({ ok: true, kind: "structured", total: 2, page: 0, pageSize: 20, totalPages: 1 })
    if (!out.ok || out.kind !== "structured") throw new Error("unexpected response")
    expect(out.items.map((i) => [i.candidateId, i.name, i.seniority])).toEqual([
      ["A", "Ada", "mid"],
      ["B", "Ben", "mid"],
    ])
  })

  it("translates natural language without an oracle", async () => {
    const out = await runSearch({ kind: "natural", text: "Find engineers at Acme" }, context())
    expect(out).toMatchObject({
      ok: true,
      kind: "natural",
      provenance: "fallback",
      oracleError: "No oracle configured",
      query: { organization: "Acme", terms: ["engineer"] },
      total: 2,
    })
  })

  it("prefers the oracle when it answers", async () => {
    const oracle: QueryOracle = {
      interpretQuery: vi.fn(async () => ({ interpretation: { skills: ["excel"] }, modelUsed: "gpt-4o-mini" as const })),
    }
    const out = await runSearch({ kind: "natural", text: "spreadsheet people" }, context(oracle))
    expect(out).toMatchObject({ ok: true, provenance: "oracle", query: { skills: ["excel"] }, total: 1 })
  })

  it("returns validation failures as ok: false", async () => {
    const out = await runSearch({ kind: "natural", text: "   " }, context())
    expect(out).toEqual({
      ok: false,
      kind: "natural",
      error: { code: "invalid_query", message: "Search text must not be empty", field: "text" },
    })
  })

  it("lists colleagues and the wider network", async () => {
    const out = await runSearch({ kind: "colleagues", candidateId: "A", depth: 2 }, context())
    if (!out.ok || out.kind !== "colleagues") throw new Error("unexpected response")
    expect(out.found).toBe(true)
    expect(out.colleagues.map((c) => [c.candidateId, c.name, c.edges.length])).toEqual([["B", "Ben", 1]])
    expect(out.network).toEqual([{ candidateId: "B", distance: 1 }])

    const lonely = await runSearch({ kind: "colleagues", candidateId: "C" }, context())
    expect(lonely).toMatchObject({ ok: true, found: true, colleagues: [], network: [] })

    const missing = await runSearch({ kind: "colleagues", candidateId: "nobody" }, context())
    expect(missing).toMatchObject({ ok: true, found: false, colleagues: [] })
  })

  it("finds paths between candidates", async () => {
    const ctx = context()
    expect(await runSearch({ kind: "path", from: "A", to: "B" }, ctx)).toMatchObject({ found: true, reachable: true, path: ["A", "B"] })
    expect(await runSearch({ kind: "path", from: "A", to: "C" }, ctx)).toMatchObject({ found: true, reachable: false })
    expect(await runSearch({ kind: "path", from: "A", to: "nobody" }, ctx)).toMatchObject({ found: false, reachable: false })
  })

  it("analyzes the whole network or a subset", async () => {
    const ctx = context()
    const whole = await runSearch({ kind: "network_analysis" }, ctx)
    expect(whole).toMatchObject({
      stats: { candidates: 3, edges: 1, averageDegree: 0.67, isolated: 1, components: 2 },
      components: [["A", "B"]],
      keyConnectors: [
        { candidateId: "A", connections: 1 },
        { candidateId: "B", connections: 1 },
      ],
      missing: [],
    })

    const subset = await runSearch({ kind: "network_analysis", candidateIds: ["A", "C", "nobody"] }, ctx)
    expect(subset).toMatchObject({
      stats: { candidates: 2, edges: 0, averageDegree: 0, isolated: 2, components: 2 },
      components: [],
      keyConnectors: [],
      missing: ["nobody"],
    })
  })

  it("summarizes the pool", async () => {
    const out = await runSearch({ kind: "stats" }, context())
    if (!out.ok || out.kind !== "stats") throw new Error("unexpected response")
    expect(out.pool).toEqual({
      candidates: 3,
      uniqueOrganizations: 2,
      uniqueDepartments: 2,
      uniqueSkills: 4,
      averageExperienceYears: 2,
      seniority: { junior: 0, mid: 3, senior: 0, lead: 0 },
      topSkills: [
        { value: "python", count: 2 },
        { value: "excel", count: 1 },
        { value: "go", count: 1 },
        { value: "sql", count: 1 },
      ],
      topOrganizations: [
        { value: "acme", count: 2 },
        { value: "globex", count: 1 },
      ],
      topDepartments: [
        { value: "engineering", count: 2 },
        { value: "sales", count: 1 },
      ],
    })
    expect(out.network.edges).toBe(1)
  })

  it("memoizes the graph per snapshot without changing results", () => {
    const { snapshot } = context()
    const first = graphFor(snapshot, NOW)
    expect(graphFor(snapshot, NOW)).toBe(first)
    const pool = scenarioPool()
    expect(first.edges).toEqual(buildGraph(pool, buildEdges(pool, { now: NOW })).edges)
  })

  it("filters the memoized graph by threshold without keeping the result", () => {
    const { snapshot } = context()
    const first = graphFor(snapshot, NOW)
    const strict = graphFor(snapshot, NOW, 13)
    expect(strict.edges).toEqual([])
    expect(graphFor(snapshot, NOW, 13)).not.toBe(strict)
    expect(graphFor(snapshot, NOW, 12).edges).toEqual(buildEdges(scenarioPool(), { now: NOW, minOverlapMonths: 12 }))
    expect(graphFor(snapshot, NOW)).toBe(first)
  })

  it("replaces the memoized graph when the day changes", () => {
    const { snapshot } = context()
    const first = graphFor(snapshot, NOW)
    const nextDay = graphFor(snapshot, "2026-10-19T00:00:00Z")
    expect(nextDay).not.toBe(first)
    expect(graphFor(snapshot, "2026-10-19T08:00:00Z")).toBe(nextDay)
    expect(graphFor(snapshot, NOW)).not.toBe(first)
  })

  it("rethrows defects instead of reporting them", async () => {
    const [a] = scenarioPool()
    const broken: PoolSnapshot = { version: 9, createdAt: NOW, candidates: [a], byId: new Map() }
    await expect(runSearch({ kind: "structured", query: {} }, { ...context(), snapshot: broken })).rejects.toBeInstanceOf(
      InternalInconsistency
    )
  })
})
