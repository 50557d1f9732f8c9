// core/domain/network.ts
import type { Candidate, Experience } from "./candidate";
import { daysBetween, daysToMonths, isoDay } from "./dates";
import { InternalInconsistency } from "./errors";

export type ColleagueEdge = {
  key: string; // `${a}|${b}|${organizationKey}`
  a: string; // a < b
  b: string;
  organizationKey: string;
  organization: string;
  department: string | null; // shared department key, advisory only
  overlap: { start: string; end: string | null }; // half-open; end null = still ongoing
  overlapDays: number;
  overlapMonths: number;
  relationship: "current" | "former";
};

export type BuildEdgesOptions = {
  now: string;
  minOverlapMonths?: number;
};

export type Adjacent = { neighbor: string; edge: ColleagueEdge };

export type NetworkGraph = {
  nodes: readonly string[];
  adjacency: ReadonlyMap<string, readonly Adjacent[]>;
  edges: readonly ColleagueEdge[];
};

export type PathResult = { reachable: true; path: string[] } | { reachable: false };

type Stint = { candidateId: string; exp: Experience & { start: string; organizationKey: string } };

function cmp(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

function groupByOrganization(pool: readonly Candidate[]): Map<string, Stint[]> {
  const groups = new Map<string, Stint[]>();
  for (const c of pool) {
    for (const exp of c.experiences) {
      if (!exp.organizationKey || !exp.start) continue;
      const stint: Stint = { candidateId: c.id, exp: { ...exp, start: exp.start, organizationKey: exp.organizationKey } };
      const group = groups.get(exp.organizationKey);
      if (group) group.push(stint);
      else groups.set(exp.organizationKey, [stint]);
    }
  }
  return groups;
}

/** Overlap of two stints, or null. Same-day touching boundaries do not overlap. */
export function stintOverlap(x: Stint, y: Stint, today: string): Omit<ColleagueEdge, "key" | "a" | "b" | "organization"> | null {
  const start = x.exp.start > y.exp.start ? x.exp.start : y.exp.start;
  const endX = x.exp.end ?? today;
  const endY = y.exp.end ?? today;
  const effectiveEnd = endX < endY ? endX : endY;
  if (!(start < effectiveEnd)) return null;

  const bothOpen = x.exp.end === null && y.exp.end === null;
  const overlapDays = daysBetween(start, effectiveEnd);
  const departmentMatch = x.exp.departmentKey !== null && x.exp.departmentKey === y.exp.departmentKey;

  return {
    organizationKey: x.exp.organizationKey,
    department: departmentMatch ? x.exp.departmentKey : null,
    overlap: { start, end: bothOpen ? null : effectiveEnd },
    overlapDays,
    overlapMonths: daysToMonths(overlapDays),
    relationship: bothOpen ? "current" : "former",
  };
}

function betterEdge(a: ColleagueEdge, b: ColleagueEdge): ColleagueEdge {
  if (a.overlapDays !== b.overlapDays) return a.overlapDays > b.overlapDays ? a : b;
  if (a.overlap.start !== b.overlap.start) return a.overlap.start < b.overlap.start ? a : b;
  if ((a.department === null) !== (b.department === null)) return a.department !== null ? a : b;
  return a;
}

/** Pairwise comparison inside one organization group. Groups are independent partitions. */
function edgesForGroup(stints: readonly Stint[], today: string): ColleagueEdge[] {
  const best = new Map<string, ColleagueEdge>();
  for (let i = 0; i < stints.length; i++) {
    for (let j = i + 1; j < stints.length; j++) {
      const [x, y] = cmp(stints[i].candidateId, stints[j].candidateId) <= 0 ? [stints[i], stints[j]] : [stints[j], stints[i]];
      if (x.candidateId === y.candidateId) continue;

      const overlap = stintOverlap(x, y, today);
      if (!overlap) continue;

      const key = `${x.candidateId}|${y.candidateId}|${overlap.organizationKey}`;
      const edge: ColleagueEdge = {
        key,
        a: x.candidateId,
        b: y.candidateId,
        organization: x.exp.organization ?? overlap.organizationKey,
        ...overlap,
      };
      const prev = best.get(key);
      best.set(key, prev ? betterEdge(prev, edge) : edge);
    }
  }
  return [...best.values()];
}

/**
 * Colleague edges: same organization key, overlapping intervals (open ends run to `now`).
 * Only experiences sharing an organization key are ever compared.
 */
export function buildEdges(pool: readonly Candidate[], opts: BuildEdgesOptions): ColleagueEdge[] {
  const today = isoDay(opts.now);
  const minMonths = opts.minOverlapMonths ?? 0;

  const edges: ColleagueEdge[] = [];
  for (const stints of groupByOrganization(pool).values()) {
    for (const e of edgesForGroup(stints, today)) {
      if (e.overlapMonths >= minMonths) edges.push(e);
    }
  }
  return edges.sort((x, y) => cmp(x.a, y.a) || cmp(x.b, y.b) || cmp(x.organizationKey, y.organizationKey));
}

export function buildGraph(pool: readonly Candidate[], edges: readonly ColleagueEdge[]): NetworkGraph {
  const nodes = pool.map((c) => c.id).sort(cmp);
  const lists = new Map<string, Adjacent[]>(nodes.map((id) => [id, []]));

  for (const edge of edges) {
    const fromA = lists.get(edge.a);
    const fromB = lists.get(edge.b);
    if (!fromA || !fromB) throw new InternalInconsistency(`Edge ${edge.key} references a candidate outside the pool`);
    fromA.push({ neighbor: edge.b, edge });
    fromB.push({ neighbor: edge.a, edge });
  }
  for (const list of lists.values()) {
    list.sort((x, y) => cmp(x.neighbor, y.neighbor) || cmp(x.edge.organizationKey, y.edge.organizationKey));
  }

  return { nodes, adjacency: lists, edges };
}

export function assertSymmetric(graph: NetworkGraph): void {
  for (const [id, list] of graph.adjacency) {
    for (const { neighbor, edge } of list) {
      const back = graph.adjacency.get(neighbor)?.find((adj) => adj.edge.key === edge.key);
      if (
        !back ||
        back.neighbor !== id ||
        back.edge.overlap.start !== edge.overlap.start ||
        back.edge.overlap.end !== edge.overlap.end
      ) {
        throw new InternalInconsistency(`Edge ${edge.key} is not symmetric between ${id} and ${neighbor}`);
      }
    }
  }
}

export function distinctNeighbors(graph: NetworkGraph, id: string): string[] {
  const list = graph.adjacency.get(id) ?? [];
  return [...new Set(list.map((adj) => adj.neighbor))];
}

/** Each distinct colleague with every edge shared with them, or null if `id` is unknown. */
export function neighbors(graph: NetworkGraph, id: string): Array<{ candidateId: string; edges: ColleagueEdge[] }> | null {
  const list = graph.adjacency.get(id);
  if (!list) return null;
  const out: Array<{ candidateId: string; edges: ColleagueEdge[] }> = [];
  for (const { neighbor, edge } of list) {
    const last = out[out.length - 1];
    if (last && last.candidateId === neighbor) last.edges.push(edge);
    else out.push({ candidateId: neighbor, edges: [edge] });
  }
  return out;
}

/** Unweighted BFS; neighbors are visited in id order so the path is deterministic. */
export function shortestPath(graph: NetworkGraph, from: string, to: string): PathResult {
  if (!graph.adjacency.has(from) || !graph.adjacency.has(to)) return { reachable: false };
  if (from === to) return { reachable: true, path: [from] };

  const prev = new Map<string, string>([[from, from]]);
  let frontier = [from];
  while (frontier.length) {
    const next: string[] = [];
    for (const id of frontier) {
      for (const n of distinctNeighbors(graph, id)) {
        if (prev.has(n)) continue;
        prev.set(n, id);
        if (n === to) {
          const path = [to];
          let cur = to;
          while (cur !== from) {
            const p = prev.get(cur);
            if (p === undefined) throw new InternalInconsistency(`Broken BFS chain at ${cur}`);
            path.unshift(p);
            cur = p;
          }
          return { reachable: true, path };
        }
        next.push(n);
      }
    }
    frontier = next;
  }
  return { reachable: false };
}

/** Everyone within `depth` hops of `id` (excluding `id`), nearest first. */
export function neighborhood(graph: NetworkGraph, id: string, depth: number): Array<{ candidateId: string; distance: number }> {
  if (!graph.adjacency.has(id)) return [];
  const seen = new Set([id]);
  const out: Array<{ candidateId: string; distance: number }> = [];
  let frontier = [id];
  for (let d = 1; d <= depth && frontier.length; d++) {
    const next: string[] = [];
    for (const cur of frontier) {
      for (const n of distinctNeighbors(graph, cur)) {
        if (seen.has(n)) continue;
        seen.add(n);
        next.push(n);
      }
    }
    next.sort(cmp);
    for (const n of next) out.push({ candidateId: n, distance: d });
    frontier = next;
  }
  return out;
}

export function connectedComponents(graph: NetworkGraph): string[][] {
  const seen = new Set<string>();
  const components: string[][] = [];
  for (const start of graph.nodes) {
    if (seen.has(start)) continue;
    seen.add(start);
    const members = [start];
    for (let i = 0; i < members.length; i++) {
      for (const n of distinctNeighbors(graph, members[i])) {
        if (seen.has(n)) continue;
        seen.add(n);
        members.push(n);
      }
    }
    components.push(members.sort(cmp));
  }
  return components.sort((x, y) => y.length - x.length || cmp(x[0], y[0]));
}

export function keyConnectors(graph: NetworkGraph, limit: number): Array<{ candidateId: string; connections: number }> {
  return graph.nodes
    .map((id) => ({ candidateId: id, connections: distinctNeighbors(graph, id).length }))
    .filter((c) => c.connections > 0)
    .sort((x, y) => y.connections - x.connections || cmp(x.candidateId, y.candidateId))
    .slice(0, Math.max(0, limit));
}

export type NetworkStats = {
  candidates: number;
  edges: number;
  averageDegree: number;
  isolated: number;
  components: number;
};

export function networkStats(graph: NetworkGraph): NetworkStats {
  const n = graph.nodes.length;
  const isolated = graph.nodes.filter((id) => (graph.adjacency.get(id)?.length ?? 0) === 0).length;
  return {
    candidates: n,
    edges: graph.edges.length,
    averageDegree: n === 0 ? 0 : Math.round(((2 * graph.edges.length) / n) * 100) / 100,
    isolated,
    components: connectedComponents(graph).length,
  };
}
