// core/domain/snapshot.ts
import type { Candidate } from "./candidate";
import { errorMessage, NormalizationError } from "./errors";
import type { NormalizeOptions } from "./normalize";
import { normalizeResume } from "./normalize";

export type PoolSnapshot = {
  readonly version: number;
  readonly createdAt: string;
  readonly candidates: readonly Candidate[]; // sorted by id
  readonly byId: ReadonlyMap<string, Candidate>;
};

export type IngestFailure = {
  index: number;
  id: string | null;
  code: "normalization_failed";
  error: string;
};

export type IngestReport = {
  ingested: string[];
  failed: IngestFailure[];
  snapshot: PoolSnapshot;
};

function freezeCandidate(c: Candidate): Candidate {
  for (const e of c.experiences) {
    Object.freeze(e.keywords);
    Object.freeze(e.colleagues);
    Object.freeze(e);
  }
  Object.freeze(c.experiences);
  Object.freeze(c.skills);
  Object.freeze(c.extraSections);
  Object.freeze(c.warnings);
  return Object.freeze(c);
}

export function createSnapshot(candidates: Iterable<Candidate>, version: number, createdAt: string): PoolSnapshot {
  const byId = new Map<string, Candidate>();
  for (const c of candidates) byId.set(c.id, Object.isFrozen(c) ? c : freezeCandidate(c));
  const sorted = [...byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return Object.freeze({ version, createdAt, candidates: Object.freeze(sorted), byId });
}

function rawId(raw: unknown): string | null {
  if (typeof raw !== "object" || raw === null || !("id" in raw)) return null;
  const id = raw.id;
  return typeof id === "string" || typeof id === "number" ? String(id) : null;
}

/**
 * Holds the published pool. Publishing swaps one reference; a request that
 * captured `current()` keeps reading that snapshot no matter what is ingested later.
 */
export class SnapshotStore {
  private snapshot: PoolSnapshot;

  constructor(initial: Iterable<Candidate> = [], now: string = new Date().toISOString()) {
    this.snapshot = createSnapshot(initial, 1, now);
  }

  current(): PoolSnapshot {
    return this.snapshot;
  }

  /** Normalizes each raw resume on its own; one bad record never aborts the batch. */
  ingest(raws: readonly unknown[], opts: NormalizeOptions): IngestReport {
    const ingested: Candidate[] = [];
    const failed: IngestFailure[] = [];

    raws.forEach((raw, index) => {
      try {
        ingested.push(normalizeResume(raw, opts));
      } catch (err) {
        if (!(err instanceof NormalizationError)) throw err;
        failed.push({ index, id: rawId(raw), code: err.code, error: errorMessage(err) });
      }
    });

    if (ingested.length) {
      const next = new Map(this.snapshot.byId);
      for (const c of ingested) next.set(c.id, c); // wholesale replace on re-parse
      this.publish(next.values(), opts.now);
    }

    return { ingested: ingested.map((c) => c.id), failed, snapshot: this.snapshot };
  }

  remove(ids: readonly string[], now: string): { removed: string[]; snapshot: PoolSnapshot } {
    const removed = ids.filter((id) => this.snapshot.byId.has(id));
    if (removed.length) {
      const drop = new Set(removed);
      this.publish(this.snapshot.candidates.filter((c) => !drop.has(c.id)), now);
    }
    return { removed, snapshot: this.snapshot };
  }

  private publish(candidates: Iterable<Candidate>, now: string) {
    this.snapshot = createSnapshot(candidates, this.snapshot.version + 1, now);
  }
}
