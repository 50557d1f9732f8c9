import { describe, it, expect } from "vitest";
import { NOW, resume, scenarioResumes } from "../testing/pool";
import { SnapshotStore } from "./snapshot";

describe("SnapshotStore", () => {
  it("starts empty at version 1", () => {
    const store = new SnapshotStore([], NOW);
    expect(store.current().version).toBe(1);
    expect(store.current().candidates).toEqual([]);
  });

  it("ingests a batch and publishes a new version", () => {
    const store = new SnapshotStore([], NOW);
    const report = store.ingest(scenarioResumes(), { now: NOW });
    expect(report.ingested).toEqual(["A", "B", "C"]);
    expect(report.failed).toEqual([]);
    expect(report.snapshot.version).toBe(2);
    expect(report.snapshot.candidates.map((c) => c.id)).toEqual(["A", "B", "C"]);
    expect(report.snapshot.byId.get("B")?.name).toBe("Ben");
  });

  it("isolates records that cannot be normalized", () => {
    const store = new SnapshotStore([], NOW);
    const report = store.ingest([{ id: "bad", sections: { Hobbies: "chess" } }, ...scenarioResumes(), 42], { now: NOW });
    expect(report.ingested).toEqual(["A", "B", "C"]);
    expect(report.failed).toEqual([
      { index: 0, id: "bad", code: "normalization_failed", error: "Resume has no name and no parseable experience" },
      { index: 4, id: null, code: "normalization_failed", error: "Resume input must be an object of sections" },
    ]);
  });

  it("does not publish when nothing was ingested", () => {
    const store = new SnapshotStore([], NOW);
    const before = store.current();
    store.ingest([null], { now: NOW });
    expect(store.current()).toBe(before);
  });

  it("replaces a re-ingested record wholesale", () => {
    const store = new SnapshotStore([], NOW);
    store.ingest(scenarioResumes(), { now: NOW });
    store.ingest([resume("A", "Ada Lovelace", [{ org: "Initech", dates: "2022–2024" }])], { now: NOW });
    const a = store.current().byId.get("A");
    expect(a?.name).toBe("Ada Lovelace");
    expect(a?.experiences.map((e) => e.organizationKey)).toEqual(["initech"]);
    expect(store.current().candidates).toHaveLength(3);
  });

  it("leaves earlier snapshots untouched", () => {
    const store = new SnapshotStore([], NOW);
    const first = store.ingest(scenarioResumes(), { now: NOW }).snapshot;
    store.remove(["C"], NOW);
    expect(first.candidates.map((c) => c.id)).toEqual(["A", "B", "C"]);
    expect(store.current().candidates.map((c) => c.id)).toEqual(["A", "B"]);
    expect(store.current().version).toBe(3);
  });

  it("freezes published candidates", () => {
    const store = new SnapshotStore([], NOW);
    const snap = store.ingest(scenarioResumes(), { now: NOW }).snapshot;
    expect(Object.isFrozen(snap.candidates)).toBe(true);
    expect(Object.isFrozen(snap.candidates[0])).toBe(true);
    expect(Object.isFrozen(snap.candidates[0].experiences[0])).toBe(true);
  });

  it("reports only ids that were present on removal", () => {
    const store = new SnapshotStore([], NOW);
    store.ingest(scenarioResumes(), { now: NOW });
    const out = store.remove(["A", "missing"], NOW);
    expect(out.removed).toEqual(["A"]);
    expect(store.remove(["missing"], NOW).snapshot.version).toBe(out.snapshot.version);
  });
});
