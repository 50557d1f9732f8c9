import type { Server } from "node:http";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { SnapshotStore, type PoolSnapshot } from "../../../core/domain/snapshot";
import { NOW, scenarioPool, scenarioResumes } from "../../../core/testing/pool";
import type { SearchSettings } from "../../../src/engine/run_search";
import { createApp } from "./app";

const settings: SearchSettings = {
  oracleTimeoutMs: 100,
  maxPageSize: 100,
  defaultPageSize: 20,
  defaultSimilarLimit: 20,
  maxSimilarLimit: 100,
};

let server: Server;
let base: string;
let store: SnapshotStore;

async function start(s: SnapshotStore) {
  const app = createApp({ store: s, oracle: null, settings, clock: () => NOW });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("no port");
  base = `http://127.0.0.1:${addr.port}`;
}

function post(path: string, body: unknown) {
  return fetch(`${base}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

beforeEach(async () => {
  store = new SnapshotStore([], NOW);
  await start(store);
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe("search gateway", () => {
  it("answers health checks with a request id", async () => {
    const res = await fetch(`${base}/healthz`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("ok");
    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("echoes a caller-supplied request id", async () => {
    const res = await fetch(`${base}/healthz`, { headers: { "x-request-id": "req-123" } });
    expect(res.headers.get("x-request-id")).toBe("req-123");
  });

  it("ingests resumes and reports failures per record", async () => {
    const res = await post("/v1/resumes", { resumes: [...scenarioResumes(), { sections: {} }] });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      ingested: ["A", "B", "C"],
      failed: [
        { index: 3, id: null, code: "normalization_failed", error: "Resume has no name and no parseable experience" },
      ],
      snapshotVersion: 2,
    });
  });

  it("rejects an ingest body without a resumes array", async () => {
    const res = await post("/v1/resumes", { resume: [] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      kind: null,
      error: { code: "invalid_query", message: "resumes must be an array", field: "resumes" },
    });
  });

  it("runs searches against the current snapshot", async () => {
    await post("/v1/resumes", { resumes: scenarioResumes() });
    const res = await post("/v1/search", { kind: "similar", candidateId: "A", limit: 1 });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, snapshotVersion: 2, results: [{ candidateId: "B", name: "Ben" }] });
  });

  it("returns 400 for invalid search requests", async () => {
    const res = await post("/v1/search", { kind: "bogus" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, kind: null, error: { code: "invalid_query", field: "kind" } });

    const empty = await post("/v1/search", { kind: "natural", text: " " });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({ ok: false, kind: "natural", error: { field: "text" } });
  });

  it("returns 400 for malformed JSON", async () => {
    const res = await fetch(`${base}/v1/search`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{oops",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, error: { code: "invalid_json" } });
    expect(res.headers.get("x-request-id")).not.toBeNull();
  });

  it("removes a resume and 404s the second time", async () => {
    await post("/v1/resumes", { resumes: scenarioResumes() });
    const res = await fetch(`${base}/v1/resumes/A`, { method: "DELETE" });
    expect(await res.json()).toEqual({ ok: true, removed: ["A"], snapshotVersion: 3 });
    const again = await fetch(`${base}/v1/resumes/A`, { method: "DELETE" });
    expect(again.status).toBe(404);
  });
});

describe("search gateway defects", () => {
  it("reports an engine defect as a 500", async () => {
    const [a] = scenarioPool();
    const broken: PoolSnapshot = { version: 7, createdAt: NOW, candidates: [a], byId: new Map() };
    class BrokenStore extends SnapshotStore {
      current(): PoolSnapshot {
        return broken;
      }
    }
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await start(new BrokenStore([], NOW));

    const res = await post("/v1/search", { kind: "structured", query: {} });
    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ ok: false, error: { code: "internal_error" } });
  });
});
