import express, { type Request, type Response, type NextFunction } from "express";
import crypto from "crypto";
import { ValidationError } from "../../../core/domain/errors";
import type { SnapshotStore } from "../../../core/domain/snapshot";
import type { QueryOracle } from "../../../core/llm/adapter";
import { failure, parseSearchRequest, runSearch, type SearchRequest, type SearchSettings } from "../../../src/engine/run_search";
import { errorFields, logEvent } from "../../../src/lib/log";

export type GatewayDeps = {
  store: SnapshotStore;
  oracle: QueryOracle | null;
  settings: SearchSettings;
  jsonBodyLimit?: string;
  clock?: () => string;
};

type Handler = (req: Request, res: Response) => Promise<void> | void;

// express 4 does not await handlers; route rejections to the error middleware
function route(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : "unknown";
}

function bodyErrorType(err: unknown): string | null {
  if (typeof err !== "object" || err === null || !("type" in err)) return null;
  return typeof err.type === "string" ? err.type : null;
}

export function createApp(deps: GatewayDeps) {
  const clock = deps.clock ?? (() => new Date().toISOString());
  const app = express();
  app.disable("x-powered-by");

  // Request ID first so body-parser failures still carry one
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") || crypto.randomUUID();
    res.locals.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  });

  app.use(express.json({ limit: deps.jsonBodyLimit ?? "6mb" }));

  app.get("/healthz", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  app.post(
    "/v1/resumes",
    route((req, res) => {
      const requestId = requestIdOf(res);
      const resumes: unknown = req.body?.resumes;
      if (!Array.isArray(resumes)) {
        res.status(400).json(failure(null, new ValidationError("resumes", "resumes must be an array")));
        return;
      }

      const report = deps.store.ingest(resumes, { now: clock() });

      logEvent("info", "ingest_done", {
        requestId,
        received: resumes.length,
        ingested: report.ingested.length,
        failed: report.failed.length,
        snapshotVersion: report.snapshot.version,
      });

      res.json({
        ok: true,
        ingested: report.ingested,
        failed: report.failed,
        snapshotVersion: report.snapshot.version,
      });
    })
  );

  app.delete(
    "/v1/resumes/:id",
    route((req, res) => {
      const { removed, snapshot } = deps.store.remove([req.params.id], clock());
      if (!removed.length) {
        res.status(404).json({
          ok: false,
          kind: null,
          error: { code: "not_found", message: `Candidate ${req.params.id} is not in the pool` },
        });
        return;
      }
      logEvent("info", "resume_removed", { requestId: requestIdOf(res), candidateId: req.params.id, snapshotVersion: snapshot.version });
      res.json({ ok: true, removed, snapshotVersion: snapshot.version });
    })
  );

  app.post(
    "/v1/search",
    route(async (req, res) => {
      const requestId = requestIdOf(res);

      let request: SearchRequest;
      try {
        request = parseSearchRequest(req.body);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        res.status(400).json(failure(null, err));
        return;
      }

      // One snapshot per request, captured before any await
      const out = await runSearch(request, {
        snapshot: deps.store.current(),
        oracle: deps.oracle,
        settings: deps.settings,
        now: clock(),
        requestId,
      });

      res.status(out.ok ? 200 : 400).json(out);
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = requestIdOf(res);
    const type = bodyErrorType(err);

    if (type === "entity.parse.failed") {
      res.status(400).json({ ok: false, kind: null, error: { code: "invalid_json", message: "Malformed JSON body" } });
      return;
    }
    if (type === "entity.too.large") {
      res.status(413).json({ ok: false, kind: null, error: { code: "payload_too_large", message: "Request body too large" } });
      return;
    }

    logEvent("error", "request_error", { requestId, ...errorFields(err) });
    res.status(500).json({
      ok: false,
      kind: null,
      error: { code: "internal_error", message: err instanceof Error ? err.message : "internal_error" },
      requestId,
    });
  });

  return app;
}
