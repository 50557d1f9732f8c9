import { SnapshotStore } from "../../../core/domain/snapshot";
import { OpenAIQueryOracle } from "../../../infra/openai-query-oracle";
import { loadConfig } from "../../../src/config";
import { candidateSourceFor } from "../../../src/lib/candidate-source";
import { errorFields, logEvent } from "../../../src/lib/log";
import { createApp } from "./app";

async function main() {
  const config = loadConfig();
  const now = new Date().toISOString();

  const store = new SnapshotStore([], now);
  const seed = await candidateSourceFor(config.seedResumesPath).load();
  if (seed.length) {
    const report = store.ingest(seed, { now });
    logEvent("info", "seed_loaded", {
      path: config.seedResumesPath,
      ingested: report.ingested.length,
      failed: report.failed.length,
      snapshotVersion: report.snapshot.version,
    });
    for (const f of report.failed) logEvent("warn", "seed_record_failed", { index: f.index, id: f.id, error: f.error });
  }

  const oracle = config.openai.apiKey
    ? new OpenAIQueryOracle({
        apiKey: config.openai.apiKey,
        baseUrl: config.openai.baseUrl,
        model: config.openai.model,
        timeoutMs: config.oracleTimeoutMs,
        maxAttempts: config.openai.maxAttempts,
      })
    : null;
  if (!oracle) logEvent("warn", "oracle_disabled", { reason: "OPENAI_API_KEY missing; natural queries use keyword fallback" });

  const app = createApp({ store, oracle, settings: config, jsonBodyLimit: config.jsonBodyLimit });
  app.listen(config.port, () => logEvent("info", "search_gateway_listening", { port: config.port }));
}

main().catch((err: unknown) => {
  logEvent("error", "boot_failed", errorFields(err));
  process.exit(1);
});
