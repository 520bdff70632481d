import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConversationalAdvisor } from "../../src/advisor/advisor.js";
import { BatchAnalyzer } from "../../src/analysis/batch.js";
import { AnalysisPipeline } from "../../src/analysis/pipeline.js";
import { SentinelServer } from "../../src/gateway/server.js";
import { silentLogger } from "../../src/logging/logger.js";
import { HashingEmbedder } from "../../src/memory/embedder.js";
import { VectorIndex } from "../../src/memory/vector-index.js";
import { SentinelDB } from "../../src/vault/db.js";
import { IncidentStore } from "../../src/vault/incidents.js";
import { makePolicy, makeRawLog, makeRequestLog, makeResult } from "../helpers/fixtures.js";
import { makeAssessment, StubReasoningClient } from "../helpers/stubs.js";

function post(server: SentinelServer, path: string, body: unknown): Promise<Response> {
  return Promise.resolve(
    server.app.request(path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    }),
  );
}

describe("SentinelServer", () => {
  let db: SentinelDB;
  let incidents: IncidentStore;
  let reasoning: StubReasoningClient;
  let memory: VectorIndex;
  let server: SentinelServer;

  function build(store: IncidentStore | null): SentinelServer {
    const logger = silentLogger();
    const policy = makePolicy();
    const pipeline = new AnalysisPipeline({ policy, reasoning, timeoutMs: 200, logger });
    const analyzer = new BatchAnalyzer({ pipeline, logger, concurrency: 2, memory });
    const advisor = new ConversationalAdvisor({
      memory,
      reasoning,
      policy,
      config: { topK: 3, historyTurns: 10 },
      timeoutMs: 200,
      logger,
    });
    return new SentinelServer(
      { analyzer, advisor, memory, incidents: store, logger, version: "0.0.0-test" },
      0,
      "127.0.0.1",
    );
  }

  beforeEach(() => {
    db = new SentinelDB(":memory:");
    incidents = new IncidentStore(db);
    reasoning = new StubReasoningClient(async () => makeAssessment({ score: 80, reasoning: "IBAN shared" }));
    memory = new VectorIndex(new HashingEmbedder(64));
    server = build(incidents);
  });

  afterEach(() => {
    db.close();
  });

  it("reports health", async () => {
    const res = await server.app.request("/health");
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      status: "ok",
      version: "0.0.0-test",
      memory: { records: 0, dimension: 64 },
      incidents: true,
    });
  });

  it("analyzes a batch of records", async () => {
    const res = await post(server, "/analyze", {
      records: [makeRawLog(), { user_id: "broken" }],
    });

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      results: [{ result: { category: "HIGH_RISK", score: 80, provenance: "reasoned" } }],
      errors: [{ index: 1, code: "RECORD_PARSE" }],
      cancelled: false,
      metrics: { total: 1, totalThreats: 1 },
    });
    expect(memory.size).toBe(1);
  });

  it("rejects a malformed analyze body", async () => {
    const res = await post(server, "/analyze", { records: "nope" });
    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ error: "invalid body", issues: ["records: Expected array, received string"] });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await server.app.request("/analyze", { method: "POST", body: "{" });
    expect(res.status).toBe(400);
  });

  it("answers advisor queries", async () => {
    const res = await post(server, "/advisor/s1/query", { text: "any incidents today?" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ reply: "stub reply" });
    expect(reasoning.converseCalls).toHaveLength(1);
  });

  it("rejects an empty advisor query", async () => {
    const res = await post(server, "/advisor/s1/query", { text: "   " });
    expect(res.status).toBe(400);
  });

  it("attaches a record from the last batch as advisor context", async () => {
    const log = makeRequestLog();
    await post(server, "/analyze", { records: [makeRawLog()] });

    const res = await post(server, "/advisor/s1/context", { recordId: log.id });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ attached: log.id, category: "HIGH_RISK" });

    await post(server, "/advisor/s1/query", { text: "what happened?" });
    expect(reasoning.converseCalls[0]?.[0]?.content).toContain(
      "LATEST ANALYSIS:\nCategory: HIGH_RISK (score 80, reasoned, high confidence)",
    );
  });

  it("returns 404 for a record that was not in the last batch", async () => {
    const res = await post(server, "/advisor/s1/context", { recordId: "missing" });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "unknown record missing" });
  });

  it("lists incidents with filters", async () => {
    const open = incidents.open(makeRequestLog({ user_id: "a" }), makeResult({ category: "CRITICAL" }));
    const other = incidents.open(makeRequestLog({ user_id: "b" }), makeResult({ category: "CRITICAL" }));
    incidents.markUnresolved(other.id, "alert security: down");

    const all = await server.app.request("/incidents");
    const allBody: unknown = await all.json();
    expect(allBody).toMatchObject({ incidents: [{ id: other.id }, { id: open.id }] });

    const filtered = await server.app.request("/incidents?status=unresolved&limit=5");
    const filteredBody: unknown = await filtered.json();
    expect(filteredBody).toMatchObject({
      incidents: [{ id: other.id, status: "unresolved", failureReason: "alert security: down" }],
    });
  });

  it("rejects an invalid incident filter", async () => {
    const res = await server.app.request("/incidents?status=pending");
    expect(res.status).toBe(400);
  });

  it("returns 503 without an incident store", async () => {
    const res = await build(null).app.request("/incidents");
    expect(res.status).toBe(503);
  });

  it("turns unexpected errors into 500", async () => {
    // Embeddings of the wrong length make retrieval throw
    const broken = new VectorIndex({ dimension: 8, embed: () => [1] });
    const logger = silentLogger();
    const pipeline = new AnalysisPipeline({ policy: makePolicy(), reasoning, timeoutMs: 100, logger });
    const failing = new SentinelServer(
      {
        analyzer: new BatchAnalyzer({ pipeline, logger, concurrency: 1 }),
        advisor: new ConversationalAdvisor({
          memory: broken,
          reasoning,
          policy: makePolicy(),
          config: { topK: 1, historyTurns: 1 },
          timeoutMs: 100,
          logger,
        }),
        memory: broken,
        incidents: null,
        logger,
        version: "0.0.0-test",
      },
      0,
      "127.0.0.1",
    );

    const res = await post(failing, "/advisor/s1/query", { text: "hello" });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "internal error" });
    expect(reasoning.converseCalls).toHaveLength(0);
  });
});
