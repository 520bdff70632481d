import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { ConversationalAdvisor } from "../advisor/advisor.js";
import type { BatchAnalyzer } from "../analysis/batch.js";
import type { AnalysisOutcome } from "../analysis/types.js";
import { formatIssues } from "../config/schema.js";
import type { Logger } from "../logging/logger.js";
import type { VectorIndex } from "../memory/vector-index.js";
import type { IncidentStore } from "../vault/incidents.js";

const analyzeBodySchema = z.object({
  records: z.array(z.unknown()).max(10_000),
  concurrency: z.number().int().min(1).max(64).optional(),
});

const queryBodySchema = z.object({ text: z.string().trim().min(1).max(4_000) });

const contextBodySchema = z.object({ recordId: z.string().min(1) });

const incidentQuerySchema = z.object({
  status: z.enum(["open", "unresolved", "closed"]).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export interface SentinelServerDeps {
  readonly analyzer: BatchAnalyzer;
  readonly advisor: ConversationalAdvisor;
  readonly memory: VectorIndex;
  readonly incidents: IncidentStore | null;
  readonly logger: Logger;
  readonly version: string;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

export class SentinelServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();
  /** Outcomes of the most recent /analyze call, for attaching advisor context. */
  private lastBatch = new Map<string, AnalysisOutcome>();

  constructor(
    private readonly deps: SentinelServerDeps,
    private readonly port: number,
    private readonly hostname: string,
  ) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) => {
      const mem = process.memoryUsage();
      return c.json({
        status: "ok",
        version: this.deps.version,
        uptime: Date.now() - this.startedAt,
        memory: { records: this.deps.memory.size, dimension: this.deps.memory.dimension },
        incidents: this.deps.incidents !== null,
        system: {
          memoryMB: {
            rss: Math.round(mem.rss / 1024 / 1024),
            heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
          },
          nodeVersion: process.version,
          pid: process.pid,
        },
      });
    });

    this.app.post("/analyze", async (c) => {
      const body = analyzeBodySchema.safeParse(await readJson(c));
      if (!body.success) {
        return c.json({ error: "invalid body", issues: formatIssues(body.error) }, 400);
      }

      const report = await this.deps.analyzer.analyze(body.data.records, {
        concurrency: body.data.concurrency,
        signal: c.req.raw.signal,
      });
      this.lastBatch = new Map(report.results.map((o) => [o.result.recordId, o]));
      return c.json(report);
    });

    this.app.post("/advisor/:sessionId/query", async (c) => {
      const body = queryBodySchema.safeParse(await readJson(c));
      if (!body.success) {
        return c.json({ error: "invalid body", issues: formatIssues(body.error) }, 400);
      }
      const reply = await this.deps.advisor.query(c.req.param("sessionId"), body.data.text);
      return c.json({ reply });
    });

    this.app.post("/advisor/:sessionId/context", async (c) => {
      const body = contextBodySchema.safeParse(await readJson(c));
      if (!body.success) {
        return c.json({ error: "invalid body", issues: formatIssues(body.error) }, 400);
      }
      const outcome = this.lastBatch.get(body.data.recordId);
      if (!outcome) {
        return c.json({ error: `unknown record ${body.data.recordId}` }, 404);
      }
      await this.deps.advisor.attachResult(c.req.param("sessionId"), outcome.result, outcome.log);
      return c.json({ attached: outcome.result.recordId, category: outcome.result.category });
    });

    this.app.get("/incidents", (c) => {
      if (!this.deps.incidents) {
        return c.json({ error: "incident store not configured" }, 503);
      }
      const query = incidentQuerySchema.safeParse(c.req.query());
      if (!query.success) {
        return c.json({ error: "invalid query", issues: formatIssues(query.error) }, 400);
      }
      return c.json({ incidents: this.deps.incidents.list(query.data) });
    });

    this.app.onError((err, c) => {
      this.deps.logger.error({ err, path: c.req.path }, "Request failed");
      return c.json({ error: "internal error" }, 500);
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
    this.deps.logger.info({ port: this.port, hostname: this.hostname }, "HTTP server started");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
