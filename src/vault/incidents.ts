import { randomUUID } from "node:crypto";
import { z } from "zod";
import { RISK_CATEGORIES, type AnalysisResult, type RequestLog } from "../analysis/types.js";
import type { SentinelDB } from "./db.js";
import type { Incident, IncidentStatus } from "./types.js";

export interface ListIncidentsParams {
  status?: IncidentStatus;
  userId?: string;
  limit?: number;
}

const incidentRowSchema = z.object({
  id: z.string(),
  record_id: z.string(),
  user_id: z.string(),
  department: z.string(),
  source_ip: z.string(),
  request_url: z.string(),
  category: z.enum(RISK_CATEGORIES),
  score: z.number(),
  reasoning: z.string(),
  status: z.enum(["open", "unresolved", "closed"]),
  failure_reason: z.string().nullable(),
  created_at: z.number(),
  updated_at: z.number(),
});

function toIncident(row: unknown): Incident {
  const r = incidentRowSchema.parse(row);
  return {
    id: r.id,
    recordId: r.record_id,
    userId: r.user_id,
    department: r.department,
    sourceIp: r.source_ip,
    requestUrl: r.request_url,
    category: r.category,
    score: r.score,
    reasoning: r.reasoning,
    status: r.status,
    failureReason: r.failure_reason,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

/** One incident per analyzed record; reopening an existing record updates it. */
export class IncidentStore {
  private readonly db;

  constructor(sentinelDb: SentinelDB) {
    this.db = sentinelDb.raw();
  }

  open(
    log: RequestLog,
    result: AnalysisResult,
    status: Exclude<IncidentStatus, "closed"> = "open",
    failureReason: string | null = null,
  ): Incident {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO incidents (id, record_id, user_id, department, source_ip, request_url, category, score, reasoning, status, failure_reason, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(record_id) DO UPDATE SET
           status = excluded.status,
           failure_reason = COALESCE(excluded.failure_reason, incidents.failure_reason),
           updated_at = excluded.updated_at`,
      )
      .run(
        randomUUID(),
        log.id,
        log.userId,
        log.department,
        log.sourceIp,
        log.requestUrl,
        result.category,
        result.score,
        result.reasoning,
        status,
        failureReason,
        now,
        now,
      );

    const incident = this.getByRecord(log.id);
    if (!incident) {
      throw new Error(`incident for record ${log.id} missing after insert`);
    }
    return incident;
  }

  markUnresolved(id: string, reason: string): boolean {
    const result = this.db
      .prepare(
        "UPDATE incidents SET status = 'unresolved', failure_reason = ?, updated_at = ? WHERE id = ?",
      )
      .run(reason, Date.now(), id);
    return result.changes > 0;
  }

  close(id: string): boolean {
    const result = this.db
      .prepare("UPDATE incidents SET status = 'closed', updated_at = ? WHERE id = ?")
      .run(Date.now(), id);
    return result.changes > 0;
  }

  get(id: string): Incident | null {
    const row = this.db.prepare("SELECT * FROM incidents WHERE id = ?").get(id);
    return row ? toIncident(row) : null;
  }

  getByRecord(recordId: string): Incident | null {
    const row = this.db.prepare("SELECT * FROM incidents WHERE record_id = ?").get(recordId);
    return row ? toIncident(row) : null;
  }

  list(params: ListIncidentsParams = {}): Incident[] {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (params.status) {
      conditions.push("status = ?");
      values.push(params.status);
    }
    if (params.userId) {
      conditions.push("user_id = ?");
      values.push(params.userId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const rows = this.db
      .prepare(`SELECT * FROM incidents ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`)
      .all(...values, params.limit ?? 50);
    return rows.map(toIncident);
  }
}
