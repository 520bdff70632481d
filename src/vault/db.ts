import Database from "better-sqlite3";
import { join } from "node:path";

export const DB_FILENAME = "sentinel.db";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS incidents (
  id             TEXT PRIMARY KEY,
  record_id      TEXT NOT NULL UNIQUE,
  user_id        TEXT NOT NULL,
  department     TEXT NOT NULL,
  source_ip      TEXT NOT NULL,
  request_url    TEXT NOT NULL,
  category       TEXT NOT NULL CHECK(category IN ('APPROVED','LOW_RISK','MEDIUM_RISK','HIGH_RISK','CRITICAL')),
  score          INTEGER NOT NULL,
  reasoning      TEXT NOT NULL,
  status         TEXT NOT NULL CHECK(status IN ('open','unresolved','closed')),
  failure_reason TEXT,
  created_at     INTEGER NOT NULL,
  updated_at     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_incidents_status ON incidents(status);
CREATE INDEX IF NOT EXISTS idx_incidents_user ON incidents(user_id);
`;

export class SentinelDB {
  private db: Database.Database;

  /** Opens `<stateDir>/sentinel.db`, or an in-memory database for ":memory:". */
  constructor(stateDir: string) {
    this.db = new Database(stateDir === ":memory:" ? ":memory:" : join(stateDir, DB_FILENAME));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
