import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { MergeRequestRef, PassResult } from "../types.js";

export interface PassRecord {
  timestamp: string;
  project: string;
  mrIid: number;
  dangerId: string;
  mode: "inline" | "regular" | "failed";
  created: number;
  updated: number;
  resolved: number;
  deleted: number;
  failedActions: number;
  reported: number;
  durationMs: number;
  error: string | null;
}

export interface StoredPass extends PassRecord {
  id: number;
}

interface PassRow {
  id: number;
  timestamp: string;
  project: string;
  mr_iid: number;
  danger_id: string;
  mode: string;
  created: number;
  updated: number;
  resolved: number;
  deleted: number;
  failed_actions: number;
  reported: number;
  duration_ms: number;
  error: string | null;
}

function isPassRow(value: unknown): value is PassRow {
  return typeof value === "object" && value !== null && "id" in value && "mr_iid" in value && "danger_id" in value;
}

function toMode(mode: string): PassRecord["mode"] {
  return mode === "inline" || mode === "regular" ? mode : "failed";
}

/** Ledger of reconciliation passes, one row per pass. */
export class HistoryStore {
  private db: Database.Database;
  private insertStmt: Database.Statement;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS passes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        project TEXT NOT NULL,
        mr_iid INTEGER NOT NULL,
        danger_id TEXT NOT NULL,
        mode TEXT NOT NULL,
        created INTEGER NOT NULL DEFAULT 0,
        updated INTEGER NOT NULL DEFAULT 0,
        resolved INTEGER NOT NULL DEFAULT 0,
        deleted INTEGER NOT NULL DEFAULT 0,
        failed_actions INTEGER NOT NULL DEFAULT 0,
        reported INTEGER NOT NULL DEFAULT 0,
        duration_ms INTEGER NOT NULL DEFAULT 0,
        error TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_passes_mr ON passes(project, mr_iid);
      CREATE INDEX IF NOT EXISTS idx_passes_timestamp ON passes(timestamp);
    `);

    this.insertStmt = this.db.prepare(`
      INSERT INTO passes (timestamp, project, mr_iid, danger_id, mode, created, updated, resolved, deleted, failed_actions, reported, duration_ms, error)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  record(entry: PassRecord): void {
    this.insertStmt.run(
      entry.timestamp,
      entry.project,
      entry.mrIid,
      entry.dangerId,
      entry.mode,
      entry.created,
      entry.updated,
      entry.resolved,
      entry.deleted,
      entry.failedActions,
      entry.reported,
      entry.durationMs,
      entry.error,
    );
  }

  /** Build a PassRecord from a finished pass. */
  static fromResult(mr: MergeRequestRef, dangerId: string, result: PassResult): PassRecord {
    const ok = (action: string) => result.actions.filter((a) => a.action === action && a.outcome === "ok").length;
    return {
      timestamp: new Date().toISOString(),
      project: mr.project,
      mrIid: mr.iid,
      dangerId,
      mode: result.inline ? "inline" : "regular",
      created: ok("create"),
      updated: ok("update"),
      resolved: ok("resolve"),
      deleted: ok("delete"),
      failedActions: result.actions.filter((a) => a.outcome === "failed").length,
      reported: Object.values(result.reported).reduce((sum, group) => sum + group.length, 0),
      durationMs: result.durationMs,
      error: null,
    };
  }

  /** Build a PassRecord for a pass that ended with a fatal error. */
  static fromFailure(mr: MergeRequestRef, dangerId: string, error: string, durationMs: number): PassRecord {
    return {
      timestamp: new Date().toISOString(),
      project: mr.project,
      mrIid: mr.iid,
      dangerId,
      mode: "failed",
      created: 0,
      updated: 0,
      resolved: 0,
      deleted: 0,
      failedActions: 0,
      reported: 0,
      durationMs,
      error,
    };
  }

  /** Most recent passes first, optionally for one merge request. */
  recent(limit: number = 20, mr?: MergeRequestRef): StoredPass[] {
    const rows: unknown[] = mr
      ? this.db.prepare(`SELECT * FROM passes WHERE project = ? AND mr_iid = ? ORDER BY id DESC LIMIT ?`).all(mr.project, mr.iid, limit)
      : this.db.prepare(`SELECT * FROM passes ORDER BY id DESC LIMIT ?`).all(limit);

    return rows.filter(isPassRow).map((r) => ({
      id: r.id,
      timestamp: r.timestamp,
      project: r.project,
      mrIid: r.mr_iid,
      dangerId: r.danger_id,
      mode: toMode(r.mode),
      created: r.created,
      updated: r.updated,
      resolved: r.resolved,
      deleted: r.deleted,
      failedActions: r.failed_actions,
      reported: r.reported,
      durationMs: r.duration_ms,
      error: r.error,
    }));
  }

  /** Delete passes older than the retention window. */
  cleanup(retentionDays: number): number {
    const cutoff = new Date(Date.now() - retentionDays * 86400_000).toISOString();
    return this.db.prepare(`DELETE FROM passes WHERE timestamp < ?`).run(cutoff).changes;
  }

  close(): void {
    this.db.close();
  }
}
