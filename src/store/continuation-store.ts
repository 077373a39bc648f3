import Database from "better-sqlite3";
import { z } from "zod";
import { createLogger } from "../logger.js";
import { resolveDbPath } from "./scope.js";
import type { ParsedContinuation } from "./types.js";

const log = createLogger("continuations");

const SCHEMA = `
CREATE TABLE IF NOT EXISTS continuations (
  project TEXT PRIMARY KEY,
  snapshot TEXT NOT NULL,
  saved_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS continuation_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project TEXT NOT NULL,
  snapshot TEXT NOT NULL,
  saved_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_history_project ON continuation_history(project, id);
`;

const continuationSchema = z.object({
  status: z.string(),
  position: z.object({
    file: z.string().optional(),
    line: z.number().int().optional(),
    function: z.string().optional(),
  }),
  problem: z.string(),
  tried: z.array(z.string()),
  next: z.array(z.string()),
  todo: z.array(z.string()),
  context: z.string(),
  timestamp: z.string(),
  raw_sections: z.record(z.string()),
});

/** A continuation as persisted for one project */
export interface StoredContinuation {
  project: string;
  continuation: ParsedContinuation;
  saved_at: string;
}

/** Per-project summary of the current continuation */
export interface ActiveContinuation {
  project: string;
  status: string;
  saved_at: string;
  has_problem: boolean;
}

interface SnapshotRow {
  project: string;
  snapshot: string;
  saved_at: string;
}

/**
 * Latest continuation per project, plus every saved snapshot as history.
 * Saving replaces the project's current continuation.
 */
export class ContinuationStore {
  private db: Database.Database;
  private readonly clock: () => Date;

  constructor(dbPath: string = resolveDbPath(), clock: () => Date = () => new Date()) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    this.clock = clock;
  }

  save(project: string, continuation: ParsedContinuation): StoredContinuation {
    const savedAt = this.clock().toISOString();
    const snapshot = JSON.stringify(continuation);

    const replace = this.db.prepare<[string, string, string]>(
      `INSERT INTO continuations (project, snapshot, saved_at) VALUES (?, ?, ?)
       ON CONFLICT(project) DO UPDATE SET snapshot = excluded.snapshot, saved_at = excluded.saved_at`,
    );
    const append = this.db.prepare<[string, string, string]>(
      "INSERT INTO continuation_history (project, snapshot, saved_at) VALUES (?, ?, ?)",
    );

    this.db.transaction(() => {
      replace.run(project, snapshot, savedAt);
      append.run(project, snapshot, savedAt);
    })();

    log.info(`continuation saved for ${project}`);
    return { project, continuation, saved_at: savedAt };
  }

  latest(project: string): StoredContinuation | null {
    const row = this.db
      .prepare<[string], SnapshotRow>(
        "SELECT project, snapshot, saved_at FROM continuations WHERE project = ?",
      )
      .get(project);
    return row ? rowToStored(row) : null;
  }

  /** Newest first; unreadable snapshots are skipped */
  history(project: string, limit = 10): StoredContinuation[] {
    const rows = this.db
      .prepare<[string, number], SnapshotRow>(
        `SELECT project, snapshot, saved_at FROM continuation_history
         WHERE project = ? ORDER BY id DESC LIMIT ?`,
      )
      .all(project, limit);

    const stored: StoredContinuation[] = [];
    for (const row of rows) {
      const parsed = rowToStored(row);
      if (parsed) stored.push(parsed);
    }
    return stored;
  }

  historyCount(project: string): number {
    const row = this.db
      .prepare<[string], { cnt: number }>(
        "SELECT COUNT(*) AS cnt FROM continuation_history WHERE project = ?",
      )
      .get(project);
    return row?.cnt ?? 0;
  }

  /** Drop the current continuation; history is kept */
  clear(project: string): boolean {
    const result = this.db
      .prepare<[string]>("DELETE FROM continuations WHERE project = ?")
      .run(project);
    return result.changes > 0;
  }

  /** Current continuation of every project, most recently saved first */
  listActive(): ActiveContinuation[] {
    const rows = this.db
      .prepare<[], SnapshotRow>(
        "SELECT project, snapshot, saved_at FROM continuations ORDER BY saved_at DESC, project",
      )
      .all();

    const active: ActiveContinuation[] = [];
    for (const row of rows) {
      const stored = rowToStored(row);
      if (!stored) continue;
      active.push({
        project: stored.project,
        status: stored.continuation.status,
        saved_at: stored.saved_at,
        has_problem: stored.continuation.problem.length > 0,
      });
    }
    return active;
  }

  close(): void {
    this.db.close();
  }
}

function rowToStored(row: SnapshotRow): StoredContinuation | null {
  let json: unknown;
  try {
    json = JSON.parse(row.snapshot);
  } catch (err) {
    log.warn(`unreadable continuation snapshot for ${row.project}`, err);
    return null;
  }
  const parsed = continuationSchema.safeParse(json);
  if (!parsed.success) {
    log.warn(`invalid continuation snapshot for ${row.project}`);
    return null;
  }
  return { project: row.project, continuation: parsed.data, saved_at: row.saved_at };
}
