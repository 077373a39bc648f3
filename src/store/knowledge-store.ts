import Database from "better-sqlite3";
import { z } from "zod";
import { CarryoverError } from "../errors.js";
import { createLogger } from "../logger.js";
import { resolveDbPath } from "./scope.js";
import {
  isKnowledgeType,
  type IndexedVector,
  type KnowledgeRepository,
  type KnowledgeStats,
  type KnowledgeType,
  type KnowledgeUnit,
  type KnowledgeUnitInput,
  type ScoredTag,
} from "./types.js";
import { decodeEmbedding, encodeEmbedding, sanitizeFtsQuery } from "./vector.js";

const log = createLogger("store");

const FALLBACK_TYPE: KnowledgeType = "implementation";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS knowledge_units (
  id TEXT PRIMARY KEY,
  project TEXT NOT NULL,
  content TEXT NOT NULL,
  knowledge_type TEXT NOT NULL,
  confidence REAL NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  embedding BLOB,
  embedding_model TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_units_project ON knowledge_units(project, updated_at);
CREATE INDEX IF NOT EXISTS idx_units_type ON knowledge_units(knowledge_type);

CREATE VIRTUAL TABLE IF NOT EXISTS knowledge_fts USING fts5(
  id UNINDEXED,
  project UNINDEXED,
  content,
  tags
);
`;

const tagsSchema = z.array(
  z.object({
    tag: z.string(),
    confidence: z.number().min(0).max(1),
  }),
);

interface RawRow {
  id: string;
  project: string;
  content: string;
  knowledge_type: string;
  confidence: number;
  tags: string;
  embedding: Buffer | null;
  embedding_model: string | null;
  created_at: string;
  updated_at: string;
}

interface UpsertParams {
  id: string;
  project: string;
  content: string;
  knowledge_type: KnowledgeType;
  confidence: number;
  tags: string;
  embedding: Buffer | null;
  embedding_model: string | null;
  now: string;
}

interface EmbeddingRow {
  id: string;
  project: string;
  knowledge_type: string;
  created_at: string;
  embedding: Buffer;
}

/** Knowledge units in SQLite, with an FTS5 table for keyword lookups */
export class KnowledgeStore implements KnowledgeRepository {
  private db: Database.Database;
  private readonly clock: () => Date;

  constructor(dbPath: string = resolveDbPath(), clock: () => Date = () => new Date()) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    this.clock = clock;
  }

  /** Insert or replace a unit by id. An existing unit keeps its created_at */
  upsert(input: KnowledgeUnitInput): KnowledgeUnit {
    const now = this.clock().toISOString();
    const params: UpsertParams = {
      id: input.id,
      project: input.project,
      content: input.content,
      knowledge_type: input.knowledge_type,
      confidence: input.confidence,
      tags: JSON.stringify(input.tags),
      embedding: input.embedding ? encodeEmbedding(input.embedding) : null,
      embedding_model: input.embedding ? input.embedding_model : null,
      now,
    };

    const upsertUnit = this.db.prepare<UpsertParams>(`
      INSERT INTO knowledge_units (id, project, content, knowledge_type, confidence, tags, embedding, embedding_model, created_at, updated_at)
      VALUES (@id, @project, @content, @knowledge_type, @confidence, @tags, @embedding, @embedding_model, @now, @now)
      ON CONFLICT(id) DO UPDATE SET
        project = excluded.project,
        content = excluded.content,
        knowledge_type = excluded.knowledge_type,
        confidence = excluded.confidence,
        tags = excluded.tags,
        embedding = excluded.embedding,
        embedding_model = excluded.embedding_model,
        updated_at = excluded.updated_at
    `);
    const deleteFts = this.db.prepare<[string]>("DELETE FROM knowledge_fts WHERE id = ?");
    const insertFts = this.db.prepare<[string, string, string, string]>(
      "INSERT INTO knowledge_fts (id, project, content, tags) VALUES (?, ?, ?, ?)",
    );

    this.db.transaction(() => {
      upsertUnit.run(params);
      deleteFts.run(input.id);
      insertFts.run(input.id, input.project, input.content, input.tags.map((t) => t.tag).join(" "));
    })();

    const stored = this.getById(input.id);
    if (!stored) {
      throw CarryoverError.storage(`unit ${input.id} missing after write`);
    }
    return stored;
  }

  getById(id: string): KnowledgeUnit | null {
    const row = this.db
      .prepare<[string], RawRow>("SELECT * FROM knowledge_units WHERE id = ?")
      .get(id);
    return row ? rowToUnit(row) : null;
  }

  /** Newest first */
  fetchRecent(project: string, limit: number): KnowledgeUnit[] {
    if (limit <= 0) return [];
    return this.db
      .prepare<[string, number], RawRow>(
        `SELECT * FROM knowledge_units WHERE project = ?
         ORDER BY updated_at DESC, rowid DESC LIMIT ?`,
      )
      .all(project, limit)
      .map(rowToUnit);
  }

  /** FTS5 matches of any query token, best rank first */
  keywordSearch(project: string, query: string, limit: number): KnowledgeUnit[] {
    const sanitized = sanitizeFtsQuery(query);
    if (!sanitized || limit <= 0) return [];

    return this.db
      .prepare<[string, string, number], RawRow>(
        `SELECT u.* FROM knowledge_fts
         JOIN knowledge_units u ON u.id = knowledge_fts.id
         WHERE knowledge_fts MATCH ? AND knowledge_fts.project = ?
         ORDER BY bm25(knowledge_fts)
         LIMIT ?`,
      )
      .all(sanitized, project, limit)
      .map(rowToUnit);
  }

  /** Every vector written by `model`; blobs of the wrong size are skipped */
  loadEmbeddings(dimensions: number, model: string): IndexedVector[] {
    const rows = this.db
      .prepare<[string], EmbeddingRow>(
        `SELECT id, project, knowledge_type, created_at, embedding FROM knowledge_units
         WHERE embedding IS NOT NULL AND embedding_model = ?
         ORDER BY rowid`,
      )
      .all(model);

    const vectors: IndexedVector[] = [];
    for (const row of rows) {
      const vector = decodeEmbedding(row.embedding, dimensions);
      if (!vector) {
        log.warn(`skipping corrupt embedding of ${row.id}`, {
          expected: dimensions * 4,
          got: row.embedding.byteLength,
        });
        continue;
      }
      vectors.push({
        id: row.id,
        vector,
        metadata: {
          project: row.project,
          knowledge_type: toKnowledgeType(row.knowledge_type, row.id),
          created_at: row.created_at,
        },
      });
    }
    return vectors;
  }

  stats(project?: string): KnowledgeStats {
    const where = project === undefined ? "" : "WHERE project = ?";
    const params = project === undefined ? [] : [project];

    const summary = this.db
      .prepare<unknown[], { cnt: number; first: string | null; last: string | null }>(
        `SELECT COUNT(*) AS cnt, MIN(created_at) AS first, MAX(updated_at) AS last
         FROM knowledge_units ${where}`,
      )
      .get(...params);

    const byType: Record<string, number> = {};
    const typeRows = this.db
      .prepare<unknown[], { knowledge_type: string; cnt: number }>(
        `SELECT knowledge_type, COUNT(*) AS cnt FROM knowledge_units ${where}
         GROUP BY knowledge_type ORDER BY cnt DESC, knowledge_type`,
      )
      .all(...params);
    for (const r of typeRows) {
      byType[r.knowledge_type] = r.cnt;
    }

    return {
      total: summary?.cnt ?? 0,
      byType,
      first_activity: summary?.first ?? null,
      last_activity: summary?.last ?? null,
    };
  }

  listProjects(): string[] {
    return this.db
      .prepare<[], { project: string }>("SELECT DISTINCT project FROM knowledge_units ORDER BY project")
      .all()
      .map((r) => r.project);
  }

  /** Close the database connection */
  close(): void {
    this.db.close();
  }
}

// --- internal ---

function rowToUnit(row: RawRow): KnowledgeUnit {
  return {
    id: row.id,
    project: row.project,
    content: row.content,
    knowledge_type: toKnowledgeType(row.knowledge_type, row.id),
    confidence: row.confidence,
    tags: parseTags(row.tags, row.id),
    embedding: row.embedding ? decodeStoredEmbedding(row.embedding, row.id) : null,
    embedding_model: row.embedding_model,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function parseTags(raw: string, id: string): ScoredTag[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    log.warn(`unreadable tags on ${id}`, err);
    return [];
  }
  const parsed = tagsSchema.safeParse(json);
  if (!parsed.success) {
    log.warn(`invalid tags on ${id}`);
    return [];
  }
  return parsed.data;
}

function decodeStoredEmbedding(blob: Buffer, id: string): Float32Array | null {
  const vector = blob.byteLength % 4 === 0 ? decodeEmbedding(blob, blob.byteLength / 4) : null;
  if (!vector) {
    log.warn(`skipping corrupt embedding of ${id}`, { got: blob.byteLength });
  }
  return vector;
}

function toKnowledgeType(value: string, id: string): KnowledgeType {
  if (isKnowledgeType(value)) return value;
  log.warn(`unknown knowledge type "${value}" on ${id}`);
  return FALLBACK_TYPE;
}
