/** Knowledge type classification, in declaration (tie-break) order */
export const KNOWLEDGE_TYPES = [
  "continuation",
  "api-documentation",
  "schema",
  "implementation",
  "architecture",
  "milestone",
  "error-solution",
  "research",
] as const;

export type KnowledgeType = (typeof KNOWLEDGE_TYPES)[number];

export function isKnowledgeType(value: string): value is KnowledgeType {
  return KNOWLEDGE_TYPES.some((t) => t === value);
}

/** Canonical continuation section names */
export type CanonicalSection =
  | "STATUS"
  | "POSITION"
  | "PROBLEM"
  | "TRIED"
  | "NEXT"
  | "TODO"
  | "CONTEXT";

/**
 * Parsed sections keyed by canonical name, or by the uppercased literal of
 * an unrecognized header. Iteration order is first-seen order.
 */
export type SectionMap = Map<string, string>;

/** Where work stopped; absent fields were not found in the note */
export interface Position {
  file?: string;
  line?: number;
  function?: string;
}

/** Canonical record of a continuation note */
export interface ParsedContinuation {
  readonly status: string;
  readonly position: Readonly<Position>;
  readonly problem: string;
  readonly tried: readonly string[];
  readonly next: readonly string[];
  readonly todo: readonly string[];
  readonly context: string;
  /** ISO-8601 creation time */
  readonly timestamp: string;
  /** Section bodies as parsed, for lossless redisplay */
  readonly raw_sections: Readonly<Record<string, string>>;
}

/** A tag with the confidence of the strategy that produced it */
export interface ScoredTag {
  tag: string;
  confidence: number;
}

/** A persisted, classified and tagged piece of session content */
export interface KnowledgeUnit {
  id: string;
  project: string;
  content: string;
  knowledge_type: KnowledgeType;
  confidence: number;
  tags: ScoredTag[];
  embedding: Float32Array | null;
  /** Model that produced `embedding` */
  embedding_model: string | null;
  created_at: string;
  updated_at: string;
}

/** Input for inserting or replacing a knowledge unit */
export interface KnowledgeUnitInput {
  id: string;
  project: string;
  content: string;
  knowledge_type: KnowledgeType;
  confidence: number;
  tags: ScoredTag[];
  embedding: Float32Array | null;
  embedding_model: string | null;
}

/** Metadata carried next to each vector in the similarity index */
export interface VectorMetadata {
  project: string;
  knowledge_type: KnowledgeType;
  created_at: string;
}

/** One stored (id, vector) pair */
export interface IndexedVector {
  id: string;
  vector: Float32Array;
  metadata: VectorMetadata;
}

export interface KnowledgeStats {
  total: number;
  byType: Record<string, number>;
  first_activity: string | null;
  last_activity: string | null;
}

/**
 * Persistence contract for knowledge units.
 * The store is a durable key-value table keyed by unit id.
 */
export interface KnowledgeRepository {
  /** Insert or replace by id; `created_at` of an existing unit is kept */
  upsert(input: KnowledgeUnitInput): KnowledgeUnit;
  getById(id: string): KnowledgeUnit | null;
  /** Newest first */
  fetchRecent(project: string, limit: number): KnowledgeUnit[];
  /** Keyword matches in rank order */
  keywordSearch(project: string, query: string, limit: number): KnowledgeUnit[];
  /** All decodable vectors produced by `model` with `dimensions` entries */
  loadEmbeddings(dimensions: number, model: string): IndexedVector[];
  stats(project?: string): KnowledgeStats;
  listProjects(): string[];
}

/** Latest continuation of a project with its age */
export interface ContinuationSnapshot {
  project: string;
  continuation: ParsedContinuation;
  saved_at: string;
  age_days: number;
  stale: boolean;
  history_count: number;
}
