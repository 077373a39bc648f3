import { CarryoverError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("index");

/** Pack a vector into a little-endian Float32 buffer */
export function encodeEmbedding(vec: Float32Array): Buffer {
  const buf = Buffer.alloc(vec.length * 4);
  for (let i = 0; i < vec.length; i++) {
    buf.writeFloatLE(vec[i], i * 4);
  }
  return buf;
}

/** Unpack a little-endian Float32 buffer. Returns null when the size does not match */
export function decodeEmbedding(blob: Buffer, dims: number): Float32Array | null {
  if (blob.byteLength !== dims * 4) {
    return null;
  }
  const arr = new Float32Array(dims);
  for (let i = 0; i < dims; i++) {
    arr[i] = blob.readFloatLE(i * 4);
  }
  return arr;
}

function norm(v: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) {
    sum += v[i] * v[i];
  }
  return Math.sqrt(sum);
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero norm.
 * Vectors of different length are a usage error.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw CarryoverError.contract(`vector length mismatch: ${a.length} vs ${b.length}`);
  }
  const denom = norm(a) * norm(b);
  if (denom === 0) return 0;
  // rounding can carry the ratio just past +-1
  return Math.min(1, Math.max(-1, dot(a, b) / denom));
}

/** Backing store the index reloads itself from */
export interface VectorSource<M> {
  loadVectors(): Array<{ id: string; vector: Float32Array; metadata: M }>;
}

export interface SimilarityHit<M> {
  id: string;
  /** Cosine similarity clamped to [0, 1] */
  similarity: number;
  metadata: M;
}

interface IndexEntry<M> {
  id: string;
  vector: Float32Array;
  norm: number;
  metadata: M;
}

/**
 * Flat in-memory nearest-neighbour index.
 *
 * Inserts append. Replacing the vector of an id already in the index
 * reloads every entry from the source, so the index always mirrors one
 * consistent snapshot of the store.
 */
export class SimilarityIndex<M> {
  private entries: IndexEntry<M>[] = [];
  private readonly positions = new Map<string, number>();

  constructor(
    readonly dimensions: number,
    private readonly source: VectorSource<M>,
  ) {}

  get size(): number {
    return this.entries.length;
  }

  has(id: string): boolean {
    return this.positions.has(id);
  }

  add(id: string, vector: Float32Array, metadata: M): void {
    this.assertDimensions(vector);
    if (this.positions.has(id)) {
      this.rebuild();
      // the source may not have caught up with this write
      const position = this.positions.get(id);
      const entry = { id, vector, norm: norm(vector), metadata };
      if (position === undefined) {
        this.append(entry);
      } else {
        this.entries[position] = entry;
      }
      return;
    }
    this.append({ id, vector, norm: norm(vector), metadata });
  }

  /** Replace every entry with the source's current vectors */
  rebuild(): void {
    const loaded = this.source.loadVectors();
    this.entries = [];
    this.positions.clear();
    for (const { id, vector, metadata } of loaded) {
      if (vector.length !== this.dimensions) {
        log.warn(`skipping vector of ${id}: ${vector.length} dimensions, expected ${this.dimensions}`);
        continue;
      }
      const position = this.positions.get(id);
      const entry = { id, vector, norm: norm(vector), metadata };
      if (position === undefined) {
        this.append(entry);
      } else {
        this.entries[position] = entry;
      }
    }
    log.debug(`index rebuilt with ${this.entries.length} vectors`);
  }

  /**
   * At most `k` entries with similarity >= `threshold`, best first.
   * Equal similarities keep insertion order.
   */
  search(
    query: Float32Array,
    k: number,
    threshold: number,
    filter?: (metadata: M) => boolean,
  ): SimilarityHit<M>[] {
    if (!Number.isInteger(k) || k < 0) {
      throw CarryoverError.contract(`k must be a non-negative integer, got ${k}`);
    }
    if (!(threshold >= 0 && threshold <= 1)) {
      throw CarryoverError.contract(`threshold must be within [0, 1], got ${threshold}`);
    }
    this.assertDimensions(query);
    if (k === 0) return [];

    const queryNorm = norm(query);
    const hits: SimilarityHit<M>[] = [];
    for (const entry of this.entries) {
      if (filter && !filter(entry.metadata)) continue;
      const denom = queryNorm * entry.norm;
      const similarity = denom === 0 ? 0 : Math.min(1, Math.max(0, dot(query, entry.vector) / denom));
      if (similarity >= threshold) {
        hits.push({ id: entry.id, similarity, metadata: entry.metadata });
      }
    }

    return hits.sort((a, b) => b.similarity - a.similarity).slice(0, k);
  }

  private append(entry: IndexEntry<M>): void {
    this.positions.set(entry.id, this.entries.length);
    this.entries.push(entry);
  }

  private assertDimensions(vector: Float32Array): void {
    if (vector.length !== this.dimensions) {
      throw CarryoverError.contract(
        `vector has ${vector.length} dimensions, index expects ${this.dimensions}`,
      );
    }
  }
}

/**
 * Sanitize query for FTS5 MATCH syntax.
 * Splits into tokens and joins with OR for broad matching.
 *
 * @internal Exported for testing
 */
export function sanitizeFtsQuery(query: string): string {
  const tokens = query
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter((t) => t.length > 0);

  if (tokens.length === 0) return "";

  return tokens.map((t) => `"${t}"`).join(" OR ");
}
