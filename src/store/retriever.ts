import type { CarryoverConfig } from "../config.js";
import { CarryoverError, isContractViolation } from "../errors.js";
import { createLogger } from "../logger.js";
import { isEmbeddingRuntimeInstalled, TransformersEmbedder, type Embedder } from "./embedding.js";
import type { KnowledgeRepository, KnowledgeUnit, VectorMetadata } from "./types.js";
import { SimilarityIndex } from "./vector.js";

const log = createLogger("retriever");

/** Similarity reported for every lexical match */
export const LEXICAL_SIMILARITY = 0.5;

export type RetrievalMode = "semantic" | "lexical";

export interface SearchRequest {
  project: string;
  query: string;
  limit: number;
  /** Minimum similarity in [0, 1]; lexical search ignores it */
  threshold: number;
}

export interface SearchHit {
  unit: KnowledgeUnit;
  similarity: number;
}

export interface SearchOutcome {
  /** The strategy that produced the hits */
  mode: RetrievalMode;
  hits: SearchHit[];
}

export interface EmbeddingResult {
  vector: Float32Array;
  model: string;
}

/**
 * Retrieval capability. One implementation is chosen at startup; callers
 * never check which one they hold.
 */
export interface Retriever {
  readonly mode: RetrievalMode;
  /** Vector for new content, or null when this retriever does not embed */
  embed(content: string): Promise<EmbeddingResult | null>;
  /** Make a freshly stored unit searchable */
  register(unit: KnowledgeUnit): void;
  search(request: SearchRequest): Promise<SearchOutcome>;
}

function assertSearchBounds(request: SearchRequest): void {
  if (!Number.isInteger(request.limit) || request.limit < 0) {
    throw CarryoverError.contract(`limit must be a non-negative integer, got ${request.limit}`);
  }
  if (!(request.threshold >= 0 && request.threshold <= 1)) {
    throw CarryoverError.contract(`threshold must be within [0, 1], got ${request.threshold}`);
  }
}

/**
 * Keyword matches first, then the project's most recent units, each with
 * a fixed placeholder similarity. Returns something whenever the project
 * has any stored unit.
 */
export class LexicalRetriever implements Retriever {
  readonly mode = "lexical" as const;

  constructor(private readonly store: KnowledgeRepository) {}

  async embed(_content: string): Promise<EmbeddingResult | null> {
    return null;
  }

  register(_unit: KnowledgeUnit): void {
    // FTS rows are written by the store itself
  }

  async search(request: SearchRequest): Promise<SearchOutcome> {
    assertSearchBounds(request);
    if (request.limit === 0) return { mode: this.mode, hits: [] };

    const seen = new Set<string>();
    const units: KnowledgeUnit[] = [];
    const take = (candidates: KnowledgeUnit[]): void => {
      for (const unit of candidates) {
        if (units.length >= request.limit) return;
        if (seen.has(unit.id)) continue;
        seen.add(unit.id);
        units.push(unit);
      }
    };

    take(this.store.keywordSearch(request.project, request.query, request.limit));
    if (units.length < request.limit) {
      take(this.store.fetchRecent(request.project, request.limit + units.length));
    }

    return {
      mode: this.mode,
      hits: units.map((unit) => ({ unit, similarity: LEXICAL_SIMILARITY })),
    };
  }
}

/**
 * Cosine ranking over stored embeddings.
 *
 * The index is built from the store on the first search. When the query
 * cannot be embedded, or nothing clears the threshold, the lexical
 * fallback answers instead.
 */
export class SemanticRetriever implements Retriever {
  readonly mode = "semantic" as const;
  private index: SimilarityIndex<VectorMetadata> | null = null;
  private readonly fallback: LexicalRetriever;

  constructor(
    private readonly store: KnowledgeRepository,
    private readonly embedder: Embedder,
  ) {
    this.fallback = new LexicalRetriever(store);
  }

  async embed(content: string): Promise<EmbeddingResult | null> {
    try {
      const vector = await this.embedder.embed(content);
      return { vector, model: this.embedder.modelName };
    } catch (err) {
      if (isContractViolation(err)) throw err;
      log.warn("embedding failed", err);
      return null;
    }
  }

  register(unit: KnowledgeUnit): void {
    // an unbuilt index picks the unit up from the store when it is built
    if (!this.index) return;

    const { embedding } = unit;
    const ownModel = unit.embedding_model === this.embedder.modelName;
    if (embedding && ownModel && embedding.length !== this.embedder.dimensions) {
      log.warn(`not indexing ${unit.id}: ${embedding.length} dimensions`);
    }
    if (!embedding || !ownModel || embedding.length !== this.embedder.dimensions) {
      // the store no longer holds the vector this id was indexed with
      if (this.index.has(unit.id)) this.index.rebuild();
      return;
    }

    this.index.add(unit.id, embedding, {
      project: unit.project,
      knowledge_type: unit.knowledge_type,
      created_at: unit.created_at,
    });
  }

  async search(request: SearchRequest): Promise<SearchOutcome> {
    assertSearchBounds(request);
    if (request.limit === 0) return { mode: this.mode, hits: [] };

    const query = await this.embed(request.query);
    if (!query) {
      return this.fallback.search(request);
    }

    const matches = this.getIndex().search(
      query.vector,
      request.limit,
      request.threshold,
      (metadata) => metadata.project === request.project,
    );

    const hits: SearchHit[] = [];
    for (const match of matches) {
      const unit = this.store.getById(match.id);
      if (!unit) {
        log.warn(`indexed unit ${match.id} is missing from the store`);
        continue;
      }
      hits.push({ unit, similarity: match.similarity });
    }

    if (hits.length === 0) {
      log.debug(`no semantic match above ${request.threshold}, using lexical search`);
      return this.fallback.search(request);
    }
    return { mode: this.mode, hits };
  }

  private getIndex(): SimilarityIndex<VectorMetadata> {
    if (!this.index) {
      const { store, embedder } = this;
      const index = new SimilarityIndex<VectorMetadata>(embedder.dimensions, {
        loadVectors: () => store.loadEmbeddings(embedder.dimensions, embedder.modelName),
      });
      index.rebuild();
      this.index = index;
    }
    return this.index;
  }
}

export interface RetrieverOptions {
  config: CarryoverConfig;
  store: KnowledgeRepository;
  /** Overrides the configured model */
  embedder?: Embedder;
}

/** Pick the retrieval capability once, at startup */
export function selectRetriever(options: RetrieverOptions): Retriever {
  const { config, store, embedder } = options;

  if (!config.semantic_search) {
    log.info("semantic search disabled by config, using lexical search");
    return new LexicalRetriever(store);
  }
  if (embedder) {
    return new SemanticRetriever(store, embedder);
  }
  if (!isEmbeddingRuntimeInstalled()) {
    log.warn("@huggingface/transformers is not installed, using lexical search");
    return new LexicalRetriever(store);
  }
  return new SemanticRetriever(
    store,
    new TransformersEmbedder(config.embedding_model, config.embedding_dimensions),
  );
}
