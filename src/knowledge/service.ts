import { randomUUID } from "node:crypto";
import type { CarryoverConfig } from "../config.js";
import { CarryoverError, Err, isContractViolation, Ok, type Result } from "../errors.js";
import { analyzeKnowledgeType, type KnowledgeTypeAnalysis } from "../extractor/classifier.js";
import { parseContinuation } from "../extractor/continuation.js";
import { generateTags } from "../extractor/tagger.js";
import { createLogger } from "../logger.js";
import type { ActiveContinuation, ContinuationStore } from "../store/continuation-store.js";
import type { Retriever, SearchOutcome } from "../store/retriever.js";
import { normalizeProjectName } from "../store/scope.js";
import type {
  ContinuationSnapshot,
  KnowledgeRepository,
  KnowledgeStats,
  KnowledgeUnit,
  ScoredTag,
} from "../store/types.js";

const log = createLogger("service");

const DAY_MS = 24 * 60 * 60 * 1000;

export interface KnowledgeServiceOptions {
  store: KnowledgeRepository;
  continuations: ContinuationStore;
  retriever: Retriever;
  config: CarryoverConfig;
  clock?: () => Date;
}

export interface ClassifyResult {
  analysis: KnowledgeTypeAnalysis;
  tags: ScoredTag[];
}

export interface SaveInput {
  project: string;
  content: string;
  /** Replace the unit with this id instead of creating one */
  id?: string;
}

export interface SaveResult {
  unit: KnowledgeUnit;
  created: boolean;
}

export interface SearchInput {
  project: string;
  query: string;
  limit?: number;
  threshold?: number;
}

export interface ContinuationSaveResult {
  snapshot: ContinuationSnapshot;
  unit: KnowledgeUnit;
}

export interface OverviewOptions {
  recent?: number;
  query?: string;
}

export interface ProjectOverview {
  project: string;
  stats: KnowledgeStats;
  recent: KnowledgeUnit[];
  continuation: ContinuationSnapshot | null;
  search: SearchOutcome | null;
}

/**
 * Knowledge unit lifecycle: classify, tag, embed and store on save;
 * rank on search. Input and storage failures come back as `Err`; only
 * contract violations are thrown.
 */
export class KnowledgeService {
  private readonly store: KnowledgeRepository;
  private readonly continuations: ContinuationStore;
  private readonly retriever: Retriever;
  private readonly config: CarryoverConfig;
  private readonly clock: () => Date;

  constructor(options: KnowledgeServiceOptions) {
    this.store = options.store;
    this.continuations = options.continuations;
    this.retriever = options.retriever;
    this.config = options.config;
    this.clock = options.clock ?? (() => new Date());
  }

  get mode(): Retriever["mode"] {
    return this.retriever.mode;
  }

  classify(text: string): Result<ClassifyResult> {
    if (text.trim().length === 0) {
      return Err(CarryoverError.validation("content is required"));
    }
    return Ok({
      analysis: analyzeKnowledgeType(text),
      tags: generateTags(text, this.config.max_tags),
    });
  }

  async save(input: SaveInput): Promise<Result<SaveResult>> {
    const project = requireProject(input.project);
    if (!project.ok) return project;
    if (input.content.trim().length === 0) {
      return Err(CarryoverError.validation("content is required"));
    }

    const name = project.value;
    return this.guard("save", () => this.saveUnit(name, input.content, input.id));
  }

  /** Classify and tag a stored unit again, keeping its id and content */
  async reclassify(id: string): Promise<Result<KnowledgeUnit>> {
    return this.guard("reclassify", async () => {
      const existing = this.store.getById(id);
      if (!existing) {
        throw CarryoverError.notFound("knowledge unit", id);
      }
      const { unit } = await this.saveUnit(existing.project, existing.content, existing.id);
      return unit;
    });
  }

  async search(input: SearchInput): Promise<Result<SearchOutcome>> {
    const project = requireProject(input.project);
    if (!project.ok) return project;
    if (input.query.trim().length === 0) {
      return Err(CarryoverError.validation("query is required"));
    }

    const name = project.value;
    return this.guard("search", () =>
      this.retriever.search({
        project: name,
        query: input.query,
        limit: input.limit ?? this.config.search_limit,
        threshold: input.threshold ?? this.config.similarity_threshold,
      }),
    );
  }

  /** Parse a continuation note, keep it as the project's snapshot and store it as knowledge */
  async saveContinuation(input: { project: string; content: string }): Promise<Result<ContinuationSaveResult>> {
    const project = requireProject(input.project);
    if (!project.ok) return project;
    if (input.content.trim().length === 0) {
      return Err(CarryoverError.validation("content is required"));
    }

    const name = project.value;
    return this.guard("saveContinuation", async () => {
      const continuation = parseContinuation(input.content, this.clock());
      // the snapshot is only written once its knowledge unit is stored
      const { unit } = await this.saveUnit(name, input.content);
      const stored = this.continuations.save(name, continuation);
      return {
        snapshot: this.toSnapshot(stored.project, stored.continuation, stored.saved_at),
        unit,
      };
    });
  }

  /** Latest continuation of a project, or null when none was saved */
  async loadContinuation(projectName: string): Promise<Result<ContinuationSnapshot | null>> {
    const project = requireProject(projectName);
    if (!project.ok) return project;

    const name = project.value;
    return this.guard("loadContinuation", () => {
      const stored = this.continuations.latest(name);
      if (!stored) return null;
      const snapshot = this.toSnapshot(stored.project, stored.continuation, stored.saved_at);
      if (snapshot.stale) {
        log.warn(`continuation for ${snapshot.project} is ${snapshot.age_days} days old`);
      }
      return snapshot;
    });
  }

  async clearContinuation(projectName: string): Promise<Result<boolean>> {
    const project = requireProject(projectName);
    if (!project.ok) return project;
    const name = project.value;
    return this.guard("clearContinuation", () => this.continuations.clear(name));
  }

  async listContinuations(): Promise<Result<ActiveContinuation[]>> {
    return this.guard("listContinuations", () => this.continuations.listActive());
  }

  async listProjects(): Promise<Result<string[]>> {
    return this.guard("listProjects", () => this.store.listProjects());
  }

  async stats(): Promise<Result<KnowledgeStats>> {
    return this.guard("stats", () => this.store.stats());
  }

  async overview(projectName: string, options: OverviewOptions = {}): Promise<Result<ProjectOverview>> {
    const project = requireProject(projectName);
    if (!project.ok) return project;
    const name = project.value;

    return this.guard("overview", async () => {
      const stored = this.continuations.latest(name);
      const query = options.query?.trim();
      return {
        project: name,
        stats: this.store.stats(name),
        recent: this.store.fetchRecent(name, options.recent ?? this.config.search_limit),
        continuation: stored ? this.toSnapshot(stored.project, stored.continuation, stored.saved_at) : null,
        search: query
          ? await this.retriever.search({
              project: name,
              query,
              limit: this.config.search_limit,
              threshold: this.config.similarity_threshold,
            })
          : null,
      };
    });
  }

  private async saveUnit(project: string, content: string, id?: string): Promise<SaveResult> {
    const unitId = id?.trim() || randomUUID();
    const existing = this.store.getById(unitId);

    const analysis = analyzeKnowledgeType(content);
    const tags = generateTags(content, this.config.max_tags);

    // the vector only follows the content
    let embedding: Float32Array | null = null;
    let embeddingModel: string | null = null;
    if (existing && existing.content === content && existing.embedding) {
      embedding = existing.embedding;
      embeddingModel = existing.embedding_model;
    } else {
      const embedded = await this.retriever.embed(content);
      if (embedded) {
        embedding = embedded.vector;
        embeddingModel = embedded.model;
      }
    }

    const unit = this.store.upsert({
      id: unitId,
      project,
      content,
      knowledge_type: analysis.type,
      confidence: analysis.confidence,
      tags,
      embedding,
      embedding_model: embeddingModel,
    });
    this.retriever.register(unit);

    log.info(`saved ${unit.knowledge_type} unit ${unit.id} for ${project}`, {
      confidence: Number(unit.confidence.toFixed(3)),
      tags: unit.tags.map((t) => t.tag),
    });
    return { unit, created: existing === null };
  }

  private toSnapshot(
    project: string,
    continuation: ContinuationSnapshot["continuation"],
    savedAt: string,
  ): ContinuationSnapshot {
    const ageMs = Math.max(0, this.clock().getTime() - Date.parse(savedAt));
    return {
      project,
      continuation,
      saved_at: savedAt,
      age_days: Math.floor(ageMs / DAY_MS),
      stale: ageMs > this.config.continuation_stale_days * DAY_MS,
      history_count: this.continuations.historyCount(project),
    };
  }

  /** Run a storage-backed step, turning failures other than contract violations into `Err` */
  private guard<T>(operation: string, fn: () => T | PromiseLike<T>): Promise<Result<T>> {
    return Promise.resolve()
      .then(fn)
      .then(
        (value) => Ok(value),
        (err: unknown) => {
          if (isContractViolation(err)) throw err;
          if (err instanceof CarryoverError) return Err(err);
          log.error(`${operation} failed`, err);
          const message = err instanceof Error ? err.message : String(err);
          return Err(CarryoverError.storage(`${operation} failed: ${message}`));
        },
      );
  }
}

function requireProject(name: string): Result<string> {
  const project = normalizeProjectName(name);
  if (project.length === 0) {
    return Err(CarryoverError.validation("project is required"));
  }
  return Ok(project);
}
