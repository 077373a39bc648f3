import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { CarryoverError, isContractViolation } from "../src/errors.js";
import { KnowledgeStore } from "../src/store/knowledge-store.js";
import {
  LEXICAL_SIMILARITY,
  LexicalRetriever,
  SemanticRetriever,
  selectRetriever,
} from "../src/store/retriever.js";
import { VocabularyEmbedder } from "./helpers/fake-embedder.js";
import { makeConfig, makeUnitInput } from "./helpers/factories.js";

const A = "WebSocket reconnection in channel_manager.py drops messages after timeout";
const B = "WebSocket reconnection in channel_manager.py needs exponential backoff";
const C = "Database migration adds foreign key constraint to orders table";

const ids = (outcome: { hits: Array<{ unit: { id: string } }> }): string[] =>
  outcome.hits.map((h) => h.unit.id);

describe("LexicalRetriever", () => {
  let store: KnowledgeStore;
  let retriever: LexicalRetriever;

  beforeEach(() => {
    store = new KnowledgeStore(":memory:");
    retriever = new LexicalRetriever(store);
    store.upsert(makeUnitInput({ id: "a", content: "WebSocket reconnection drops" }));
    store.upsert(makeUnitInput({ id: "b", content: "Database migration" }));
    store.upsert(makeUnitInput({ id: "c", content: "Cache warmup" }));
  });

  afterEach(() => {
    store.close();
  });

  const request = { project: "test-project", threshold: 0.3 };

  it("puts keyword matches before recent units", async () => {
    const outcome = await retriever.search({ ...request, query: "reconnection", limit: 3 });
    assert.equal(outcome.mode, "lexical");
    assert.deepEqual(ids(outcome), ["a", "c", "b"]);
    assert.ok(outcome.hits.every((h) => h.similarity === LEXICAL_SIMILARITY));
  });

  it("stops at the limit", async () => {
    assert.deepEqual(ids(await retriever.search({ ...request, query: "reconnection", limit: 1 })), ["a"]);
    assert.deepEqual(await retriever.search({ ...request, query: "reconnection", limit: 0 }), {
      mode: "lexical",
      hits: [],
    });
  });

  it("falls back to recent units without a keyword match", async () => {
    assert.deepEqual(ids(await retriever.search({ ...request, query: "zzz", limit: 2 })), ["c", "b"]);
  });

  it("returns nothing for an empty project", async () => {
    const outcome = await retriever.search({ project: "nobody", query: "reconnection", limit: 5, threshold: 0 });
    assert.deepEqual(outcome.hits, []);
  });

  it("does not embed", async () => {
    assert.equal(await retriever.embed("anything"), null);
  });

  it("rejects out-of-range arguments", async () => {
    await assert.rejects(retriever.search({ ...request, query: "x", limit: -1 }), isContractViolation);
    await assert.rejects(
      retriever.search({ project: "test-project", query: "x", limit: 1, threshold: 2 }),
      isContractViolation,
    );
  });
});

describe("SemanticRetriever", () => {
  let store: KnowledgeStore;
  let embedder: VocabularyEmbedder;
  let retriever: SemanticRetriever;

  async function seed(id: string, content: string, project = "test-project"): Promise<void> {
    const embedding = await embedder.embed(content);
    store.upsert(makeUnitInput({ id, project, content, embedding, embedding_model: embedder.modelName }));
  }

  beforeEach(async () => {
    store = new KnowledgeStore(":memory:");
    embedder = new VocabularyEmbedder();
    retriever = new SemanticRetriever(store, embedder);
    await seed("A", A);
    await seed("B", B);
    await seed("C", C);
    await seed("D", B, "elsewhere");
  });

  afterEach(() => {
    store.close();
  });

  it("ranks by cosine similarity within the project", async () => {
    const outcome = await retriever.search({
      project: "test-project",
      query: "reconnection logic",
      limit: 5,
      threshold: 0.1,
    });
    assert.equal(outcome.mode, "semantic");
    assert.deepEqual(ids(outcome), ["B", "A"]);
    // one shared token: 1 / (sqrt(2) * sqrt(9)) and 1 / (sqrt(2) * sqrt(10))
    assert.ok(Math.abs(outcome.hits[0].similarity - 1 / Math.sqrt(18)) < 1e-6);
    assert.ok(Math.abs(outcome.hits[1].similarity - 1 / Math.sqrt(20)) < 1e-6);
  });

  it("falls back to keyword search when nothing clears the threshold", async () => {
    const outcome = await retriever.search({
      project: "test-project",
      query: "reconnection logic",
      limit: 5,
      threshold: 0.3,
    });
    assert.equal(outcome.mode, "lexical");
    assert.deepEqual(ids(outcome).slice(0, 2).sort(), ["A", "B"]);
    assert.deepEqual(ids(outcome).sort(), ["A", "B", "C"]);
  });

  it("falls back to keyword search when the query cannot be embedded", async () => {
    embedder.failWith = new Error("model offline");
    const outcome = await retriever.search({
      project: "test-project",
      query: "migration",
      limit: 1,
      threshold: 0.1,
    });
    assert.deepEqual(outcome, { mode: "lexical", hits: [{ unit: store.getById("C"), similarity: 0.5 }] });
  });

  it("propagates contract violations from the embedder", async () => {
    embedder.failWith = CarryoverError.contract("bad vector");
    await assert.rejects(retriever.embed("text"), isContractViolation);
  });

  it("returns null from embed when the model fails", async () => {
    embedder.failWith = new Error("model offline");
    assert.equal(await retriever.embed("text"), null);
  });

  it("makes registered units searchable", async () => {
    await retriever.search({ project: "test-project", query: "warmup", limit: 1, threshold: 0.1 });

    const embedding = await embedder.embed("Cache warmup runs before traffic");
    const unit = store.upsert(
      makeUnitInput({
        id: "E",
        content: "Cache warmup runs before traffic",
        embedding,
        embedding_model: embedder.modelName,
      }),
    );
    retriever.register(unit);

    const outcome = await retriever.search({
      project: "test-project",
      query: "cache warmup",
      limit: 1,
      threshold: 0.5,
    });
    assert.equal(outcome.mode, "semantic");
    assert.deepEqual(ids(outcome), ["E"]);
  });

  it("drops the old vector when a unit is saved again without one", async () => {
    await seed("X", "alpha beta");
    await retriever.search({ project: "test-project", query: "alpha beta", limit: 1, threshold: 0.9 });

    const moved = store.upsert(makeUnitInput({ id: "X", project: "elsewhere", content: "gamma delta" }));
    retriever.register(moved);

    const outcome = await retriever.search({
      project: "test-project",
      query: "alpha beta",
      limit: 5,
      threshold: 0.9,
    });
    assert.equal(outcome.mode, "lexical");
    assert.deepEqual(ids(outcome).sort(), ["A", "B", "C"]);
  });

  it("ignores units embedded by another model", async () => {
    await retriever.search({ project: "test-project", query: "warmup", limit: 1, threshold: 0.1 });

    const unit = store.upsert(
      makeUnitInput({
        id: "F",
        content: "Cache warmup",
        embedding: await embedder.embed("Cache warmup"),
        embedding_model: "another-model",
      }),
    );
    retriever.register(unit);

    const outcome = await retriever.search({
      project: "test-project",
      query: "cache warmup",
      limit: 5,
      threshold: 0.5,
    });
    assert.equal(outcome.mode, "lexical");
  });
});

describe("selectRetriever", () => {
  it("uses lexical search when semantic search is disabled", () => {
    const store = new KnowledgeStore(":memory:");
    const retriever = selectRetriever({
      config: makeConfig({ semantic_search: false }),
      store,
      embedder: new VocabularyEmbedder(),
    });
    assert.equal(retriever.mode, "lexical");
    store.close();
  });

  it("uses the given embedder when semantic search is enabled", () => {
    const store = new KnowledgeStore(":memory:");
    const retriever = selectRetriever({ config: makeConfig(), store, embedder: new VocabularyEmbedder() });
    assert.equal(retriever.mode, "semantic");
    store.close();
  });
});
