import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { analyzeKnowledgeType } from "../src/extractor/classifier.js";
import type { ContinuationSnapshot, KnowledgeUnit, ParsedContinuation } from "../src/store/types.js";
import {
  formatActiveContinuations,
  formatClassification,
  formatContinuation,
  formatPosition,
  formatSearch,
  formatSnapshot,
  formatStats,
  formatTags,
  formatUnit,
} from "../src/tools/format.js";

const FULL: ParsedContinuation = {
  status: "Refactor cache layer",
  position: { file: "cache.ts", line: 42, function: "evict" },
  problem: "Stale reads",
  tried: ["bigger TTL"],
  next: ["add test", "measure hit rate"],
  todo: ["document TTL"],
  context: "Part of perf work",
  timestamp: "2026-03-01T09:00:00.000Z",
  raw_sections: {},
};

const MINIMAL: ParsedContinuation = {
  status: "Continuation session",
  position: {},
  problem: "",
  tried: [],
  next: [],
  todo: [],
  context: "",
  timestamp: "2026-03-01T09:00:00.000Z",
  raw_sections: {},
};

function unit(overrides: Partial<KnowledgeUnit> = {}): KnowledgeUnit {
  return {
    id: "u1",
    project: "app",
    content: "  line one\n\n  line two ",
    knowledge_type: "schema",
    confidence: 0.75,
    tags: [
      { tag: "db", confidence: 0.8 },
      { tag: "sql", confidence: 0.5 },
    ],
    embedding: null,
    embedding_model: null,
    created_at: "2026-03-01T09:00:00.000Z",
    updated_at: "2026-03-01T09:00:00.000Z",
    ...overrides,
  };
}

describe("formatPosition", () => {
  it("joins file, line and function", () => {
    assert.equal(formatPosition({ file: "cache.ts", line: 42, function: "evict" }), "cache.ts:42 - evict()");
    assert.equal(formatPosition({ file: "config.json" }), "config.json");
    assert.equal(formatPosition({}), "");
  });
});

describe("formatTags", () => {
  it("shows confidences with two decimals", () => {
    assert.equal(
      formatTags([
        { tag: "python", confidence: 0.8 },
        { tag: "v2.1", confidence: 0.6 },
      ]),
      "python (0.80), v2.1 (0.60)",
    );
  });
});

describe("formatContinuation", () => {
  it("renders every part", () => {
    assert.equal(
      formatContinuation(FULL),
      [
        "Current task: Refactor cache layer",
        "Position: cache.ts:42 - evict()",
        "Blocked by: Stale reads",
        "Already tried:",
        "  x bigger TTL",
        "Next steps:",
        "  -> add test",
        "  -> measure hit rate",
        "Todo:",
        "  [ ] document TTL",
        "Context: Part of perf work",
      ].join("\n"),
    );
  });

  it("leaves out empty parts", () => {
    assert.equal(formatContinuation(MINIMAL), "Current task: Continuation session");
  });
});

describe("formatSnapshot", () => {
  const snapshot: ContinuationSnapshot = {
    project: "app",
    continuation: MINIMAL,
    saved_at: "2026-03-01T09:00:00.000Z",
    age_days: 9,
    stale: true,
    history_count: 2,
  };

  it("warns about stale snapshots", () => {
    assert.equal(
      formatSnapshot(snapshot),
      [
        "Note: this continuation is 9 days old.",
        "## Continuation: app",
        "Current task: Continuation session",
        "Saved 2026-03-01T09:00:00.000Z (2 in history)",
      ].join("\n\n"),
    );
  });

  it("omits the warning for fresh snapshots", () => {
    const fresh = formatSnapshot({ ...snapshot, stale: false, age_days: 0 });
    assert.ok(fresh.startsWith("## Continuation: app\n\n"));
  });
});

describe("formatUnit", () => {
  it("flattens the preview and lists tags", () => {
    assert.equal(
      formatUnit(unit(), 0),
      "1. [schema] (confidence: 0.75) u1\n   line one line two\n   tags: db, sql",
    );
  });

  it("shows similarity when given", () => {
    assert.equal(
      formatUnit(unit({ tags: [] }), 1, 0.5),
      "2. [schema] (similarity: 0.50) u1\n   line one line two",
    );
  });

  it("truncates long content", () => {
    const preview = formatUnit(unit({ content: "x".repeat(250), tags: [] }), 0).split("\n")[1];
    assert.equal(preview, `   ${"x".repeat(200)}...`);
  });
});

describe("formatSearch", () => {
  it("reports an empty result", () => {
    assert.equal(formatSearch({ mode: "semantic", hits: [] }), "No matching knowledge found.");
  });

  it("labels the retrieval mode", () => {
    const hits = [{ unit: unit({ tags: [] }), similarity: 0.5 }];
    assert.equal(
      formatSearch({ mode: "lexical", hits }),
      "Keyword matches (semantic ranking unavailable):\n\n1. [schema] (similarity: 0.50) u1\n   line one line two",
    );
    assert.ok(formatSearch({ mode: "semantic", hits }).startsWith("Semantic matches:\n\n"));
  });
});

describe("formatClassification", () => {
  it("explains a default classification", () => {
    const text = "python python";
    assert.equal(
      formatClassification({
        analysis: analyzeKnowledgeType(text),
        tags: [{ tag: "python", confidence: 0.8 }],
      }),
      [
        "Type: implementation (confidence: 0.50)",
        "Code implementations and algorithms",
        "Tags: python (0.80)",
        "Length: 13 chars, 1 lines",
        "Scores:",
        "  (no signals, default type)",
      ].join("\n"),
    );
  });
});

describe("formatStats", () => {
  it("lists totals and the type breakdown", () => {
    assert.equal(
      formatStats("Knowledge", {
        total: 3,
        byType: { schema: 2, implementation: 1 },
        first_activity: "2026-03-01T09:00:00.000Z",
        last_activity: "2026-03-02T09:00:00.000Z",
      }),
      [
        "## Knowledge",
        "Total: 3",
        "Active: 2026-03-01T09:00:00.000Z .. 2026-03-02T09:00:00.000Z",
        "",
        "By type:",
        "  schema: 2",
        "  implementation: 1",
      ].join("\n"),
    );
  });

  it("handles an empty store", () => {
    assert.equal(
      formatStats("Knowledge", { total: 0, byType: {}, first_activity: null, last_activity: null }),
      "## Knowledge\nTotal: 0\n\nBy type:\n  (empty)",
    );
  });
});

describe("formatActiveContinuations", () => {
  it("lists one line per project", () => {
    assert.equal(
      formatActiveContinuations([
        { project: "web", status: "Batching", saved_at: "2026-03-01T09:00:00.000Z", has_problem: true },
        { project: "api", status: "Profiling", saved_at: "2026-02-28T09:00:00.000Z", has_problem: false },
      ]),
      "- web: Batching (saved 2026-03-01T09:00:00.000Z, blocked)\n- api: Profiling (saved 2026-02-28T09:00:00.000Z)",
    );
  });

  it("reports when nothing is active", () => {
    assert.equal(formatActiveContinuations([]), "No active continuations.");
  });
});
