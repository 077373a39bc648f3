import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { KnowledgeService } from "../src/knowledge/service.js";
import { ContinuationStore } from "../src/store/continuation-store.js";
import { KnowledgeStore } from "../src/store/knowledge-store.js";
import { SemanticRetriever } from "../src/store/retriever.js";
import { registerClassifyTool } from "../src/tools/classify.js";
import { registerHandoffTool } from "../src/tools/handoff.js";
import type { ToolResult } from "../src/tools/helpers.js";
import { registerLoadTool } from "../src/tools/load.js";
import { registerProfileTool } from "../src/tools/profile.js";
import { registerRecallTool } from "../src/tools/recall.js";
import { registerResumeTool } from "../src/tools/resume.js";
import { registerSaveTool } from "../src/tools/save.js";
import { VocabularyEmbedder } from "./helpers/fake-embedder.js";
import { makeClock, makeConfig } from "./helpers/factories.js";
import { createMockServer } from "./helpers/mock-server.js";

const MIGRATION = "Database migration adds foreign key constraint to orders table";
const NOTE = "STATUS: Migrating billing\nNEXT:\n- backfill invoices";

function text(result: ToolResult): string {
  return result.content.map((c) => c.text).join("\n");
}

describe("MCP tools", () => {
  let store: KnowledgeStore;
  let continuations: ContinuationStore;
  let call: ReturnType<typeof createMockServer>["call"];

  beforeEach(() => {
    const clock = makeClock();
    store = new KnowledgeStore(":memory:", clock.now);
    continuations = new ContinuationStore(":memory:", clock.now);
    const service = new KnowledgeService({
      store,
      continuations,
      retriever: new SemanticRetriever(store, new VocabularyEmbedder()),
      config: makeConfig(),
      clock: clock.now,
    });

    const mock = createMockServer();
    registerSaveTool(mock.server, service);
    registerRecallTool(mock.server, service);
    registerClassifyTool(mock.server, service);
    registerLoadTool(mock.server, service);
    registerHandoffTool(mock.server, service);
    registerResumeTool(mock.server, service);
    registerProfileTool(mock.server, service);
    call = mock.call;
  });

  afterEach(() => {
    store.close();
    continuations.close();
  });

  describe("save", () => {
    it("reports the stored unit", async () => {
      const first = await call("save", { content: MIGRATION, project: "App", id: "unit-1" });
      assert.equal(
        text(first),
        "Saved [implementation] unit-1 in app (confidence: 0.50)\nTags: database (0.80)",
      );

      const second = await call("save", { content: MIGRATION, project: "app", id: "unit-1" });
      assert.ok(text(second).startsWith("Updated [implementation] unit-1 in app"));
    });

    it("returns validation errors as error results", async () => {
      assert.deepEqual(await call("save", { content: "  ", project: "app" }), {
        content: [{ type: "text", text: "Error (VALIDATION_ERROR): content is required" }],
        isError: true,
      });
    });
  });

  it("recalls saved knowledge", async () => {
    await call("save", { content: MIGRATION, project: "app", id: "unit-1" });
    const result = await call("recall", { query: "migration", project: "app" });
    assert.equal(
      text(result),
      [
        "Semantic matches:",
        "",
        "1. [implementation] (similarity: 0.33) unit-1",
        `   ${MIGRATION}`,
        "   tags: database",
      ].join("\n"),
    );
  });

  it("classifies without storing", async () => {
    const result = await call("classify", { content: "python python" });
    assert.equal(
      text(result),
      [
        "Type: implementation (confidence: 0.50)",
        "Code implementations and algorithms",
        "Tags: python (0.80)",
        "Length: 13 chars, 1 lines",
        "Scores:",
        "  (no signals, default type)",
      ].join("\n"),
    );
    assert.equal(store.stats().total, 0);
  });

  it("hands off and resumes a continuation", async () => {
    const saved = text(await call("handoff", { content: NOTE, project: "app" })).split("\n");
    assert.match(saved[0], /^Continuation saved for app \(1 in history, unit [0-9a-f-]{36}\)$/);
    assert.deepEqual(saved.slice(1), ["", "Current task: Migrating billing", "Next steps:", "  -> backfill invoices"]);

    assert.equal(
      text(await call("resume", { project: "app" })),
      [
        "## Continuation: app",
        "",
        "Current task: Migrating billing",
        "Next steps:",
        "  -> backfill invoices",
        "",
        "Saved 2026-03-01T09:00:00.000Z (1 in history)",
      ].join("\n"),
    );
    assert.equal(
      text(await call("resume", { action: "list" })),
      "- app: Migrating billing (saved 2026-03-01T09:00:00.000Z)",
    );
    assert.equal(text(await call("resume", { action: "clear", project: "app" })), "Cleared continuation for app.");
    assert.equal(
      text(await call("resume", { action: "show", project: "app" })),
      "No active continuation found for project: app",
    );
  });

  it("loads a project overview", async () => {
    await call("save", { content: MIGRATION, project: "app", id: "unit-1" });
    const overview = text(await call("load", { project: "app", recent: 1 }));
    assert.ok(overview.startsWith("## Project: app\nTotal: 1\n"));
    assert.ok(overview.includes("## Recent\n\n1. [implementation] (confidence: 0.50) unit-1\n"));
  });

  it("profiles all projects and the current one", async () => {
    await call("save", { content: MIGRATION, project: "app", id: "unit-1" });
    const stats = [
      "Total: 1",
      "Active: 2026-03-01T09:00:00.000Z .. 2026-03-01T09:00:00.000Z",
      "",
      "By type:",
      "  implementation: 1",
    ].join("\n");

    assert.equal(
      text(await call("profile", { project: "app" })),
      [`## All projects\n${stats}`, "Projects: app", "Retrieval: semantic", `## Project: app\n${stats}`].join(
        "\n\n",
      ),
    );
  });
});
