#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { KnowledgeService } from "./knowledge/service.js";
import { createLogger, setLogLevel } from "./logger.js";
import { ContinuationStore } from "./store/continuation-store.js";
import { KnowledgeStore } from "./store/knowledge-store.js";
import { selectRetriever } from "./store/retriever.js";
import { detectProjectRoot, resolveDbPath } from "./store/scope.js";
import { registerClassifyTool } from "./tools/classify.js";
import { registerHandoffTool } from "./tools/handoff.js";
import { registerLoadTool } from "./tools/load.js";
import { registerProfileTool } from "./tools/profile.js";
import { registerRecallTool } from "./tools/recall.js";
import { registerResumeTool } from "./tools/resume.js";
import { registerSaveTool } from "./tools/save.js";

const log = createLogger("server");

const config = loadConfig(detectProjectRoot());
if (!process.env.CARRYOVER_LOG_LEVEL) {
  setLogLevel(config.log_level);
}

const dbPath = resolveDbPath();
const store = new KnowledgeStore(dbPath);
const continuations = new ContinuationStore(dbPath);
const retriever = selectRetriever({ config, store });
const service = new KnowledgeService({ store, continuations, retriever, config });

const mcpServer = new McpServer({
  name: "carryover",
  version: "0.1.0",
});

registerSaveTool(mcpServer, service);
registerRecallTool(mcpServer, service);
registerClassifyTool(mcpServer, service);
registerLoadTool(mcpServer, service);
registerHandoffTool(mcpServer, service);
registerResumeTool(mcpServer, service);
registerProfileTool(mcpServer, service);

async function main() {
  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);
  log.info(`listening on stdio (${retriever.mode} retrieval, ${dbPath})`);
}

main().catch((error) => {
  log.error("server error", error);
  store.close();
  continuations.close();
  process.exit(1);
});
