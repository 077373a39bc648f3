import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { formatSearch } from "./format.js";
import { errorResult, resolveProjectArg, textResult } from "./helpers.js";

export function registerRecallTool(server: McpServer, service: KnowledgeService): void {
  server.tool(
    "recall",
    "Search a project's knowledge by semantic similarity",
    {
      query: z.string().describe("Search query for knowledge retrieval"),
      project: z.string().optional().describe("Project name (default: detected from the working directory)"),
      limit: z
        .number()
        .int()
        .min(1)
        .max(50)
        .optional()
        .describe("Max results (default: search_limit from config)"),
      threshold: z
        .number()
        .min(0)
        .max(1)
        .optional()
        .describe("Minimum similarity (default: similarity_threshold from config)"),
    },
    async ({ query, project, limit, threshold }) => {
      const resolved = resolveProjectArg(project);
      if (!resolved.ok) return errorResult(resolved.error);

      const result = await service.search({ project: resolved.value, query, limit, threshold });
      if (!result.ok) return errorResult(result.error);
      return textResult(formatSearch(result.value));
    },
  );
}
