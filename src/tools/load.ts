import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { formatOverview } from "./format.js";
import { errorResult, resolveProjectArg, textResult } from "./helpers.js";

export function registerLoadTool(server: McpServer, service: KnowledgeService): void {
  server.tool(
    "load",
    "Load a project's context: statistics, latest continuation, recent units and an optional search",
    {
      project: z.string().optional().describe("Project name (default: detected from the working directory)"),
      recent: z.number().int().min(0).max(50).optional().describe("Number of recent units (default: search_limit)"),
      query: z.string().optional().describe("Also search the project for this query"),
    },
    async ({ project, recent, query }) => {
      const resolved = resolveProjectArg(project);
      if (!resolved.ok) return errorResult(resolved.error);

      const result = await service.overview(resolved.value, { recent, query });
      if (!result.ok) return errorResult(result.error);
      return textResult(formatOverview(result.value));
    },
  );
}
