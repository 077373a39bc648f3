import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { formatContinuation } from "./format.js";
import { errorResult, resolveProjectArg, textResult } from "./helpers.js";

export function registerHandoffTool(server: McpServer, service: KnowledgeService): void {
  server.tool(
    "handoff",
    "Save a continuation note (STATUS/POSITION/PROBLEM/TRIED/NEXT/TODO/CONTEXT) for the next session",
    {
      content: z.string().describe("Continuation note; English or German headers"),
      project: z.string().optional().describe("Project name (default: detected from the working directory)"),
    },
    async ({ content, project }) => {
      const resolved = resolveProjectArg(project);
      if (!resolved.ok) return errorResult(resolved.error);

      const result = await service.saveContinuation({ project: resolved.value, content });
      if (!result.ok) return errorResult(result.error);

      const { snapshot, unit } = result.value;
      return textResult(
        [
          `Continuation saved for ${snapshot.project} (${snapshot.history_count} in history, unit ${unit.id})`,
          "",
          formatContinuation(snapshot.continuation),
        ].join("\n"),
      );
    },
  );
}
