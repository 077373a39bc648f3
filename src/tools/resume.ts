import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { formatActiveContinuations, formatSnapshot } from "./format.js";
import { errorResult, resolveProjectArg, textResult } from "./helpers.js";

export function registerResumeTool(server: McpServer, service: KnowledgeService): void {
  server.tool(
    "resume",
    "Show, list or clear saved continuations",
    {
      action: z
        .enum(["show", "list", "clear"])
        .optional()
        .describe("show: latest continuation of the project (default), list: all projects, clear: drop the project's continuation"),
      project: z.string().optional().describe("Project name (default: detected from the working directory)"),
    },
    async ({ action, project }) => {
      if (action === "list") {
        const result = await service.listContinuations();
        if (!result.ok) return errorResult(result.error);
        return textResult(formatActiveContinuations(result.value));
      }

      const resolved = resolveProjectArg(project);
      if (!resolved.ok) return errorResult(resolved.error);

      if (action === "clear") {
        const result = await service.clearContinuation(resolved.value);
        if (!result.ok) return errorResult(result.error);
        return textResult(
          result.value
            ? `Cleared continuation for ${resolved.value}.`
            : `No continuation to clear for ${resolved.value}.`,
        );
      }

      const result = await service.loadContinuation(resolved.value);
      if (!result.ok) return errorResult(result.error);
      if (!result.value) {
        return textResult(`No active continuation found for project: ${resolved.value}`);
      }
      return textResult(formatSnapshot(result.value));
    },
  );
}
