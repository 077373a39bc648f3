import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { formatTags } from "./format.js";
import { errorResult, resolveProjectArg, textResult } from "./helpers.js";

export function registerSaveTool(server: McpServer, service: KnowledgeService): void {
  server.tool(
    "save",
    "Store a piece of session content as a classified, tagged knowledge unit",
    {
      content: z.string().describe("Text to store"),
      project: z.string().optional().describe("Project name (default: detected from the working directory)"),
      id: z.string().optional().describe("Existing unit id to replace (re-classifies it)"),
    },
    async ({ content, project, id }) => {
      const resolved = resolveProjectArg(project);
      if (!resolved.ok) return errorResult(resolved.error);

      const result = await service.save({ project: resolved.value, content, id });
      if (!result.ok) return errorResult(result.error);

      const { unit, created } = result.value;
      const lines = [
        `${created ? "Saved" : "Updated"} [${unit.knowledge_type}] ${unit.id} in ${unit.project} (confidence: ${unit.confidence.toFixed(2)})`,
        `Tags: ${unit.tags.length > 0 ? formatTags(unit.tags) : "(none)"}`,
      ];
      if (!unit.embedding) {
        lines.push("Stored without an embedding; keyword search only.");
      }
      return textResult(lines.join("\n"));
    },
  );
}
