import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { formatClassification } from "./format.js";
import { errorResult, textResult } from "./helpers.js";

export function registerClassifyTool(server: McpServer, service: KnowledgeService): void {
  server.tool(
    "classify",
    "Show the knowledge type, per-type scores and tags for a text without storing it",
    {
      content: z.string().describe("Text to classify"),
    },
    async ({ content }) => {
      const result = service.classify(content);
      if (!result.ok) return errorResult(result.error);
      return textResult(formatClassification(result.value));
    },
  );
}
