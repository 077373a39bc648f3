import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { formatStats } from "./format.js";
import { errorResult, textResult } from "./helpers.js";
import { resolveProject } from "../store/scope.js";

export function registerProfileTool(server: McpServer, service: KnowledgeService): void {
  server.tool(
    "profile",
    "View knowledge statistics across projects and for the current project",
    {
      project: z.string().optional().describe("Project name (default: detected from the working directory)"),
    },
    async ({ project }) => {
      const totals = await service.stats();
      if (!totals.ok) return errorResult(totals.error);
      const projects = await service.listProjects();
      if (!projects.ok) return errorResult(projects.error);

      const sections = [
        formatStats("All projects", totals.value),
        `Projects: ${projects.value.length > 0 ? projects.value.join(", ") : "(none)"}`,
        `Retrieval: ${service.mode}`,
      ];

      const current = resolveProject(project);
      if (current) {
        const overview = await service.overview(current, { recent: 0 });
        if (!overview.ok) return errorResult(overview.error);
        sections.push(formatStats(`Project: ${current}`, overview.value.stats));
      }

      return textResult(sections.join("\n\n"));
    },
  );
}
