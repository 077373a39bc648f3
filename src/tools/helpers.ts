import { CarryoverError, Err, Ok, type Result } from "../errors.js";
import { resolveProject } from "../store/scope.js";

/** Text-only tool result, as every carryover tool returns */
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }] };
}

export function errorResult(error: CarryoverError): ToolResult {
  return {
    content: [{ type: "text" as const, text: `Error (${error.code}): ${error.message}` }],
    isError: true,
  };
}

/**
 * Resolve the project for a tool call: explicit argument first, then the
 * project root detected from the working directory.
 */
export function resolveProjectArg(project: string | undefined, cwd?: string): Result<string> {
  const resolved = resolveProject(project, cwd);
  if (!resolved) {
    return Err(
      CarryoverError.validation(
        "project is required: pass `project` or run inside a project directory",
      ),
    );
  }
  return Ok(resolved);
}
