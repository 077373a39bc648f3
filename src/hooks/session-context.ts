import { z } from "zod";
import type { KnowledgeService } from "../knowledge/service.js";
import { createLogger } from "../logger.js";
import { formatSnapshot } from "../tools/format.js";

const log = createLogger("session-start");

const hookInputSchema = z
  .object({
    cwd: z.string().optional(),
    session_id: z.string().optional(),
  })
  .passthrough();

export type HookInput = z.infer<typeof hookInputSchema>;

/** Parse the hook payload; blank or malformed input yields an empty payload */
export function parseHookInput(raw: string): HookInput {
  if (raw.trim().length === 0) return {};

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    log.warn("invalid JSON on stdin", err);
    return {};
  }
  const parsed = hookInputSchema.safeParse(json);
  if (!parsed.success) {
    log.warn("unexpected hook payload");
    return {};
  }
  return parsed.data;
}

/**
 * Context injected at session start: the project's latest continuation,
 * or null when there is nothing to resume.
 */
export async function buildResumeContext(
  service: KnowledgeService,
  project: string,
): Promise<string | null> {
  const result = await service.loadContinuation(project);
  if (!result.ok) {
    log.warn(`cannot load continuation for ${project}`, result.error);
    return null;
  }
  if (!result.value) return null;

  return [
    "[carryover] The previous session left a continuation for this project.",
    "",
    formatSnapshot(result.value),
    "",
    'When this work is finished, run the `resume` tool with action "clear".',
  ].join("\n");
}
