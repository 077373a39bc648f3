import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { createLogger } from "./logger.js";
import { carryoverHome } from "./store/scope.js";

const log = createLogger("config");

const configSchema = z.object({
  /** Model id for the feature-extraction pipeline */
  embedding_model: z.string().min(1),
  /** Length of every embedding vector */
  embedding_dimensions: z.number().int().positive(),
  /** false = start with the lexical retriever only */
  semantic_search: z.boolean(),
  /** Default minimum similarity for semantic search */
  similarity_threshold: z.number().min(0).max(1),
  /** Default number of search results */
  search_limit: z.number().int().min(1).max(50),
  /** Default number of tags per knowledge unit */
  max_tags: z.number().int().min(1).max(20),
  /** Continuations older than this are flagged stale */
  continuation_stale_days: z.number().int().min(1),
  log_level: z.enum(["debug", "info", "warn", "error"]),
});

/** Carryover configuration */
export type CarryoverConfig = z.infer<typeof configSchema>;

const partialConfigSchema = configSchema.partial();

export const DEFAULT_CONFIG: Readonly<CarryoverConfig> = {
  embedding_model: "Xenova/all-MiniLM-L6-v2",
  embedding_dimensions: 384,
  semantic_search: true,
  similarity_threshold: 0.3,
  search_limit: 5,
  max_tags: 5,
  continuation_stale_days: 7,
  log_level: "info",
};

function loadJsonFile(path: string): Partial<CarryoverConfig> {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    log.warn(`ignoring unreadable config ${path}`, err);
    return {};
  }

  const parsed = partialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`ignoring invalid config ${path}`, parsed.error.issues.map((i) => i.path.join(".")));
    return {};
  }
  return parsed.data;
}

/**
 * Load config with priority: project > global > defaults.
 * Missing fields fall back to the next level.
 */
export function loadConfig(
  projectRoot?: string | null,
  home: string = carryoverHome(),
): CarryoverConfig {
  const globalConf = loadJsonFile(join(home, "config.json"));

  let projectConf: Partial<CarryoverConfig> = {};
  if (projectRoot) {
    projectConf = loadJsonFile(join(projectRoot, ".carryover", "config.json"));
  }

  return { ...DEFAULT_CONFIG, ...globalConf, ...projectConf };
}
