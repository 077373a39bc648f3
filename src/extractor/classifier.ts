import { z } from "zod";
import { KNOWLEDGE_TYPES, type KnowledgeType } from "../store/types.js";
import knowledgeTypesJson from "./knowledge-types.json" with { type: "json" };

const PATTERN_WEIGHT = 0.3;
const INDICATOR_WEIGHT = 0.7;
const DEFAULT_CONFIDENCE = 0.5;

const knowledgeTypeSchema = z.enum(KNOWLEDGE_TYPES);

const tableSchema = z.object({
  default: knowledgeTypeSchema,
  types: z
    .array(
      z.object({
        type: knowledgeTypeSchema,
        description: z.string(),
        weight: z.number().positive().max(1),
        patterns: z.array(z.string().min(1)).min(1),
        indicators: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
});

/** One compiled category of the classification table */
export interface KnowledgeTypeDefinition {
  readonly type: KnowledgeType;
  readonly description: string;
  readonly weight: number;
  readonly patterns: readonly RegExp[];
  /** Lowercased literal substrings */
  readonly indicators: readonly string[];
}

export interface KnowledgeTypeTable {
  readonly defaultType: KnowledgeType;
  /** Declaration order is tie-break order */
  readonly definitions: readonly KnowledgeTypeDefinition[];
}

export interface KnowledgeTypeScore {
  type: KnowledgeType;
  pattern_matches: number;
  indicator_matches: number;
  total_patterns: number;
  total_indicators: number;
  score: number;
}

export interface Classification {
  type: KnowledgeType;
  confidence: number;
}

export interface KnowledgeTypeAnalysis extends Classification {
  description: string;
  /** Every category, matched or not, in declaration order */
  scores: KnowledgeTypeScore[];
  content_length: number;
  line_count: number;
}

/**
 * Validate and compile a raw classification table.
 * Throws when the table is malformed: tables are shipped data, not input.
 */
export function compileKnowledgeTypeTable(raw: unknown): KnowledgeTypeTable {
  const parsed = tableSchema.parse(raw);
  const definitions = parsed.types.map((entry) =>
    Object.freeze({
      type: entry.type,
      description: entry.description,
      weight: entry.weight,
      patterns: Object.freeze(entry.patterns.map((p) => new RegExp(p, "i"))),
      indicators: Object.freeze(entry.indicators.map((i) => i.toLowerCase())),
    }),
  );
  return Object.freeze({
    defaultType: parsed.default,
    definitions: Object.freeze(definitions),
  });
}

export const DEFAULT_KNOWLEDGE_TYPES: KnowledgeTypeTable =
  compileKnowledgeTypeTable(knowledgeTypesJson);

function scoreDefinition(def: KnowledgeTypeDefinition, text: string, lower: string): KnowledgeTypeScore {
  const patternMatches = def.patterns.filter((p) => p.test(text)).length;
  const indicatorMatches = def.indicators.filter((i) => lower.includes(i)).length;

  let score = 0;
  if (patternMatches > 0 || indicatorMatches > 0) {
    const patternScore = patternMatches / def.patterns.length;
    const indicatorScore = indicatorMatches / def.indicators.length;
    score = (patternScore * PATTERN_WEIGHT + indicatorScore * INDICATOR_WEIGHT) * def.weight;
  }

  return {
    type: def.type,
    pattern_matches: patternMatches,
    indicator_matches: indicatorMatches,
    total_patterns: def.patterns.length,
    total_indicators: def.indicators.length,
    score,
  };
}

/** Score every category; only categories with at least one match are returned */
export function scoreKnowledgeTypes(
  text: string,
  table: KnowledgeTypeTable = DEFAULT_KNOWLEDGE_TYPES,
): KnowledgeTypeScore[] {
  return scoreAll(text, table).filter((s) => s.pattern_matches > 0 || s.indicator_matches > 0);
}

/**
 * Pick the best category for a text.
 * The first declared category wins a tie; without any signal the table's
 * default is returned with confidence 0.5.
 */
export function classify(
  text: string,
  table: KnowledgeTypeTable = DEFAULT_KNOWLEDGE_TYPES,
): Classification {
  return pickBest(scoreKnowledgeTypes(text, table), table);
}

export function analyzeKnowledgeType(
  text: string,
  table: KnowledgeTypeTable = DEFAULT_KNOWLEDGE_TYPES,
): KnowledgeTypeAnalysis {
  const scores = scoreAll(text, table);
  const best = pickBest(
    scores.filter((s) => s.pattern_matches > 0 || s.indicator_matches > 0),
    table,
  );
  return {
    ...best,
    description: describeKnowledgeType(best.type, table),
    scores,
    content_length: text.length,
    line_count: text.split("\n").length,
  };
}

export function listKnowledgeTypes(table: KnowledgeTypeTable = DEFAULT_KNOWLEDGE_TYPES): KnowledgeType[] {
  return table.definitions.map((d) => d.type);
}

export function describeKnowledgeType(
  type: string,
  table: KnowledgeTypeTable = DEFAULT_KNOWLEDGE_TYPES,
): string {
  return table.definitions.find((d) => d.type === type)?.description ?? "Unknown knowledge type";
}

function scoreAll(text: string, table: KnowledgeTypeTable): KnowledgeTypeScore[] {
  const lower = text.toLowerCase();
  return table.definitions.map((def) => scoreDefinition(def, text, lower));
}

function pickBest(scores: KnowledgeTypeScore[], table: KnowledgeTypeTable): Classification {
  let best: KnowledgeTypeScore | null = null;
  for (const s of scores) {
    // strict: an equal later score never displaces an earlier one
    if (s.score > 0 && (best === null || s.score > best.score)) {
      best = s;
    }
  }
  if (best === null) {
    return { type: table.defaultType, confidence: DEFAULT_CONFIDENCE };
  }
  return { type: best.type, confidence: best.score };
}

