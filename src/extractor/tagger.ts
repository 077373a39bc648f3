import { z } from "zod";
import { CarryoverError } from "../errors.js";
import type { ScoredTag } from "../store/types.js";
import tagPatternsJson from "./tag-patterns.json" with { type: "json" };

export const FILE_TAG_CONFIDENCE = 0.7;
export const VERSION_TAG_CONFIDENCE = 0.6;
export const ACRONYM_TAG_CONFIDENCE = 0.5;
export const FREQUENCY_TAG_CONFIDENCE = 0.5;
export const COMPOUND_TAG_CONFIDENCE = 0.6;

const MAX_FILE_TAGS = 3;
const MAX_VERSION_TAGS = 2;
const MAX_ACRONYM_TAGS = 3;
const MAX_ACRONYM_LENGTH = 5;
const FREQUENCY_CANDIDATES = 10;
const MAX_FREQUENCY_TAGS = 3;
const MAX_COMPOUND_TAGS = 5;

const FILE_RE =
  /\b([A-Za-z_][A-Za-z0-9_]*)\.(py|js|ts|tsx|jsx|cs|go|rs|java|md|txt|json|yaml|yml|toml|sql|sh)\b/g;
const VERSION_RE = /\bv(\d+\.\d+(?:\.\d+)?)/g;
const ACRONYM_RE = /\b[A-Z]{2,}\b/g;
const WORD_RE = /\b[a-z]{4,}\b/g;
const COMPOUND_RE = /\b([a-z]+[-_][a-z]+)\b/g;

const tagTableSchema = z.object({
  confidence: z.number().min(0).max(1),
  tags: z.array(
    z.object({
      tag: z.string().min(1),
      group: z.string(),
      patterns: z.array(z.string().min(1)).min(1),
    }),
  ),
  stopWords: z.array(z.string()),
});

interface PatternTag {
  readonly tag: string;
  readonly patterns: readonly RegExp[];
}

interface TagTable {
  readonly confidence: number;
  readonly tags: readonly PatternTag[];
  readonly stopWords: ReadonlySet<string>;
}

const TAG_TABLE: TagTable = compileTagTable(tagPatternsJson);

function compileTagTable(raw: unknown): TagTable {
  const parsed = tagTableSchema.parse(raw);
  return Object.freeze({
    confidence: parsed.confidence,
    tags: Object.freeze(
      parsed.tags.map((t) => ({
        tag: t.tag,
        patterns: Object.freeze(t.patterns.map((p) => new RegExp(p, "i"))),
      })),
    ),
    stopWords: new Set(parsed.stopWords),
  });
}

/** Lowercase, trim, and join words with underscores */
export function normalizeTag(text: string): string {
  return text.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/** Vocabulary tags: one per table entry with any matching pattern */
export function extractPatternTags(text: string): ScoredTag[] {
  return TAG_TABLE.tags
    .filter((entry) => entry.patterns.some((p) => p.test(text)))
    .map((entry) => ({ tag: entry.tag, confidence: TAG_TABLE.confidence }));
}

/** Filenames, version numbers and short acronyms */
export function extractTokenShapeTags(text: string): ScoredTag[] {
  const tags: ScoredTag[] = [];

  for (const m of [...text.matchAll(FILE_RE)].slice(0, MAX_FILE_TAGS)) {
    tags.push({ tag: m[0].toLowerCase().replace(/\./g, "_"), confidence: FILE_TAG_CONFIDENCE });
  }

  for (const m of [...text.toLowerCase().matchAll(VERSION_RE)].slice(0, MAX_VERSION_TAGS)) {
    tags.push({ tag: `v${m[1]}`, confidence: VERSION_TAG_CONFIDENCE });
  }

  const acronyms = new Set(
    [...text.matchAll(ACRONYM_RE)]
      .map((m) => m[0])
      .filter((a) => a.length <= MAX_ACRONYM_LENGTH),
  );
  for (const acronym of [...acronyms].slice(0, MAX_ACRONYM_TAGS)) {
    tags.push({ tag: acronym.toLowerCase(), confidence: ACRONYM_TAG_CONFIDENCE });
  }

  return tags;
}

/** Repeated words of four letters or more, most frequent first */
export function extractFrequencyTags(text: string): ScoredTag[] {
  const counts = new Map<string, number>();
  for (const m of text.toLowerCase().matchAll(WORD_RE)) {
    counts.set(m[0], (counts.get(m[0]) ?? 0) + 1);
  }

  // Array.prototype.sort is stable, so equal counts keep first-seen order
  const ranked = [...counts].sort((a, b) => b[1] - a[1]).slice(0, FREQUENCY_CANDIDATES);

  return ranked
    .filter(([word, count]) => !TAG_TABLE.stopWords.has(word) && count > 1)
    .slice(0, MAX_FREQUENCY_TAGS)
    .map(([word]) => ({ tag: word, confidence: FREQUENCY_TAG_CONFIDENCE }));
}

/** Hyphen- or underscore-joined word pairs */
export function extractCompoundTags(text: string): ScoredTag[] {
  return [...text.toLowerCase().matchAll(COMPOUND_RE)]
    .slice(0, MAX_COMPOUND_TAGS)
    .map((m) => m[1])
    .filter((compound) => compound.length > 3)
    .map((compound) => ({ tag: compound.replace(/-/g, "_"), confidence: COMPOUND_TAG_CONFIDENCE }));
}

/**
 * Generate up to `maxTags` tags, confidence descending.
 *
 * All four strategies run over the same text; a tag found by several of
 * them keeps its highest confidence.
 */
export function generateTags(text: string, maxTags = 5): ScoredTag[] {
  if (!Number.isInteger(maxTags) || maxTags < 0) {
    throw CarryoverError.contract(`maxTags must be a non-negative integer, got ${maxTags}`);
  }

  const candidates = [
    ...extractPatternTags(text),
    ...extractTokenShapeTags(text),
    ...extractFrequencyTags(text),
    ...extractCompoundTags(text),
  ];

  const merged = new Map<string, number>();
  for (const { tag, confidence } of candidates) {
    const key = normalizeTag(tag);
    if (key.length === 0) continue;
    merged.set(key, Math.max(merged.get(key) ?? 0, confidence));
  }

  return [...merged]
    .map(([tag, confidence]) => ({ tag, confidence }))
    .sort((a, b) => b.confidence - a.confidence)
    .slice(0, maxTags);
}
