import type { ClassifyResult, ProjectOverview } from "../knowledge/service.js";
import type { ActiveContinuation } from "../store/continuation-store.js";
import type { SearchOutcome } from "../store/retriever.js";
import type {
  ContinuationSnapshot,
  KnowledgeStats,
  KnowledgeUnit,
  ParsedContinuation,
  Position,
  ScoredTag,
} from "../store/types.js";

const PREVIEW_LENGTH = 200;

/** `file:line - fn()`, or an empty string without a file */
export function formatPosition(position: Readonly<Position>): string {
  if (!position.file) return "";
  let location = position.file;
  if (position.line !== undefined) location += `:${position.line}`;
  if (position.function) location += ` - ${position.function}()`;
  return location;
}

export function formatTags(tags: ScoredTag[]): string {
  return tags.map((t) => `${t.tag} (${t.confidence.toFixed(2)})`).join(", ");
}

/** Display form of a continuation; empty parts are left out */
export function formatContinuation(c: ParsedContinuation): string {
  const lines: string[] = [`Current task: ${c.status}`];

  const position = formatPosition(c.position);
  if (position) lines.push(`Position: ${position}`);
  if (c.problem) lines.push(`Blocked by: ${c.problem}`);

  const list = (title: string, items: readonly string[], marker: string): void => {
    if (items.length === 0) return;
    lines.push(`${title}:`);
    for (const item of items) lines.push(`  ${marker} ${item}`);
  };
  list("Already tried", c.tried, "x");
  list("Next steps", c.next, "->");
  list("Todo", c.todo, "[ ]");

  if (c.context) lines.push(`Context: ${c.context}`);
  return lines.join("\n");
}

export function formatSnapshot(snapshot: ContinuationSnapshot): string {
  const parts: string[] = [];
  if (snapshot.stale) {
    parts.push(`Note: this continuation is ${snapshot.age_days} days old.`);
  }
  parts.push(`## Continuation: ${snapshot.project}`);
  parts.push(formatContinuation(snapshot.continuation));
  parts.push(`Saved ${snapshot.saved_at} (${snapshot.history_count} in history)`);
  return parts.join("\n\n");
}

function preview(content: string): string {
  const flat = content.trim().replace(/\s+/g, " ");
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH)}...` : flat;
}

export function formatUnit(unit: KnowledgeUnit, index: number, similarity?: number): string {
  const score =
    similarity === undefined ? `confidence: ${unit.confidence.toFixed(2)}` : `similarity: ${similarity.toFixed(2)}`;
  const lines = [`${index + 1}. [${unit.knowledge_type}] (${score}) ${unit.id}`, `   ${preview(unit.content)}`];
  if (unit.tags.length > 0) {
    lines.push(`   tags: ${unit.tags.map((t) => t.tag).join(", ")}`);
  }
  return lines.join("\n");
}

export function formatSearch(outcome: SearchOutcome): string {
  if (outcome.hits.length === 0) return "No matching knowledge found.";
  const header =
    outcome.mode === "lexical" ? "Keyword matches (semantic ranking unavailable):" : "Semantic matches:";
  const body = outcome.hits.map((hit, i) => formatUnit(hit.unit, i, hit.similarity)).join("\n\n");
  return `${header}\n\n${body}`;
}

export function formatClassification(result: ClassifyResult): string {
  const { analysis, tags } = result;
  const lines = [
    `Type: ${analysis.type} (confidence: ${analysis.confidence.toFixed(2)})`,
    analysis.description,
    `Tags: ${tags.length > 0 ? formatTags(tags) : "(none)"}`,
    `Length: ${analysis.content_length} chars, ${analysis.line_count} lines`,
  ];

  const matched = analysis.scores.filter((s) => s.pattern_matches > 0 || s.indicator_matches > 0);
  lines.push("Scores:");
  if (matched.length === 0) {
    lines.push("  (no signals, default type)");
  }
  for (const s of matched) {
    lines.push(
      `  ${s.type}: patterns ${s.pattern_matches}/${s.total_patterns}, indicators ${s.indicator_matches}/${s.total_indicators}, score ${s.score.toFixed(3)}`,
    );
  }
  return lines.join("\n");
}

export function formatStats(title: string, stats: KnowledgeStats): string {
  const lines = [`## ${title}`, `Total: ${stats.total}`];
  if (stats.first_activity && stats.last_activity) {
    lines.push(`Active: ${stats.first_activity} .. ${stats.last_activity}`);
  }
  const breakdown = Object.entries(stats.byType).map(([type, count]) => `  ${type}: ${count}`);
  lines.push("", "By type:", breakdown.length > 0 ? breakdown.join("\n") : "  (empty)");
  return lines.join("\n");
}

export function formatOverview(overview: ProjectOverview): string {
  const sections = [formatStats(`Project: ${overview.project}`, overview.stats)];

  if (overview.continuation) {
    sections.push(formatSnapshot(overview.continuation));
  }
  if (overview.recent.length > 0) {
    sections.push(`## Recent\n\n${overview.recent.map((u, i) => formatUnit(u, i)).join("\n\n")}`);
  }
  if (overview.search) {
    sections.push(`## Search\n\n${formatSearch(overview.search)}`);
  }
  return sections.join("\n\n");
}

export function formatActiveContinuations(active: ActiveContinuation[]): string {
  if (active.length === 0) return "No active continuations.";
  return active
    .map((a) => `- ${a.project}: ${a.status} (saved ${a.saved_at}${a.has_problem ? ", blocked" : ""})`)
    .join("\n");
}
