import type { ParsedContinuation, Position, SectionMap } from "../store/types.js";
import { firstNonEmptyLine, parseSections } from "./sections.js";

export const DEFAULT_STATUS = "Continuation session";

const FILE_LINE_RE = /([^:]+?):(\d+)/;
const FUNCTION_RE = /-\s*(\w+)\s*\(/;
const BULLET_RE = /^[\s\-*•·→>]+/;
const NUMBERING_RE = /^\d+[.)]\s*/;

/**
 * Parse a continuation note into its canonical record.
 *
 * Example input:
 *   STATUS: WebSocket reconnection
 *   POSITION: channel_manager.py:245 - reconnect()
 *   NEXT:
 *   - exponential backoff
 */
export function parseContinuation(text: string, now: Date = new Date()): ParsedContinuation {
  const sections = parseSections(text);
  const section = (name: string): string => sections.get(name) ?? "";

  // status is a single line; further STATUS lines stay in raw_sections
  const status =
    firstNonEmptyLine(section("STATUS")) || firstNonEmptyLine(text, true) || DEFAULT_STATUS;

  return Object.freeze({
    status,
    position: parsePosition(section("POSITION")),
    problem: section("PROBLEM"),
    tried: parseList(section("TRIED")),
    next: parseList(section("NEXT")),
    todo: parseList(section("TODO")),
    context: section("CONTEXT"),
    timestamp: now.toISOString(),
    raw_sections: sectionsToRecord(sections),
  });
}

/**
 * Parse position text.
 *
 * "main.py:123 - handler()" -> { file, line, function }
 * "src/module.py:45"        -> { file, line }
 * "config.json"             -> { file }
 */
export function parsePosition(text: string): Position {
  const trimmed = text.trim();
  if (trimmed.length === 0) return {};

  const match = FILE_LINE_RE.exec(trimmed);
  if (!match) {
    return { file: trimmed };
  }

  const position: Position = {
    file: match[1].trim(),
    line: Number.parseInt(match[2], 10),
  };
  const fn = FUNCTION_RE.exec(trimmed);
  if (fn) {
    position.function = fn[1];
  }
  return position;
}

/** Split a section body into items, dropping bullets and numbering */
export function parseList(text: string): string[] {
  const items: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const cleaned = line.trim().replace(BULLET_RE, "").replace(NUMBERING_RE, "").trim();
    if (cleaned.length > 0) {
      items.push(cleaned);
    }
  }
  return items;
}

function sectionsToRecord(sections: SectionMap): Readonly<Record<string, string>> {
  return Object.freeze(Object.fromEntries(sections));
}
