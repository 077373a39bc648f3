import type { CanonicalSection, SectionMap } from "../store/types.js";

/**
 * Header spellings per canonical section (English and German).
 * Adding a language variant is a change to this table only.
 */
export const SECTION_SPELLINGS: Readonly<Record<CanonicalSection, readonly string[]>> = {
  STATUS: ["STATUS", "WAS", "AUFGABE", "TASK"],
  POSITION: ["POSITION", "WO", "WHERE", "STELLE"],
  PROBLEM: ["PROBLEM", "BLOCKER", "ISSUE", "FEHLER"],
  TRIED: ["TRIED", "VERSUCHT", "ATTEMPTED", "PROBIERT"],
  NEXT: ["NEXT", "NÄCHSTE", "WEITER"],
  TODO: ["TODO", "TODOS", "AUFGABEN", "TASKS"],
  CONTEXT: ["CONTEXT", "KONTEXT", "INFO", "ZUSATZ"],
};

const CANONICAL_ORDER: readonly CanonicalSection[] = [
  "STATUS",
  "POSITION",
  "PROBLEM",
  "TRIED",
  "NEXT",
  "TODO",
  "CONTEXT",
];

/** Reverse index: uppercased spelling -> canonical section */
const SPELLING_INDEX: ReadonlyMap<string, CanonicalSection> = new Map(
  CANONICAL_ORDER.flatMap((canonical) =>
    SECTION_SPELLINGS[canonical].map((spelling) => [spelling.toUpperCase(), canonical] as const),
  ),
);

const KNOWN_HEADER_RE = buildKnownHeaderPattern();
const UNKNOWN_HEADER_RE = /^([A-ZÄÖÜ][A-ZÄÖÜ0-9_]+):\s*(.*)$/;

/** Canonical section for a header keyword, or null when the keyword is not in the table */
export function canonicalSection(keyword: string): CanonicalSection | null {
  return SPELLING_INDEX.get(keyword.trim().toUpperCase()) ?? null;
}

/** All spellings that map to a canonical section */
export function sectionSpellings(section: CanonicalSection): readonly string[] {
  return SECTION_SPELLINGS[section];
}

interface HeaderMatch {
  name: string;
  /** Text after the colon, trimmed */
  rest: string;
  known: boolean;
}

/** Match a single line against known and unknown header shapes */
export function matchHeader(line: string): HeaderMatch | null {
  const trimmed = line.trim();

  const known = KNOWN_HEADER_RE.exec(trimmed);
  if (known) {
    const canonical = canonicalSection(known[1]);
    if (canonical) {
      return { name: canonical, rest: known[2].trim(), known: true };
    }
  }

  const unknown = UNKNOWN_HEADER_RE.exec(trimmed);
  if (unknown) {
    return { name: unknown[1], rest: unknown[2].trim(), known: false };
  }

  return null;
}

/**
 * Split a note into named sections.
 *
 * A header is a known spelling (any case) or an all-caps word, followed by
 * a colon. Text after the colon opens the section body; following lines
 * are appended as they are. Lines before the first header are dropped.
 * Without any recognized header, STATUS is the first non-empty line.
 */
export function parseSections(text: string): SectionMap {
  const sections: SectionMap = new Map();
  let current: string | null = null;
  let body: string[] = [];
  let recognized = 0;

  const flush = (): void => {
    if (current === null) return;
    const content = body.join("\n").trim();
    const existing = sections.get(current);
    // a repeated header extends the section it repeats
    if (existing !== undefined && existing.length > 0) {
      sections.set(current, content.length > 0 ? `${existing}\n${content}` : existing);
    } else {
      sections.set(current, content);
    }
  };

  for (const line of text.split(/\r?\n/)) {
    const header = matchHeader(line);
    if (header) {
      flush();
      if (header.known) recognized++;
      current = header.name;
      body = header.rest.length > 0 ? [header.rest] : [];
    } else if (current !== null) {
      body.push(line);
    }
  }
  flush();

  if (recognized === 0) {
    const first = firstNonEmptyLine(text);
    if (first !== null) {
      const withStatus: SectionMap = new Map([["STATUS", first]]);
      for (const [name, content] of sections) withStatus.set(name, content);
      return withStatus;
    }
  }

  return sections;
}

/**
 * Render sections back to note text. Parsing the output yields the same map.
 */
export function serializeSections(sections: SectionMap | Readonly<Record<string, string>>): string {
  const entries = sections instanceof Map ? [...sections] : Object.entries(sections);
  return entries
    .map(([name, content]) => (content.length > 0 ? `${name}: ${content}` : `${name}:`))
    .join("\n");
}

/** First non-empty line, trimmed */
export function firstNonEmptyLine(text: string, skipHeaders = false): string | null {
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;
    if (skipHeaders && matchHeader(trimmed)) continue;
    return trimmed;
  }
  return null;
}

function buildKnownHeaderPattern(): RegExp {
  const keywords = [...SPELLING_INDEX.keys()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  return new RegExp(`^(${keywords.join("|")}):\\s*(.*)$`, "i");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
