import { mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

/** Root directory for carryover data and global config */
export function carryoverHome(): string {
  return process.env.CARRYOVER_HOME ?? join(homedir(), ".carryover");
}

/** Get the SQLite database path, creating its directory on demand */
export function resolveDbPath(home: string = carryoverHome()): string {
  ensureDir(home);
  return join(home, "knowledge.db");
}

/** Detect project root from CWD by looking for common markers */
export function detectProjectRoot(cwd?: string): string | null {
  const dir = cwd ?? process.cwd();
  const markers = [".git", "package.json", "pyproject.toml", "Cargo.toml", "go.mod", "CLAUDE.md"];

  for (const marker of markers) {
    if (existsSync(join(dir, marker))) {
      return dir;
    }
  }
  return null;
}

/**
 * Normalize a project name into its partition key.
 * Project names are opaque; only case and surrounding whitespace are folded.
 */
export function normalizeProjectName(name: string): string {
  return name.trim().toLowerCase();
}

/** Derive a project name from a POSIX or Windows path (last segment) */
export function projectNameFromPath(path: string): string | null {
  const segments = path.split(/[\\/]+/).filter((s) => s.length > 0 && !/^[A-Za-z]:$/.test(s));
  const last = segments.pop();
  return last ? normalizeProjectName(last) : null;
}

/**
 * Resolve the project for a tool call: explicit name first, then the
 * detected project root.
 */
export function resolveProject(explicit: string | undefined, cwd?: string): string | null {
  if (explicit && explicit.trim().length > 0) {
    return normalizeProjectName(explicit);
  }
  const root = detectProjectRoot(cwd);
  return root ? projectNameFromPath(root) : null;
}

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}
