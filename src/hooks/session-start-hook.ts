#!/usr/bin/env node

/**
 * SessionStart hook.
 *
 * Reads the hook payload (`{ "cwd": ... }`) from stdin, resolves the
 * project from the working directory and, when that project has a saved
 * continuation, prints it as additional context.
 *
 * Usage in .claude/settings.json:
 *   "hooks": {
 *     "SessionStart": [{ "command": "carryover-session-start" }]
 *   }
 *
 * Output format (JSON to stdout):
 *   { "additionalContext": "[carryover] ..." }
 *
 * Without a continuation it prints nothing. It always exits 0.
 */

import { loadConfig } from "../config.js";
import { KnowledgeService } from "../knowledge/service.js";
import { createLogger, setLogLevel } from "../logger.js";
import { ContinuationStore } from "../store/continuation-store.js";
import { KnowledgeStore } from "../store/knowledge-store.js";
import { LexicalRetriever } from "../store/retriever.js";
import { detectProjectRoot, resolveDbPath, resolveProject } from "../store/scope.js";
import { buildResumeContext, parseHookInput } from "./session-context.js";

const log = createLogger("session-start");

async function main() {
  const input = parseHookInput(await readStdin());
  const cwd = input.cwd ?? process.cwd();

  const project = resolveProject(undefined, cwd);
  if (!project) {
    log.debug(`no project detected in ${cwd}`);
    return;
  }

  const config = loadConfig(detectProjectRoot(cwd));
  if (!process.env.CARRYOVER_LOG_LEVEL) {
    setLogLevel(config.log_level);
  }

  const dbPath = resolveDbPath();
  const store = new KnowledgeStore(dbPath);
  const continuations = new ContinuationStore(dbPath);
  try {
    // resuming never needs embeddings
    const service = new KnowledgeService({
      store,
      continuations,
      retriever: new LexicalRetriever(store),
      config,
    });
    const context = await buildResumeContext(service, project);
    if (context) {
      process.stdout.write(JSON.stringify({ additionalContext: context }));
    }
  } finally {
    store.close();
    continuations.close();
  }
}

function readStdin(): Promise<string> {
  return new Promise((resolve) => {
    if (process.stdin.isTTY) {
      resolve("");
      return;
    }
    let data = "";
    process.stdin.setEncoding("utf-8");
    process.stdin.on("data", (chunk) => (data += chunk));
    process.stdin.on("end", () => resolve(data.trim()));

    // Timeout after 5 seconds if no stdin
    setTimeout(() => resolve(data.trim()), 5000).unref();
  });
}

main().catch((err) => {
  log.error("fatal error", err);
  // never block session start
  process.exit(0);
});
