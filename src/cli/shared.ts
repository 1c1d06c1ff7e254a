/**
 * helpers shared by the CLI commands: store construction, argument parsing
 * and failure reporting.
 */

import { loadConfig, resolveAssetsDir, resolveRoot, type ResolvedConfig } from "../config.js";
import { createGitCommitProvider } from "../adapters/git.js";
import { createScribeService, type ScribeService } from "../service.js";
import type { ScribeError } from "../errors.js";
import type { Violation } from "../validate.js";
import type { Entry } from "../schema.js";

export interface CliContext {
  config: ResolvedConfig;
  rootDir: string;
  assetsDir: string;
  service: ScribeService;
}

export function openService(): CliContext {
  const config = loadConfig();
  const rootDir = resolveRoot(config);
  const assetsDir = resolveAssetsDir(config);

  const service = createScribeService({
    rootDir,
    assetsDir,
    commitProvider: createGitCommitProvider({ cwd: process.cwd() }),
    verify: config.finalize.validate,
  });

  return { config, rootDir, assetsDir, service };
}

export function fail(error: ScribeError | string): never {
  console.error(`error: ${typeof error === "string" ? error : error.message}`);
  process.exit(1);
}

/** "path:description" or a bare "path". */
export function splitPathArg(arg: string): { path: string; description: string } {
  const idx = arg.indexOf(":");
  if (idx === -1) return { path: arg, description: "" };
  return { path: arg.slice(0, idx), description: arg.slice(idx + 1).trim() };
}

export function reportViolations(violations: Violation[]): void {
  for (const v of violations) {
    console.error(`${v._tag.replace("violation.", "")}: ${v.message}`);
  }
}

/** human-readable rendering of a committed entry. */
export function renderEntry(entry: Entry): string {
  const { meta } = entry;
  const lines = [`## ${meta.timestamp} — ${meta.title}`, `id: ${meta.id}`];

  if (meta.externalState) lines.push(`external state: ${meta.externalState}`);
  if (meta.filesTouched.length > 0) {
    lines.push("files touched:", ...meta.filesTouched.map((f) => `  - ${f.path}${f.description ? `: ${f.description}` : ""}`));
  }
  if (meta.archived.length > 0) {
    lines.push("archived:", ...meta.archived.map((a) => `  - ${a.assetId}${a.description ? `: ${a.description}` : ""}`));
  }
  if (meta.related.length > 0) lines.push(`related: ${meta.related.join(", ")}`);
  if (entry.body) lines.push("", entry.body);

  return lines.join("\n");
}
