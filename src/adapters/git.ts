/**
 * git-backed commit provider — stages tracked changes and commits them with
 * the entry text as the message. also: HEAD lookup and .gitignore upkeep.
 */

import { spawn } from "child_process";
import { existsSync, readFileSync, appendFileSync } from "fs";
import { join } from "path";
import { ok, err, type Result } from "neverthrow";
import { errorMessage, type ScribeError } from "../errors.js";
import type { ExternalCommitProvider } from "./index.js";

export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

export const runGit: GitRunner = (args, cwd) =>
  new Promise((resolve, reject) => {
    const proc = spawn("git", args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    proc.stdout.setEncoding("utf-8");
    proc.stderr.setEncoding("utf-8");
    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    proc.on("error", reject);
    proc.on("close", (code) => {
      resolve({ code: code ?? 1, stdout: stdout.trim(), stderr: stderr.trim() });
    });
  });

export interface GitCommitProviderOptions {
  cwd: string;
  run?: GitRunner;
}

function commitFailed(cwd: string, message: string): ScribeError {
  return { _tag: "commit.failed", path: cwd, message };
}

/** short HEAD hash, or null outside a work tree / without git. */
export async function currentHead(cwd: string, run: GitRunner = runGit): Promise<string | null> {
  try {
    const result = await run(["rev-parse", "--short", "HEAD"], cwd);
    return result.code === 0 && result.stdout ? result.stdout : null;
  } catch {
    return null;
  }
}

export function createGitCommitProvider(options: GitCommitProviderOptions): ExternalCommitProvider {
  const { cwd } = options;
  const run = options.run ?? runGit;

  return {
    async commit(title: string, body: string): Promise<string> {
      const added = await run(["add", "-u"], cwd);
      if (added.code !== 0) {
        throw commitFailed(cwd, `staging tracked files failed: ${added.stderr}`);
      }

      // exit 0 means the index matches HEAD
      const staged = await run(["diff", "--cached", "--quiet"], cwd);
      if (staged.code === 0) {
        throw commitFailed(cwd, "no changes staged for external commit");
      }

      const message = body ? `${title}\n\n${body}` : title;
      const committed = await run(["commit", "-m", message], cwd);
      if (committed.code !== 0) {
        throw commitFailed(cwd, `git commit failed: ${committed.stderr}`);
      }

      const head = await currentHead(cwd, run);
      if (!head) {
        throw commitFailed(cwd, "commit created but HEAD could not be read");
      }
      return head;
    },
  };
}

/**
 * append missing patterns to <projectDir>/.gitignore.
 * returns the patterns that were added.
 */
export function ensureIgnored(projectDir: string, patterns: string[]): Result<string[], ScribeError> {
  const gitignorePath = join(projectDir, ".gitignore");

  try {
    const existing = existsSync(gitignorePath) ? readFileSync(gitignorePath, "utf-8") : "";
    const present = new Set(existing.split("\n").map((line) => line.trim()));
    const missing = patterns.filter((p) => !present.has(p));
    if (missing.length === 0) return ok([]);

    const lead = existing && !existing.endsWith("\n") ? "\n" : "";
    appendFileSync(gitignorePath, `${lead}${missing.join("\n")}\n`, "utf-8");
    return ok(missing);
  } catch (e) {
    return err({ _tag: "log.io", path: gitignorePath, message: `${gitignorePath}: ${errorMessage(e)}` });
  }
}
