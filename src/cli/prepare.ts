/**
 * scribe prepare — open the staging slot for a new entry.
 */

import { parseArgs } from "util";
import { relative, sep } from "path";
import { currentHead, ensureIgnored } from "../adapters/git.js";
import { isValidEntryId } from "../id.js";
import { fail, openService, splitPathArg } from "./shared.js";

/** .gitignore patterns for the archive, the staging slot and restored copies. */
function ignorePatterns(projectDir: string, assetsDir: string, stagingFile: string): string[] {
  const patterns: string[] = [];
  for (const [path, suffix] of [
    [assetsDir, "/"],
    [stagingFile, ""],
  ] as const) {
    const rel = relative(projectDir, path);
    if (rel && !rel.startsWith("..")) patterns.push(rel.split(sep).join("/") + suffix);
  }
  patterns.push("_[0-9][0-9][0-9][0-9]-[0-9][0-9]-[0-9][0-9]-*");
  return patterns;
}

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      touched: { type: "string", multiple: true },
      archive: { type: "string", multiple: true },
      related: { type: "string", multiple: true },
      commit: { type: "boolean" },
    },
    strict: true,
  });

  const related = values.related ?? [];
  const badRelated = related.find((id) => !isValidEntryId(id));
  if (badRelated) {
    fail(`invalid related entry id: ${badRelated}`);
  }

  const { config, assetsDir, service } = openService();
  const cwd = process.cwd();

  const head = config.git.recordHead ? await currentHead(cwd) : null;

  const prepared = service.staging.prepare({
    mode: values.commit ? "external-commit" : "plain",
    touched: (values.touched ?? []).map(splitPathArg),
    archive: (values.archive ?? []).map(splitPathArg).map(({ path, description }) => ({ sourcePath: path, description })),
    related,
    ...(head ? { externalState: head } : {}),
  });
  if (prepared.isErr()) fail(prepared.error);

  if (config.git.manageIgnore) {
    const added = ensureIgnored(cwd, ignorePatterns(cwd, assetsDir, prepared.value.path));
    if (added.isErr()) {
      console.warn(`could not update .gitignore: ${added.error.message}`);
    } else if (added.value.length > 0) {
      console.log(`added to .gitignore: ${added.value.join(", ")}`);
    }
  }

  console.log(`prepared: ${prepared.value.id}`);
  console.log(`staging file: ${prepared.value.path}`);
  console.log("replace __TITLE__ and __BODY__, then run: scribe finalize");
}
