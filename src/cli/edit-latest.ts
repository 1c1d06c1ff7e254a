/**
 * scribe edit-latest — inspect or repair the most recent entry.
 *
 *   show | delete | replace [--file F] [--title T] [--body B]
 *   rearchive <file> [--description D] | unarchive
 */

import { parseArgs } from "util";
import { readFileSync } from "fs";
import { normalizeBody } from "../format.js";
import { fail, openService, renderEntry } from "./shared.js";
import type { ReplaceFields } from "../recovery.js";

const SUBCOMMANDS = ["show", "delete", "replace", "rearchive", "unarchive"] as const;

type Subcommand = (typeof SUBCOMMANDS)[number];

function isSubcommand(value: string | undefined): value is Subcommand {
  return SUBCOMMANDS.some((s) => s === value);
}

const HEADING = /^##\s+(?:\d{2}:\d{2}\s+—\s+)?(.*)$/;

/**
 * replacement text as markdown: the first "## " line is the title, the rest
 * the body. a leading "HH:MM — " on the heading is ignored.
 */
export function parseReplacement(text: string): ReplaceFields {
  const lines = text.split("\n");
  const headingIdx = lines.findIndex((line) => line.startsWith("## "));
  if (headingIdx === -1) {
    return { body: normalizeBody(text) };
  }

  const match = lines[headingIdx]?.match(HEADING);
  return {
    title: (match?.[1] ?? "").trim(),
    body: normalizeBody(lines.slice(headingIdx + 1).join("\n")),
  };
}

async function readStdin(): Promise<string> {
  process.stdin.setEncoding("utf-8");
  let text = "";
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

export async function run(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      file: { type: "string", short: "f" },
      title: { type: "string", short: "t" },
      body: { type: "string", short: "b" },
      description: { type: "string", short: "d" },
    },
    strict: true,
    allowPositionals: true,
  });

  const subcommand = positionals[0];
  if (!isSubcommand(subcommand)) {
    fail(`usage: scribe edit-latest <${SUBCOMMANDS.join("|")}>`);
  }

  const { service } = openService();
  const { recovery } = service;

  switch (subcommand) {
    case "show": {
      const last = recovery.showLast();
      if (last.isErr()) fail(last.error);
      console.log(last.value ? renderEntry(last.value) : "no entries found");
      return;
    }

    case "delete": {
      const deleted = recovery.deleteLast();
      if (deleted.isErr()) fail(deleted.error);
      console.log(`deleted: ${deleted.value.entry.meta.id} — ${deleted.value.entry.meta.title}`);
      for (const assetId of deleted.value.assetIds) {
        console.log(`removed asset: ${assetId}`);
      }
      return;
    }

    case "replace": {
      let fields: ReplaceFields;
      if (values.file !== undefined) {
        let text: string;
        try {
          text = readFileSync(values.file, "utf-8");
        } catch (e) {
          fail(`cannot read ${values.file}: ${e instanceof Error ? e.message : String(e)}`);
        }
        fields = parseReplacement(text);
      } else if (values.title !== undefined || values.body !== undefined) {
        fields = {
          ...(values.title !== undefined ? { title: values.title } : {}),
          ...(values.body !== undefined ? { body: values.body } : {}),
        };
      } else {
        fields = parseReplacement(await readStdin());
      }

      const replaced = recovery.replaceLast(fields);
      if (replaced.isErr()) fail(replaced.error);
      console.log(`replaced: ${replaced.value.meta.id} — ${replaced.value.meta.title}`);
      return;
    }

    case "rearchive": {
      const file = positionals[1];
      if (!file) fail("usage: scribe edit-latest rearchive <file> [--description <text>]");

      const rearchived = recovery.rearchive(file, values.description);
      if (rearchived.isErr()) fail(rearchived.error);
      for (const archived of rearchived.value.meta.archived) {
        console.log(`archived: ${archived.assetId}`);
      }
      return;
    }

    case "unarchive": {
      const removed = recovery.unarchive();
      if (removed.isErr()) fail(removed.error);
      if (removed.value.assetIds.length === 0) {
        console.log(`entry ${removed.value.entry.meta.id} has no archived files`);
        return;
      }
      for (const assetId of removed.value.assetIds) {
        console.log(`removed asset: ${assetId}`);
      }
      console.log(`entry ${removed.value.entry.meta.id} still lists them; edit it or run validate`);
      return;
    }
  }
}
