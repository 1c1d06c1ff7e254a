/**
 * scribe assets — direct access to the archive.
 *
 *   save <entryId> <file>... | get <assetId> [--dest DIR] | list [filter]
 */

import { parseArgs } from "util";
import { fail, openService } from "./shared.js";

export async function run(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      dest: { type: "string", short: "d" },
    },
    strict: true,
    allowPositionals: true,
  });

  const [subcommand, ...rest] = positionals;
  const { service } = openService();
  const { assets } = service;

  switch (subcommand) {
    case "save": {
      const [entryId, ...files] = rest;
      if (!entryId || files.length === 0) fail("usage: scribe assets save <entry-id> <file>...");

      let failed = false;
      for (const file of files) {
        const saved = assets.save(entryId, file);
        if (saved.isErr()) {
          console.error(`error: ${saved.error.message}`);
          failed = true;
          continue;
        }
        console.log(`saved: ${saved.value}`);
      }
      if (failed) process.exit(1);
      return;
    }

    case "get": {
      const assetId = rest[0];
      if (!assetId) fail("usage: scribe assets get <asset-id> [--dest <dir>]");

      const restored = assets.restore(assetId, values.dest ?? process.cwd());
      if (restored.isErr()) fail(restored.error);
      console.log(`restored: ${restored.value}`);
      return;
    }

    case "list": {
      const listed = assets.list(rest[0]);
      if (listed.isErr()) fail(listed.error);
      if (listed.value.length === 0) {
        console.log("no assets found");
        return;
      }
      for (const assetId of listed.value) {
        console.log(assetId);
      }
      return;
    }

    default:
      fail("usage: scribe assets <save|get|list> ...");
  }
}
