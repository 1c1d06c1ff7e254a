/**
 * scribe show — print one entry by id.
 */

import { parseArgs } from "util";
import { isValidEntryId } from "../id.js";
import { fail, openService, renderEntry } from "./shared.js";

export async function run(args: string[]) {
  const { positionals } = parseArgs({ args, options: {}, strict: true, allowPositionals: true });

  const id = positionals[0];
  if (!id) fail("usage: scribe show <entry-id>");
  if (!isValidEntryId(id)) fail(`invalid entry id format: ${id}`);

  const { service } = openService();
  const found = service.logs.find(id);
  if (found.isErr()) fail(found.error);
  if (!found.value) fail(`entry ${id} not found`);

  console.log(renderEntry(found.value));
}
