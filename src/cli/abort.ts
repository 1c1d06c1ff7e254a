/**
 * scribe abort — discard the pending entry.
 */

import { parseArgs } from "util";
import { fail, openService } from "./shared.js";

export async function run(args: string[]) {
  parseArgs({ args, options: {}, strict: true });

  const { service } = openService();
  const aborted = service.staging.abort();
  if (aborted.isErr()) fail(aborted.error);

  console.log(aborted.value ? `aborted: ${aborted.value.meta.id}` : "no pending entry");
}
