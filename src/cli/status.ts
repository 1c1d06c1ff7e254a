/**
 * scribe status — describe the pending entry, if any.
 */

import { parseArgs } from "util";
import { fail, openService } from "./shared.js";

export async function run(args: string[]) {
  parseArgs({ args, options: {}, strict: true });

  const { service } = openService();
  const status = service.staging.status();
  if (status.isErr()) fail(status.error);

  const record = status.value;
  if (!record) {
    console.log("no pending entry");
    return;
  }

  console.log(`pending: ${record.meta.id}`);
  console.log(`title filled: ${record.titleFilled ? "yes" : "no"}`);
  console.log(`body filled: ${record.bodyFilled ? "yes" : "no"}`);
  console.log(`mode: ${record.meta.pending.mode}`);
  if (record.meta.pending.archives.length > 0) {
    console.log(`archives: ${record.meta.pending.archives.length} file(s)`);
  }
}
