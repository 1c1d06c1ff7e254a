/**
 * scribe finalize — commit the pending entry.
 */

import { parseArgs } from "util";
import { fail, openService, reportViolations } from "./shared.js";

export async function run(args: string[]) {
  parseArgs({ args, options: {}, strict: true });

  const { service } = openService();
  const result = await service.staging.finalize();
  if (result.isErr()) fail(result.error);

  const { entry, assetIds, violations } = result.value;
  console.log(`finalized: ${entry.meta.id} — ${entry.meta.title}`);
  if (entry.meta.externalState) {
    console.log(`external state: ${entry.meta.externalState}`);
  }
  for (const assetId of assetIds) {
    console.log(`archived: ${assetId}`);
  }

  if (violations.length > 0) {
    console.error(`validation found ${violations.length} problem(s):`);
    reportViolations(violations);
    process.exit(1);
  }
}
