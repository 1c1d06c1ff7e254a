/**
 * scribe validate — integrity check of logs against the asset archive.
 */

import { parseArgs } from "util";
import { isValidEntryId } from "../id.js";
import { fail, openService, reportViolations } from "./shared.js";

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      since: { type: "string", short: "s" },
      quiet: { type: "boolean", short: "q" },
    },
    strict: true,
  });

  if (values.since && !isValidEntryId(values.since)) {
    fail(`invalid entry id format: ${values.since}`);
  }

  const { service } = openService();
  const report = service.validator.validate(values.since ? { since: values.since } : {});
  if (report.isErr()) fail(report.error);

  const { entries, violations } = report.value;
  if (violations.length > 0) {
    console.error(`${violations.length} problem(s) in ${entries} entries:`);
    reportViolations(violations);
    process.exit(1);
  }

  if (!values.quiet) {
    console.log(`ok: ${entries} entries, no problems`);
  }
}
