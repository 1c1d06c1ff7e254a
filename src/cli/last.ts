/**
 * scribe last — last entry id of today's log (or of --date, or of the whole store).
 */

import { parseArgs } from "util";
import { formatDate, isValidDate } from "../timestamps.js";
import { fail, openService } from "./shared.js";
import type { Entry } from "../schema.js";

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      global: { type: "boolean", short: "g" },
      date: { type: "string", short: "d" },
      "with-title": { type: "boolean", short: "t" },
    },
    strict: true,
  });

  if (values.global && values.date) {
    fail("--global and --date are mutually exclusive");
  }
  if (values.date && !isValidDate(values.date)) {
    fail(`invalid date: ${values.date} (expected YYYY-MM-DD)`);
  }

  const { service } = openService();

  let last: Entry | null;
  if (values.global) {
    const located = service.logs.last();
    if (located.isErr()) fail(located.error);
    last = located.value?.entry ?? null;
  } else {
    const date = values.date ?? formatDate(new Date());
    const entries = service.logs.read(date);
    if (entries.isErr()) fail(entries.error);
    last = entries.value.at(-1) ?? null;
  }

  if (!last) {
    console.log(values.global ? "no entries" : `no entries on ${values.date ?? "today"}`);
    return;
  }

  console.log(values["with-title"] ? `${last.meta.id} — ${last.meta.title}` : last.meta.id);
}
