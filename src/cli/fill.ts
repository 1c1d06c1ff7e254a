/**
 * scribe fill — set the pending entry's title and/or body.
 */

import { parseArgs } from "util";
import { fail, openService } from "./shared.js";

export async function run(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      title: { type: "string", short: "t" },
      body: { type: "string", short: "b" },
    },
    strict: true,
  });

  if (values.title === undefined && values.body === undefined) {
    fail("usage: scribe fill [--title <title>] [--body <body>]");
  }

  const { service } = openService();
  const filled = service.staging.fill({
    ...(values.title !== undefined ? { title: values.title } : {}),
    ...(values.body !== undefined ? { body: values.body } : {}),
  });
  if (filled.isErr()) fail(filled.error);

  console.log(`filled: ${filled.value.meta.id}`);
}
