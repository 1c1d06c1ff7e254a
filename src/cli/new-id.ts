/**
 * scribe new-id — print the next free entry id for the current minute.
 */

import { parseArgs } from "util";
import { fail, openService } from "./shared.js";

export async function run(args: string[]) {
  parseArgs({ args, options: {}, strict: true });

  const { service } = openService();
  const id = service.allocator.allocate(new Date());
  if (id.isErr()) fail(id.error);

  console.log(id.value);
}
