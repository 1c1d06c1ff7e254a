#!/usr/bin/env node
/**
 * CLI entrypoint — routes commands to handlers.
 */

import { parseArgs } from "util";

const COMMANDS = [
  "new-id",
  "last",
  "prepare",
  "fill",
  "finalize",
  "abort",
  "status",
  "show",
  "edit-latest",
  "assets",
  "validate",
] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

async function main() {
  const argv = process.argv.slice(2);
  const { positionals } = parseArgs({
    args: argv.slice(0, 1),
    strict: false,
    allowPositionals: true,
  });

  const command = positionals[0];
  const args = argv.slice(1);

  if (!isCommand(command)) {
    console.error(`usage: scribe <command> [options]`);
    console.error(`commands: ${COMMANDS.join(", ")}`);
    process.exit(1);
  }

  switch (command) {
    case "new-id":
      await (await import("./new-id.js")).run(args);
      break;
    case "last":
      await (await import("./last.js")).run(args);
      break;
    case "prepare":
      await (await import("./prepare.js")).run(args);
      break;
    case "fill":
      await (await import("./fill.js")).run(args);
      break;
    case "finalize":
      await (await import("./finalize.js")).run(args);
      break;
    case "abort":
      await (await import("./abort.js")).run(args);
      break;
    case "status":
      await (await import("./status.js")).run(args);
      break;
    case "show":
      await (await import("./show.js")).run(args);
      break;
    case "edit-latest":
      await (await import("./edit-latest.js")).run(args);
      break;
    case "assets":
      await (await import("./assets.js")).run(args);
      break;
    case "validate":
      await (await import("./validate.js")).run(args);
      break;
  }
}

main().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
