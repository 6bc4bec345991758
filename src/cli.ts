#!/usr/bin/env node
/**
 * boardrunner: supervise coding agents working through a task board.
 * Usage:
 *   boardrunner [dashboard] --tasks tasks.json [--project <id>] [--mode continuous]
 *   boardrunner headless --prompt "Fix the failing test"
 *   boardrunner history [--task <id>] [--limit 20]
 */
import { USAGE, UsageError, parseArgs } from "./args.js";
import type { CliOptions } from "./args.js";
import { printHistory, runDashboard, runHeadlessCommand } from "./app.js";
import { errorMessage } from "./errors.js";
import { currentVersion } from "./version/version.js";

async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n`);
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  switch (options.command) {
    case "help":
      console.log(USAGE);
      return 0;
    case "version":
      console.log(currentVersion());
      return 0;
    case "history":
      return printHistory(options);
    case "headless":
      return runHeadlessCommand(options);
    case "dashboard":
      return runDashboard(options);
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err instanceof UsageError ? `Error: ${err.message}` : `Error: ${errorMessage(err)}`);
    process.exit(1);
  },
);
