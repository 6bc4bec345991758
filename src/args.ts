import { ExecutionMode } from "./mode.js";

export type Command = "dashboard" | "headless" | "history" | "help" | "version";

export interface CliOptions {
  command: Command;
  tasksFile?: string;
  prompt?: string;
  projectId?: string;
  epicId?: string;
  taskId?: string;
  agent?: string;
  configPath?: string;
  mode?: ExecutionMode;
  limit?: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: boardrunner [command] [options]

Commands:
  dashboard   Watch for tasks and run agents in the terminal dashboard (default)
  headless    Run a single task and stream its output to the console
  history     List recent agent runs

Options:
  --tasks <file>      Tasks JSON file to pick work from
  --prompt <text>     Run an ad-hoc prompt instead of a task file
  --project <id>      Only pick tasks from this project
  --epic <id>         Only pick tasks from this epic
  --task <id>         Run this specific task
  --agent <name>      Agent to run (claude, codex)
  --mode <mode>       Start in single or continuous mode (dashboard only)
  --limit <n>         Number of runs to list (history only)
  --config <path>     Path to boardrunner.config.json
  -h, --help          Show this help
  -v, --version       Show the version`;

const COMMANDS: readonly Command[] = ["dashboard", "headless", "history"];

const VALUE_FLAGS = {
  "--tasks": "tasksFile",
  "--prompt": "prompt",
  "--project": "projectId",
  "--epic": "epicId",
  "--task": "taskId",
  "--agent": "agent",
  "--config": "configPath",
} as const satisfies Record<string, keyof CliOptions>;

function isValueFlag(flag: string): flag is keyof typeof VALUE_FLAGS {
  return flag in VALUE_FLAGS;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { command: "dashboard" };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const takeValue = (): string => {
      if (eq > 0) return arg.slice(eq + 1);
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`${flag} requires a value`);
      }
      i++;
      return value;
    };

    if (flag === "-h" || flag === "--help") {
      return { ...options, command: "help" };
    }
    if (flag === "-v" || flag === "--version") {
      return { ...options, command: "version" };
    }
    if (isValueFlag(flag)) {
      options[VALUE_FLAGS[flag]] = takeValue();
      continue;
    }
    if (flag === "--mode") {
      try {
        options.mode = ExecutionMode.from(takeValue());
      } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
      }
      continue;
    }
    if (flag === "--limit") {
      const raw = takeValue();
      const limit = Number(raw);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new UsageError(`--limit expects a positive integer, got "${raw}"`);
      }
      options.limit = limit;
      continue;
    }
    if (flag.startsWith("-")) {
      throw new UsageError(`Unknown option ${flag}`);
    }

    const command = COMMANDS.find((c) => c === arg);
    if (commandSeen || !command) {
      throw new UsageError(`Unknown command "${arg}"`);
    }
    options.command = command;
    commandSeen = true;
  }

  return options;
}
