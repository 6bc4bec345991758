import type { AgentFactory } from "./agents/registry.js";
import { Runner } from "./agents/runner.js";
import type { RunnerOptions } from "./agents/runner.js";
import type { AgentDefinition } from "./agents/types.js";
import { formatElapsed } from "./dashboard/format.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { buildPrompt } from "./tasks/prompt.js";
import type { Task, TaskSource } from "./tasks/types.js";

export interface TextOutput {
  write(chunk: string): unknown;
}

export interface HeadlessOptions {
  source: TaskSource;
  createAgent: AgentFactory;
  /** Used to turn raw agent output into display text. */
  definition: Pick<AgentDefinition, "parseLine">;
  logger: Logger;
  runTimeoutMs?: number;
  signal?: AbortSignal;
  stdout?: TextOutput;
  stderr?: TextOutput;
  runner?: RunnerOptions;
}

function describeTask(task: Task): string[] {
  const lines = [
    "Selected task:",
    "==============",
    `  ID:        ${task.id}`,
    `  Title:     ${task.title}`,
    `  Status:    ${task.status}`,
    `  Blocked:   ${task.blocked}`,
    `  Project:   ${task.projectId}`,
  ];
  if (task.epicId) lines.push(`  Epic:      ${task.epicId}`);
  if (task.notes) lines.push(`  Notes:     ${task.notes}`);
  if (task.dependsOn.length > 0) lines.push(`  Depends on: ${task.dependsOn.join(", ")}`);
  return lines;
}

/**
 * Run a single task without the dashboard, streaming agent output to the
 * console. Resolves with the process exit status.
 */
export async function runHeadless(options: HeadlessOptions): Promise<number> {
  const { source, createAgent, definition, logger } = options;
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const print = (line = "") => stdout.write(`${line}\n`);

  print(`Selection criteria: ${source.describe()}`);
  print();

  const task = await source.next();
  if (!task) {
    print("No task available matching the selection criteria.");
    return 0;
  }

  for (const line of describeTask(task)) print(line);
  print();

  const agent = createAgent();
  print(`Spawning ${agent.name} agent...`);
  print();

  const runner = new Runner(agent, logger, options.runner);
  try {
    await runner.start(buildPrompt(task), { timeoutMs: options.runTimeoutMs, signal: options.signal });
  } catch (err) {
    stderr.write(`Failed to start agent: ${errorMessage(err)}\n`);
    return 1;
  }

  for await (const line of runner.output()) {
    const text = definition.parseLine(line.text);
    if (text === "") continue;
    if (line.isStderr) {
      stderr.write(`${text}\n`);
    } else {
      print(text);
    }
  }
  const result = await runner.done;

  print();
  if (result.exitCode === 0 && !result.error) {
    print(`Agent completed successfully in ${formatElapsed(result.durationMs)}`);
    return 0;
  }
  print(`Agent failed with exit code ${result.exitCode}`);
  if (result.error) {
    stderr.write(`${result.error.message}\n`);
  }
  return 1;
}
