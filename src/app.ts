import { mkdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { CliOptions } from "./args.js";
import { UsageError } from "./args.js";
import { createAgentFactory } from "./agents/registry.js";
import { Channel } from "./channel/channel.js";
import { loadConfig } from "./config.js";
import type { BoardrunnerConfig } from "./config.js";
import { Dashboard } from "./dashboard/dashboard.js";
import { formatElapsed } from "./dashboard/format.js";
import { TtySurface } from "./dashboard/terminal.js";
import { SqliteAgentRunRepository, SqliteDatabase } from "./db/sqlite.js";
import { runHeadless } from "./headless.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { ExecutionMode } from "./mode.js";
import { TaskSupervisor } from "./supervisor.js";
import { JsonFileTaskSource } from "./tasks/file-source.js";
import { StaticTaskSource, promptTask } from "./tasks/static-source.js";
import type { TaskSource } from "./tasks/types.js";
import { checkForUpdate } from "./version/check.js";
import { currentVersion } from "./version/version.js";

const DB_FILE = "boardrunner.db";
const MODE_UPDATE_CAPACITY = 1;
const STOP_REQUEST_CAPACITY = 16;
const SHUTDOWN_POLL_MS = 100;

export function createTaskSource(options: CliOptions, logger: Logger): TaskSource {
  if (options.prompt) {
    return new StaticTaskSource([promptTask(options.prompt)]);
  }
  if (options.tasksFile) {
    return new JsonFileTaskSource(
      resolve(options.tasksFile),
      { projectId: options.projectId, epicId: options.epicId, taskId: options.taskId },
      logger,
    );
  }
  throw new UsageError("Provide --tasks <file> or --prompt <text>");
}

function openHistory(config: BoardrunnerConfig, logger: Logger): { database: SqliteDatabase; history: SqliteAgentRunRepository } {
  const dataDir = resolve(config.dataDir);
  mkdirSync(dataDir, { recursive: true });
  const dbPath = join(dataDir, DB_FILE);
  const database = new SqliteDatabase(dbPath);
  database.initialize();
  logger.debug({ dbPath }, "Database initialized");
  return { database, history: new SqliteAgentRunRepository(database.db) };
}

/** Logs never go to the terminal the dashboard draws on. */
function dashboardLogger(config: BoardrunnerConfig): Logger {
  return createLogger({
    logLevel: config.logLevel,
    logFile: config.logFile ?? join(resolve(config.dataDir), "boardrunner.log"),
  });
}

async function waitForAgents(dashboard: Dashboard, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (dashboard.hasRunningAgents()) {
    if (Date.now() >= deadline) return false;
    await delay(SHUTDOWN_POLL_MS);
  }
  return true;
}

export async function runDashboard(options: CliOptions): Promise<number> {
  const config = loadConfig(options.configPath);
  const logger = dashboardLogger(config);
  const source = createTaskSource(options, logger);
  const { definition, create } = createAgentFactory(
    options.agent ?? config.agent,
    { workDir: config.workDir, env: config.agentEnv, graceMs: config.graceMs },
    logger,
  );
  const { database, history } = openHistory(config, logger);

  const version = currentVersion();
  const mode = options.mode ?? ExecutionMode.single;
  const modeUpdates = new Channel<ExecutionMode>("mode updates", MODE_UPDATE_CAPACITY);
  const stopUpdates = new Channel<string>("stop requests", STOP_REQUEST_CAPACITY);

  const dashboard = new Dashboard({
    criteria: source.describe(),
    mode,
    logger,
    surface: new TtySurface(process.stdout),
    keyboard: process.stdin,
    version,
    checkVersion: config.updateCheck ? () => checkForUpdate(version, { registryUrl: config.registryUrl }) : null,
    modeUpdates,
    stopUpdates,
    parseLine: definition.parseLine,
    tickMs: config.tickMs,
  });
  const supervisor = new TaskSupervisor({
    source,
    sink: dashboard,
    createAgent: create,
    logger,
    mode,
    workDir: config.workDir,
    history,
    modeUpdates,
    stopUpdates,
    runTimeoutMs: config.runTimeoutMs,
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Received signal, shutting down");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  logger.info({ version, agent: definition.name, criteria: source.describe() }, "Starting dashboard");
  const supervising = supervisor.run(controller.signal).catch((err: unknown) => {
    logger.error({ err }, "Supervisor stopped with an error");
  });

  try {
    await dashboard.run(controller.signal);
    controller.abort();

    await dashboard.cancelAllAgents();
    if (!(await waitForAgents(dashboard, config.graceMs + 1000))) {
      logger.warn("Some agents were still running at shutdown");
    }
    await supervising;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    database.close();
  }

  console.log(`Stopped after ${supervisor.completedTasks} task(s).`);
  return 0;
}

export async function runHeadlessCommand(options: CliOptions): Promise<number> {
  const config = loadConfig(options.configPath);
  const logger = createLogger({ logLevel: config.logLevel, logFile: config.logFile });
  const source = createTaskSource(options, logger);
  const { definition, create } = createAgentFactory(
    options.agent ?? config.agent,
    { workDir: config.workDir, env: config.agentEnv, graceMs: config.graceMs },
    logger,
  );

  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  try {
    return await runHeadless({
      source,
      createAgent: create,
      definition,
      logger,
      runTimeoutMs: config.runTimeoutMs,
      signal: controller.signal,
    });
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

export function printHistory(options: CliOptions): number {
  const config = loadConfig(options.configPath);
  const logger = createLogger({ logLevel: config.logLevel, logFile: config.logFile });
  const { database, history } = openHistory(config, logger);
  try {
    const runs = options.taskId ? history.findByTask(options.taskId).slice(0, options.limit) : history.findAll(options.limit);
    if (runs.length === 0) {
      console.log("No runs recorded.");
      return 0;
    }
    for (const run of runs) {
      const elapsed = run.durationMs === null ? "-" : formatElapsed(run.durationMs);
      const exit = run.exitCode === null ? "-" : String(run.exitCode);
      console.log(`${run.startedAt}\t${run.status}\t${exit}\t${elapsed}\t${run.taskId}\t${run.agent}\t${run.taskTitle}`);
    }
    return 0;
  } finally {
    database.close();
  }
}
