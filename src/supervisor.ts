import { setTimeout as delay } from "node:timers/promises";
import type { AgentFactory } from "./agents/registry.js";
import { Runner } from "./agents/runner.js";
import type { RunnerOptions } from "./agents/runner.js";
import type { RunResult } from "./agents/types.js";
import type { Channel } from "./channel/channel.js";
import type { DashboardEvent } from "./dashboard/types.js";
import type { AgentRun, AgentRunRepository } from "./db/types.js";
import { ChannelClosedError, errorMessage, toError } from "./errors.js";
import type { Logger } from "./logger.js";
import { ExecutionMode } from "./mode.js";
import { buildPrompt } from "./tasks/prompt.js";
import type { Task, TaskSource } from "./tasks/types.js";

/** Where the supervisor reports progress. `Dashboard` is one. */
export interface EventSink {
  publish(event: DashboardEvent): Promise<void>;
}

export interface SupervisorOptions {
  source: TaskSource;
  sink: EventSink;
  createAgent: AgentFactory;
  logger: Logger;
  mode: ExecutionMode;
  workDir: string;
  history?: AgentRunRepository | null;
  modeUpdates?: Channel<ExecutionMode> | null;
  stopUpdates?: Channel<string> | null;
  /** Deadline per run; 0 disables it. */
  runTimeoutMs?: number;
  /** How often to look for work when none was available. */
  pollMs?: number;
  runner?: RunnerOptions;
}

export const DEFAULT_POLL_MS = 5000;
// Longest delay a Node timer accepts.
const MAX_IDLE_MS = 2_147_483_647;

/**
 * Pulls tasks from the source and runs each through a Runner, forwarding
 * output and completion to the sink. In single mode it stops after one task
 * until the mode is switched to continuous.
 */
export class TaskSupervisor {
  private readonly logger: Logger;
  private readonly stopRequested = new Set<string>();
  private mode: ExecutionMode;
  private tasksRun = 0;

  constructor(private readonly options: SupervisorOptions) {
    this.logger = options.logger.child({ component: "supervisor" });
    this.mode = options.mode;
  }

  get completedTasks(): number {
    return this.tasksRun;
  }

  get currentMode(): ExecutionMode {
    return this.mode;
  }

  /** Runs until `signal` aborts or the sink stops accepting events. */
  async run(signal?: AbortSignal): Promise<void> {
    const pollMs = this.options.pollMs ?? DEFAULT_POLL_MS;
    let reportedIdle = false;

    try {
      await this.options.sink.publish({ type: "listener-connected" });
      this.logger.info({ criteria: this.options.source.describe(), mode: this.mode.name }, "Watching for tasks");

      while (!signal?.aborted) {
        this.applyControlUpdates();

        if (this.mode === ExecutionMode.single && this.tasksRun > 0) {
          await this.idle(MAX_IDLE_MS, signal);
          continue;
        }

        let task: Task | null;
        try {
          task = await this.options.source.next();
        } catch (err) {
          this.logger.error({ err }, "Task selection failed");
          await this.options.sink.publish({ type: "listener-error", error: toError(err) });
          await this.idle(pollMs, signal);
          continue;
        }

        if (!task) {
          if (!reportedIdle) {
            this.logger.info({ criteria: this.options.source.describe() }, "No task available");
            reportedIdle = true;
          }
          await this.idle(pollMs, signal);
          continue;
        }

        if (signal?.aborted) {
          break;
        }
        reportedIdle = false;
        await this.runTask(task);
        this.tasksRun++;
      }
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        this.logger.debug("Event sink closed, supervisor stopping");
        return;
      }
      throw err;
    }
  }

  /**
   * Run one task to completion. Resolves with the result, or null when the
   * agent could not be started (reported to the sink as a listener error).
   */
  async runTask(task: Task): Promise<RunResult | null> {
    const { sink, createAgent, runTimeoutMs } = this.options;
    const prompt = buildPrompt(task);
    const agent = createAgent();
    const runner = new Runner(agent, this.logger, this.options.runner);
    const run = this.recordStart(task, agent.name, prompt);

    try {
      await runner.start(prompt, { timeoutMs: runTimeoutMs });
    } catch (err) {
      const error = toError(err);
      this.recordFinish(run, { exitCode: -1, durationMs: 0, error }, "failed");
      await sink.publish({ type: "listener-error", error });
      return null;
    }

    void runner.done.then((result) => {
      this.recordFinish(run, result, this.outcomeOf(task, runner, result));
    });

    try {
      await sink.publish({
        type: "add-agent",
        taskId: task.id,
        taskTitle: task.title,
        agentName: agent.name,
        runner,
      });
      for await (const line of runner.output()) {
        await sink.publish({ type: "agent-output", taskId: task.id, line });
      }
      const result = await runner.done;
      this.logger.info({ taskId: task.id, exitCode: result.exitCode, durationMs: result.durationMs }, "Task run finished");
      await sink.publish({ type: "agent-completed", taskId: task.id, result });
      return result;
    } catch (err) {
      // Nothing else holds this runner once the sink is gone.
      this.logger.warn({ taskId: task.id, pid: runner.pid, err }, "Event sink failed mid-run, cancelling agent");
      await runner.cancel().catch((cancelErr: unknown) => {
        this.logger.error({ taskId: task.id, err: cancelErr }, "Failed to cancel orphaned agent");
      });
      throw err;
    }
  }

  private outcomeOf(task: Task, runner: Runner, result: RunResult): "completed" | "failed" | "cancelled" {
    this.applyControlUpdates();
    if (runner.state === "cancelled" || this.stopRequested.delete(task.id)) {
      return "cancelled";
    }
    return result.exitCode === 0 && !result.error ? "completed" : "failed";
  }

  private applyControlUpdates(): void {
    const { modeUpdates, stopUpdates } = this.options;
    for (let mode = modeUpdates?.tryReceive(); mode; mode = modeUpdates?.tryReceive()) {
      if (mode !== this.mode) {
        this.logger.info({ mode: mode.name }, "Execution mode changed");
      }
      this.mode = mode;
    }
    for (let taskId = stopUpdates?.tryReceive(); taskId !== undefined; taskId = stopUpdates?.tryReceive()) {
      this.logger.info({ taskId }, "Stop requested");
      this.stopRequested.add(taskId);
    }
  }

  private recordStart(task: Task, agentName: string, prompt: string): AgentRun | null {
    const history = this.options.history;
    if (!history) return null;
    try {
      return history.create({
        taskId: task.id,
        taskTitle: task.title,
        agent: agentName,
        prompt,
        cwd: this.options.workDir,
      });
    } catch (err) {
      this.logger.error({ err, taskId: task.id }, "Failed to record run start");
      return null;
    }
  }

  private recordFinish(run: AgentRun | null, result: RunResult, status: "completed" | "failed" | "cancelled"): void {
    if (!run || !this.options.history) return;
    try {
      this.options.history.finish(run.id, {
        status,
        exitCode: result.exitCode,
        durationMs: result.durationMs,
        error: result.error ? errorMessage(result.error) : null,
      });
    } catch (err) {
      this.logger.error({ err, runId: run.id }, "Failed to record run result");
    }
  }

  /** Wait for `ms`, an abort, or a mode change, whichever comes first. */
  private async idle(ms: number, signal?: AbortSignal): Promise<void> {
    const local = new AbortController();
    const timerSignal = signal ? AbortSignal.any([signal, local.signal]) : local.signal;
    const waits: Promise<void>[] = [
      delay(ms, undefined, { signal: timerSignal }).catch((err: unknown) => {
        if (!timerSignal.aborted) throw err;
      }),
    ];
    if (this.options.modeUpdates) {
      waits.push(this.options.modeUpdates.ready());
    }
    try {
      await Promise.race(waits);
    } finally {
      local.abort();
    }
  }
}
