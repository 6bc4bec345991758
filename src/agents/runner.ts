import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { Channel } from "../channel/channel.js";
import { AgentError, AgentNotStartedError, AgentAlreadyRunningError, toError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Agent, OutputLine, RunHandle, RunResult, RunState } from "./types.js";

export interface RunOptions {
  /** Bounds the whole run; expiry takes the same path as `cancel()`. 0 disables it. */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface RunnerOptions {
  /** How long to keep reading buffered output after the process exits. */
  readonly drainMs?: number;
  readonly now?: () => number;
}

const DEFAULT_DRAIN_MS = 500;

/**
 * Supervises one Agent for one run: merges its stdout and stderr into a single
 * line stream, times the run, and publishes exactly one RunResult.
 *
 * Lines from one stream keep their order; there is no ordering between the
 * two streams. Lines still buffered when the drain window after exit closes
 * are lost.
 */
export class Runner implements RunHandle {
  private readonly lines = new Channel<OutputLine>("output");
  private readonly logger: Logger;
  private readonly drainMs: number;
  private readonly now: () => number;
  private _state: RunState = "created";
  private running = false;
  private startedAt = 0;
  private cancelling: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private detachSignal: (() => void) | null = null;
  private resolveDone: (result: RunResult) => void = () => undefined;

  /** Settles once per run, after the process has exited. */
  readonly done: Promise<RunResult>;

  constructor(
    private readonly agent: Agent,
    logger: Logger,
    options: RunnerOptions = {},
  ) {
    this.logger = logger.child({ component: "runner", agent: agent.name });
    this.drainMs = options.drainMs ?? DEFAULT_DRAIN_MS;
    this.now = options.now ?? Date.now;
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get state(): RunState {
    return this._state;
  }

  get pid(): number {
    return this.agent.pid;
  }

  get agentName(): string {
    return this.agent.name;
  }

  get startTime(): number {
    return this.startedAt;
  }

  async start(prompt: string, options: RunOptions = {}): Promise<void> {
    if (this._state === "starting" || this._state === "running" || this._state === "cancelled") {
      throw new AgentAlreadyRunningError();
    }
    if (this._state !== "created") {
      throw new AgentError("ALREADY_RUNNING", `runner cannot be restarted after it has ${this._state}`);
    }
    // Claimed before the first await; concurrent callers fail the check above.
    this._state = "starting";

    try {
      await this.agent.start(prompt);
    } catch (err) {
      this._state = "start-failed";
      this.lines.close();
      this.logger.error({ err }, "Agent failed to start");
      throw err;
    }

    this._state = "running";
    this.running = true;
    this.startedAt = this.now();
    this.logger.info({ pid: this.pid }, "Agent started");

    const readers = Promise.all([
      this.pump(this.agent.stdout(), false),
      this.pump(this.agent.stderr(), true),
    ]).then(() => undefined);

    if (options.timeoutMs && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      this.timer = setTimeout(() => {
        this.logger.warn({ pid: this.pid, timeoutMs }, "Run exceeded its deadline, cancelling");
        this.cancelSafely();
      }, timeoutMs);
    }

    const signal = options.signal;
    if (signal) {
      const onAbort = () => this.cancelSafely();
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
        this.detachSignal = () => signal.removeEventListener("abort", onAbort);
      }
    }

    void this.supervise(readers);
  }

  /** Merged output. Ends after the run completes and buffered lines are drained. */
  output(): AsyncIterable<OutputLine> {
    return this.lines;
  }

  async wait(): Promise<RunResult> {
    if (this._state === "created" || this._state === "starting" || this._state === "start-failed") {
      throw new AgentNotStartedError();
    }
    return this.done;
  }

  /** Interrupt, then force-kill after the grace window. Concurrent calls share one attempt. */
  cancel(): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }
    if (!this.cancelling) {
      this._state = "cancelled";
      this.logger.info({ pid: this.pid }, "Cancelling agent");
      this.cancelling = this.agent.cancel().finally(() => {
        this.cancelling = null;
      });
    }
    return this.cancelling;
  }

  isRunning(): boolean {
    return this.running;
  }

  private cancelSafely(): void {
    this.cancel().catch((err: unknown) => {
      this.logger.error({ err }, "Cancel failed");
    });
  }

  private async pump(stream: Readable, isStderr: boolean): Promise<void> {
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    reader.on("line", (text) => {
      this.lines.trySend({ text, isStderr, timestamp: new Date(this.now()) });
    });
    await once(reader, "close");
  }

  private async supervise(readers: Promise<void>): Promise<void> {
    let exitCode: number;
    let error: Error | null = null;
    try {
      exitCode = await this.agent.wait();
    } catch (err) {
      exitCode = -1;
      error = toError(err);
    }

    this.running = false;
    if (this._state === "running") {
      this._state = "completed";
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.detachSignal?.();
    this.detachSignal = null;

    await drain(readers, this.drainMs);
    this.lines.close();

    const result: RunResult = { exitCode, durationMs: this.now() - this.startedAt, error };
    this.logger.info({ exitCode, durationMs: result.durationMs, state: this._state, err: error ?? undefined }, "Run finished");
    this.resolveDone(result);
  }
}

function drain(readers: Promise<void>, ms: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    void readers.then(
      () => {
        clearTimeout(timer);
        resolve();
      },
      () => {
        clearTimeout(timer);
        resolve();
      },
    );
  });
}
