import { spawn, type ChildProcess } from "node:child_process";
import type { Readable } from "node:stream";
import { AgentAlreadyRunningError, AgentNotStartedError, AgentSpawnError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ProcessTreeTerminator } from "./process-tree.js";
import type { Agent, AgentDefinition, AgentOptions } from "./types.js";

export const DEFAULT_GRACE_MS = 5000;

/** Runs an agent CLI as a subprocess with piped stdout and stderr. */
export class ProcessAgent implements Agent {
  private child: ChildProcess | null = null;
  private exited: Promise<number> | null = null;
  private running = false;
  private cancelling: Promise<void> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly definition: AgentDefinition,
    private readonly options: AgentOptions,
    private readonly terminator: ProcessTreeTerminator,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "agent", agent: definition.name });
  }

  get name(): string {
    return this.definition.displayName;
  }

  get pid(): number {
    return this.child?.pid ?? 0;
  }

  async start(prompt: string): Promise<void> {
    if (this.child) {
      throw new AgentAlreadyRunningError();
    }

    const args = this.definition.buildArgs(prompt);
    this.logger.info({ command: this.definition.command, cwd: this.options.workDir }, "Spawning agent");

    let child: ChildProcess;
    try {
      child = spawn(this.definition.command, args, {
        cwd: this.options.workDir,
        env: { ...process.env, ...this.options.env },
        stdio: ["ignore", "pipe", "pipe"],
        detached: this.terminator.detached,
        windowsHide: true,
      });
    } catch (err) {
      throw new AgentSpawnError(this.definition.command, err);
    }
    this.child = child;

    this.exited = new Promise<number>((resolve) => {
      child.once("exit", (code, signal) => {
        this.running = false;
        this.logger.info({ pid: child.pid, exitCode: code, signal }, "Agent exited");
        resolve(code ?? -1);
      });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once("spawn", resolve);
        child.once("error", reject);
      });
    } catch (err) {
      this.exited = null;
      throw new AgentSpawnError(this.definition.command, err);
    }

    child.on("error", (err) => {
      this.logger.error({ pid: child.pid, err }, "Agent process error");
    });
    this.running = true;
  }

  stdout(): Readable {
    return this.stream("stdout");
  }

  stderr(): Readable {
    return this.stream("stderr");
  }

  wait(): Promise<number> {
    if (!this.exited) {
      return Promise.reject(new AgentNotStartedError());
    }
    return this.exited;
  }

  cancel(): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }
    if (!this.cancelling) {
      this.cancelling = this.interruptThenKill().finally(() => {
        this.cancelling = null;
      });
    }
    return this.cancelling;
  }

  isRunning(): boolean {
    return this.running;
  }

  private stream(name: "stdout" | "stderr"): Readable {
    const stream = this.child?.[name];
    if (!stream) {
      throw new AgentNotStartedError();
    }
    return stream;
  }

  private async interruptThenKill(): Promise<void> {
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) {
      return;
    }

    try {
      await this.terminator.terminate(child, false);
    } catch (err) {
      this.logger.warn({ pid: child.pid, err }, "Interrupt could not be delivered, killing process tree");
      await this.forceKill(child);
      return;
    }

    const graceMs = this.options.graceMs ?? DEFAULT_GRACE_MS;
    if (await exitsWithin(exited, graceMs)) {
      return;
    }
    this.logger.warn({ pid: child.pid, graceMs }, "Agent ignored interrupt, killing process tree");
    await this.forceKill(child);
  }

  private async forceKill(child: ChildProcess): Promise<void> {
    try {
      await this.terminator.terminate(child, true);
    } catch (err) {
      this.logger.error({ pid: child.pid, err }, "Failed to kill agent process tree");
    }
  }
}

function exitsWithin(exited: Promise<number>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    void exited.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
