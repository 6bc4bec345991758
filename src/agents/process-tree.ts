import { spawn } from "node:child_process";
import { ProcessTerminationError } from "../errors.js";
import type { Logger } from "../logger.js";

/** The slice of a ChildProcess the terminators need. */
export interface TerminationTarget {
  readonly pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * Ends a process together with everything it spawned.
 *
 * `terminate(target, false)` delivers a graceful interrupt and throws when it
 * cannot be delivered; `terminate(target, true)` is the hard kill.
 */
export interface ProcessTreeTerminator {
  /** Whether children must be spawned as leaders of their own process group. */
  readonly detached: boolean;
  terminate(target: TerminationTarget, forceful: boolean): Promise<void>;
}

export type SignalSender = (pid: number, signal: NodeJS.Signals) => void;
export type CommandRunner = (command: string, args: readonly string[]) => Promise<number>;

function requirePid(target: TerminationTarget): number {
  if (!target.pid) {
    throw new ProcessTerminationError(0, "process has no pid");
  }
  return target.pid;
}

/** POSIX: the child leads its own group, so one group signal reaches every descendant. */
export class ProcessGroupTerminator implements ProcessTreeTerminator {
  readonly detached = true;
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly sendSignal: SignalSender = (pid, signal) => {
      process.kill(pid, signal);
    },
  ) {
    this.logger = logger.child({ component: "terminator" });
  }

  async terminate(target: TerminationTarget, forceful: boolean): Promise<void> {
    const pid = requirePid(target);
    const signal: NodeJS.Signals = forceful ? "SIGKILL" : "SIGINT";
    try {
      this.sendSignal(-pid, signal);
      this.logger.debug({ pid, signal }, "Signalled process group");
      return;
    } catch (err) {
      if (!forceful) {
        throw new ProcessTerminationError(pid, `failed to interrupt process group ${pid}`, err);
      }
      this.logger.warn({ pid, err }, "Process group kill failed, killing root process only");
    }

    if (!target.kill("SIGKILL")) {
      throw new ProcessTerminationError(pid, `failed to kill process ${pid}`);
    }
  }
}

/**
 * Platforms without process groups: kill the tree with `taskkill /T /F`.
 * When that fails only the root is killed, which can leave descendants running.
 */
export class TaskkillTerminator implements ProcessTreeTerminator {
  readonly detached = false;
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly runCommand: CommandRunner = runToExit,
  ) {
    this.logger = logger.child({ component: "terminator" });
  }

  async terminate(target: TerminationTarget, forceful: boolean): Promise<void> {
    const pid = requirePid(target);
    if (!forceful) {
      throw new ProcessTerminationError(pid, "graceful interrupt is not supported on this platform");
    }

    try {
      const code = await this.runCommand("taskkill", ["/T", "/F", "/PID", String(pid)]);
      if (code === 0) {
        this.logger.debug({ pid }, "Killed process tree");
        return;
      }
      throw new Error(`taskkill exited with code ${code}`);
    } catch (err) {
      this.logger.warn({ pid, err }, "Process tree kill failed, killing root process only; descendants may be left running");
    }

    if (!target.kill()) {
      throw new ProcessTerminationError(pid, `failed to kill process ${pid}`);
    }
  }
}

export function createTerminator(logger: Logger, platform: NodeJS.Platform = process.platform): ProcessTreeTerminator {
  return platform === "win32" ? new TaskkillTerminator(logger) : new ProcessGroupTerminator(logger);
}

function runToExit(command: string, args: readonly string[]): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: "ignore", windowsHide: true });
    child.on("error", reject);
    child.on("close", (code) => resolve(code ?? -1));
  });
}
