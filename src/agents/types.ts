import type { Readable } from "node:stream";

/** One line of agent output. Lines of the same stream keep emission order. */
export interface OutputLine {
  readonly text: string;
  readonly isStderr: boolean;
  readonly timestamp: Date;
}

export interface RunResult {
  readonly exitCode: number;
  readonly durationMs: number;
  readonly error: Error | null;
}

export interface AgentOptions {
  readonly workDir?: string;
  readonly env?: Readonly<Record<string, string>>;
  /** Wait between the graceful interrupt and the forced tree kill. */
  readonly graceMs?: number;
}

/**
 * A runnable external coding assistant. One instance backs one run and is
 * not reused.
 */
export interface Agent {
  readonly name: string;
  readonly pid: number;
  start(prompt: string): Promise<void>;
  stdout(): Readable;
  stderr(): Readable;
  /** Resolves with the exit code; a non-zero exit is not a rejection. */
  wait(): Promise<number>;
  cancel(): Promise<void>;
  isRunning(): boolean;
}

export interface AgentDefinition {
  readonly name: string;
  readonly displayName: string;
  readonly command: string;
  buildArgs(prompt: string): string[];
  /** Reduce a raw output line to display text; an empty result hides the line. */
  parseLine(line: string): string;
}

export type RunState = "created" | "starting" | "running" | "completed" | "cancelled" | "start-failed";

/** The part of a Runner the dashboard holds on to. */
export interface RunHandle {
  readonly pid: number;
  isRunning(): boolean;
  cancel(): Promise<void>;
}
