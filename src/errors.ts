export type AgentErrorCode = "ALREADY_RUNNING" | "NOT_STARTED" | "SPAWN_FAILED" | "TERMINATION_FAILED";

export class AgentError extends Error {
  readonly code: AgentErrorCode;

  constructor(code: AgentErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentError";
    this.code = code;
  }
}

export class AgentAlreadyRunningError extends AgentError {
  constructor() {
    super("ALREADY_RUNNING", "agent is already running");
    this.name = "AgentAlreadyRunningError";
  }
}

export class AgentNotStartedError extends AgentError {
  constructor() {
    super("NOT_STARTED", "agent has not been started");
    this.name = "AgentNotStartedError";
  }
}

export class AgentSpawnError extends AgentError {
  constructor(command: string, cause: unknown) {
    super("SPAWN_FAILED", `failed to start ${command}: ${errorMessage(cause)}`, { cause });
    this.name = "AgentSpawnError";
  }
}

export class ProcessTerminationError extends AgentError {
  readonly pid: number;

  constructor(pid: number, message: string, cause?: unknown) {
    super("TERMINATION_FAILED", message, { cause });
    this.name = "ProcessTerminationError";
    this.pid = pid;
  }
}

export class QueueFullError extends Error {
  constructor(queue: string) {
    super(`${queue} queue is full`);
    this.name = "QueueFullError";
  }
}

export class ChannelClosedError extends Error {
  constructor(channel: string) {
    super(`${channel} channel is closed`);
    this.name = "ChannelClosedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
