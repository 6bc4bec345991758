export interface Database {
  initialize(): void;
  close(): void;
  readonly db: unknown;
}

export type AgentRunStatus = "running" | "completed" | "failed" | "cancelled";

export interface AgentRun {
  readonly id: string;
  readonly taskId: string;
  readonly taskTitle: string;
  readonly agent: string;
  readonly prompt: string;
  readonly cwd: string;
  readonly status: AgentRunStatus;
  readonly exitCode: number | null;
  readonly durationMs: number | null;
  readonly error: string | null;
  readonly startedAt: string;
  readonly finishedAt: string | null;
}

export type NewAgentRun = Pick<AgentRun, "taskId" | "taskTitle" | "agent" | "prompt" | "cwd">;

export interface AgentRunOutcome {
  readonly status: Exclude<AgentRunStatus, "running">;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly error: string | null;
}

export interface AgentRunRepository {
  create(run: NewAgentRun): AgentRun;
  findAll(limit?: number): AgentRun[];
  findById(id: string): AgentRun | undefined;
  findByTask(taskId: string): AgentRun[];
  /** Record how a run ended. Only a running row changes; returns false otherwise. */
  finish(id: string, outcome: AgentRunOutcome): boolean;
}
