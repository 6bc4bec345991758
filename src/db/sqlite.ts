import BetterSqlite3 from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type { AgentRun, AgentRunOutcome, AgentRunRepository, Database, NewAgentRun } from "./types.js";

export class SqliteDatabase implements Database {
  readonly db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS agent_runs (
        id TEXT PRIMARY KEY,
        task_id TEXT NOT NULL,
        task_title TEXT NOT NULL DEFAULT '',
        agent TEXT NOT NULL,
        prompt TEXT NOT NULL,
        cwd TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'running',
        exit_code INTEGER,
        duration_ms INTEGER,
        error TEXT,
        started_at TEXT NOT NULL,
        finished_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_agent_runs_task ON agent_runs (task_id);
    `);
  }

  close(): void {
    this.db.close();
  }
}

export class SqliteAgentRunRepository implements AgentRunRepository {
  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly now: () => Date = () => new Date(),
  ) {}

  create(run: NewAgentRun): AgentRun {
    const stmt = this.db.prepare(
      `INSERT INTO agent_runs (id, task_id, task_title, agent, prompt, cwd, status, started_at)
       VALUES (?, ?, ?, ?, ?, ?, 'running', ?) RETURNING *`,
    );
    const row = stmt.get(randomUUID(), run.taskId, run.taskTitle, run.agent, run.prompt, run.cwd, this.now().toISOString());
    return this.mapRun(row as Record<string, unknown>);
  }

  findAll(limit = 50): AgentRun[] {
    const rows = this.db.prepare("SELECT * FROM agent_runs ORDER BY started_at DESC, rowid DESC LIMIT ?").all(limit);
    return rows.map((r) => this.mapRun(r as Record<string, unknown>));
  }

  findById(id: string): AgentRun | undefined {
    const row = this.db.prepare("SELECT * FROM agent_runs WHERE id = ?").get(id);
    return row ? this.mapRun(row as Record<string, unknown>) : undefined;
  }

  findByTask(taskId: string): AgentRun[] {
    const rows = this.db
      .prepare("SELECT * FROM agent_runs WHERE task_id = ? ORDER BY started_at DESC, rowid DESC")
      .all(taskId);
    return rows.map((r) => this.mapRun(r as Record<string, unknown>));
  }

  finish(id: string, outcome: AgentRunOutcome): boolean {
    const result = this.db
      .prepare(
        `UPDATE agent_runs SET status = ?, exit_code = ?, duration_ms = ?, error = ?, finished_at = ?
         WHERE id = ? AND status = 'running'`,
      )
      .run(outcome.status, outcome.exitCode, Math.round(outcome.durationMs), outcome.error, this.now().toISOString(), id);
    return result.changes > 0;
  }

  private mapRun(row: Record<string, unknown>): AgentRun {
    return {
      id: row.id as string,
      taskId: row.task_id as string,
      taskTitle: row.task_title as string,
      agent: row.agent as string,
      prompt: row.prompt as string,
      cwd: row.cwd as string,
      status: row.status as AgentRun["status"],
      exitCode: row.exit_code as number | null,
      durationMs: row.duration_ms as number | null,
      error: row.error as string | null,
      startedAt: row.started_at as string,
      finishedAt: row.finished_at as string | null,
    };
  }
}
