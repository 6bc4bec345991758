import { readFile } from "node:fs/promises";
import type { Logger } from "../logger.js";
import type { Task, TaskCriteria, TaskSource, TaskStatus } from "./types.js";

const STATUSES: readonly TaskStatus[] = ["todo", "in_progress", "done"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (value === undefined || value === null) return "";
  if (typeof value !== "string" && typeof value !== "number") {
    throw new Error(`${where}: "${key}" must be a string`);
  }
  return String(value);
}

function parseTask(value: unknown, index: number): Task {
  const where = `task #${index + 1}`;
  if (!isRecord(value)) {
    throw new Error(`${where}: expected an object`);
  }
  const id = optionalString(value, "id", where);
  const title = optionalString(value, "title", where);
  if (!id || !title) {
    throw new Error(`${where}: "id" and "title" are required`);
  }
  const status = value.status ?? "todo";
  const knownStatus = STATUSES.find((s) => s === status);
  if (!knownStatus) {
    throw new Error(`${where}: unknown status ${JSON.stringify(status)}`);
  }
  const dependsOn = value.dependsOn ?? [];
  if (!Array.isArray(dependsOn) || !dependsOn.every((d): d is string => typeof d === "string")) {
    throw new Error(`${where}: "dependsOn" must be a list of task ids`);
  }
  return {
    id,
    title,
    status: knownStatus,
    blocked: value.blocked === true,
    projectId: optionalString(value, "projectId", where),
    epicId: optionalString(value, "epicId", where),
    notes: optionalString(value, "notes", where),
    dependsOn,
  };
}

/** Accepts either a bare array of tasks or `{ "tasks": [...] }`. */
export function parseTasks(raw: string): Task[] {
  const parsed: unknown = JSON.parse(raw);
  const list = isRecord(parsed) ? parsed.tasks : parsed;
  if (!Array.isArray(list)) {
    throw new Error('expected an array of tasks or an object with a "tasks" array');
  }
  return list.map(parseTask);
}

export function describeCriteria(criteria: TaskCriteria): string {
  if (criteria.taskId) return `specific task ${criteria.taskId}`;
  if (criteria.epicId) return `first unblocked todo from epic ${criteria.epicId}`;
  if (criteria.projectId) return `first unblocked todo from project ${criteria.projectId}`;
  return "first unblocked todo across all projects";
}

/**
 * Picks work from a tasks JSON file. The file is re-read on every call so
 * edits made while the dashboard runs are seen. A task is handed out at most
 * once per source.
 */
export class JsonFileTaskSource implements TaskSource {
  private readonly handedOut = new Set<string>();

  constructor(
    private readonly path: string,
    private readonly criteria: TaskCriteria,
    private readonly logger: Logger,
  ) {}

  async next(): Promise<Task | null> {
    const tasks = await this.load();
    const task = this.select(tasks);
    if (task) {
      this.handedOut.add(task.id);
      this.logger.info({ taskId: task.id, title: task.title }, "Task selected");
    } else {
      this.logger.debug({ criteria: this.describe() }, "No task available");
    }
    return task;
  }

  describe(): string {
    return describeCriteria(this.criteria);
  }

  private async load(): Promise<Task[]> {
    try {
      return parseTasks(await readFile(this.path, "utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read tasks from ${this.path}: ${message}`, { cause: error });
    }
  }

  private select(tasks: Task[]): Task | null {
    const { taskId, epicId, projectId } = this.criteria;
    if (taskId) {
      const task = tasks.find((t) => t.id === taskId);
      return task && !this.handedOut.has(task.id) ? task : null;
    }

    const done = new Set(tasks.filter((t) => t.status === "done").map((t) => t.id));
    return (
      tasks.find(
        (t) =>
          t.status === "todo" &&
          !t.blocked &&
          !this.handedOut.has(t.id) &&
          t.dependsOn.every((dep) => done.has(dep)) &&
          (!epicId || t.epicId === epicId) &&
          (!projectId || t.projectId === projectId),
      ) ?? null
    );
  }
}
