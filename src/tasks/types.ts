export type TaskStatus = "todo" | "in_progress" | "done";

export interface Task {
  id: string;
  title: string;
  status: TaskStatus;
  blocked: boolean;
  projectId: string;
  epicId: string;
  notes: string;
  dependsOn: string[];
}

export interface TaskCriteria {
  projectId?: string;
  epicId?: string;
  taskId?: string;
}

/** Hands out tasks to work on, one at a time. */
export interface TaskSource {
  /** The next task, or null when nothing matches right now. */
  next(): Promise<Task | null>;
  /** Human-readable selection criteria, shown as the dashboard filter. */
  describe(): string;
}
