import type { Task, TaskSource } from "./types.js";

/** Hands out a fixed list of tasks in order, each once. */
export class StaticTaskSource implements TaskSource {
  private readonly queue: Task[];

  constructor(
    tasks: readonly Task[],
    private readonly label = "ad-hoc prompt",
  ) {
    this.queue = [...tasks];
  }

  async next(): Promise<Task | null> {
    return this.queue.shift() ?? null;
  }

  describe(): string {
    return this.label;
  }
}

/** A one-off task wrapping a prompt typed on the command line. */
export function promptTask(prompt: string, id = "adhoc-1"): Task {
  const firstLine = prompt.trim().split("\n")[0] ?? "";
  return {
    id,
    title: firstLine || "Ad-hoc prompt",
    status: "todo",
    blocked: false,
    projectId: "",
    epicId: "",
    notes: prompt.trim(),
    dependsOn: [],
  };
}
