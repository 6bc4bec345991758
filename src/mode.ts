export type ExecutionModeName = "single" | "continuous";

const LABELS: Record<ExecutionModeName, string> = {
  single: "Single task",
  continuous: "Continuous",
};

/** Whether the supervisor stops after the current task or keeps pulling new ones. */
export class ExecutionMode {
  static readonly single = new ExecutionMode("single");
  static readonly continuous = new ExecutionMode("continuous");

  private constructor(readonly name: ExecutionModeName) {}

  static from(name: string): ExecutionMode {
    if (name === "continuous") return ExecutionMode.continuous;
    if (name === "single") return ExecutionMode.single;
    throw new Error(`Unknown execution mode "${name}". Expected single or continuous`);
  }

  get label(): string {
    return LABELS[this.name];
  }

  toggle(): ExecutionMode {
    return this.name === "single" ? ExecutionMode.continuous : ExecutionMode.single;
  }

  toString(): string {
    return this.label;
  }
}
