import type { Task } from "./types.js";

export function buildPrompt(task: Task): string {
  const parts = [
    "You are working on a task from a project management system.\n\n",
    `Task ID: ${task.id}\n`,
    `Task: ${task.title}\n`,
  ];
  if (task.notes) {
    parts.push(`\nDetails:\n${task.notes}\n`);
  }
  parts.push("\nPlease complete this task. When finished, provide a summary of what was done.");
  return parts.join("");
}
