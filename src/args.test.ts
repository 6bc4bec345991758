import { describe, it, expect } from "vitest";
import { UsageError, parseArgs } from "./args.js";
import { ExecutionMode } from "./mode.js";

describe("parseArgs", () => {
  it("defaults to the dashboard", () => {
    expect(parseArgs([])).toEqual({ command: "dashboard" });
  });

  it("reads the command and its flags", () => {
    expect(
      parseArgs(["headless", "--tasks", "tasks.json", "--project", "core", "--epic=E2", "--agent", "codex"]),
    ).toEqual({ command: "headless", tasksFile: "tasks.json", projectId: "core", epicId: "E2", agent: "codex" });
  });

  it("parses the mode and the history limit", () => {
    expect(parseArgs(["--mode", "continuous"]).mode).toBe(ExecutionMode.continuous);
    expect(parseArgs(["history", "--limit", "5", "--task", "T1"])).toEqual({ command: "history", limit: 5, taskId: "T1" });
  });

  it("stops at help and version", () => {
    expect(parseArgs(["headless", "--help", "--bogus"]).command).toBe("help");
    expect(parseArgs(["-v"]).command).toBe("version");
  });

  it("rejects unknown commands and options", () => {
    expect(() => parseArgs(["deploy"])).toThrow(new UsageError('Unknown command "deploy"'));
    expect(() => parseArgs(["headless", "dashboard"])).toThrow('Unknown command "dashboard"');
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown option --verbose");
  });

  it("rejects missing and malformed values", () => {
    expect(() => parseArgs(["--tasks"])).toThrow("--tasks requires a value");
    expect(() => parseArgs(["--prompt", "--agent", "claude"])).toThrow("--prompt requires a value");
    expect(() => parseArgs(["--mode", "burst"])).toThrow('Unknown execution mode "burst". Expected single or continuous');
    expect(() => parseArgs(["history", "--limit", "0"])).toThrow('--limit expects a positive integer, got "0"');
  });
});
