import { describe, it, expect, beforeEach } from "vitest";
import { Chalk } from "chalk";
import { HELP_LINE, layoutTable, renderFrame, statusLine, visibleOutput } from "./render.js";
import { DashboardState } from "./state.js";
import { ExecutionMode } from "../mode.js";
import { createSilentLogger } from "../logger.js";
import { FakeRunHandle, makePanel } from "../testing/fake-run-handle.js";

const plain = new Chalk({ level: 0 });

function line(text: string, isStderr = false) {
  return { text, isStderr, timestamp: new Date(0) };
}

describe("statusLine", () => {
  let state: DashboardState;

  beforeEach(() => {
    state = new DashboardState({ criteria: "", mode: ExecutionMode.single, logger: createSilentLogger() });
  });

  it("cycles the spinner while connecting", () => {
    expect(statusLine(state, plain)).toBe("Connecting -");
    state.advanceTick();
    expect(statusLine(state, plain)).toBe("Connecting \\");
    state.advanceTick();
    state.advanceTick();
    state.advanceTick();
    expect(statusLine(state, plain)).toBe("Connecting -");
  });

  it("reports the connection", () => {
    state.applyEvent({ type: "listener-connected" });
    state.advanceTick();
    state.advanceTick();
    expect(statusLine(state, plain)).toBe("Connected | watching for tasks");
  });

  it("prefers a stored error", () => {
    state.applyEvent({ type: "listener-connected" });
    state.applyEvent({ type: "listener-error", error: new Error("task file unreadable") });
    expect(statusLine(state, plain)).toBe("Error: task file unreadable");
  });
});

describe("visibleOutput", () => {
  it("reports an empty buffer as 0-0", () => {
    expect(visibleOutput(makePanel(), 8)).toEqual({ lines: [], footer: "Lines 0-0 of 0" });
  });

  it("slices from the scroll position", () => {
    const output = Array.from({ length: 20 }, (_, i) => line(`line ${i + 1}`));
    const { lines, footer } = visibleOutput(makePanel({ output, scrollPos: 12 }), 8);
    expect(footer).toBe("Lines 13-20 of 20");
    expect(lines.map((l) => l.text)).toEqual([
      "line 13",
      "line 14",
      "line 15",
      "line 16",
      "line 17",
      "line 18",
      "line 19",
      "line 20",
    ]);
  });

  it("shows a short buffer in full", () => {
    const output = [line("a"), line("b")];
    expect(visibleOutput(makePanel({ output }), 8).footer).toBe("Lines 1-2 of 2");
  });
});

describe("layoutTable", () => {
  it("pads columns to their widest cell by display width", () => {
    expect(
      layoutTable([
        ["Sel", "Task", "ID"],
        [">", "日本", "T1"],
        [" ", "a", "T22"],
      ]),
    ).toEqual(["Sel  Task  ID", ">    日本  T1", "     a     T22"]);
  });
});

describe("renderFrame", () => {
  let state: DashboardState;

  beforeEach(() => {
    state = new DashboardState({
      criteria: "project=core",
      mode: ExecutionMode.continuous,
      logger: createSilentLogger(),
      now: () => 0,
    });
    state.resize({ width: 120, height: 24 });
  });

  it("shows placeholders before any agent starts", () => {
    const frame = renderFrame(state, { now: 0, version: "0.4.0", style: plain });
    const lines = frame.split("\n");

    expect(lines[0]).toBe("[=] boardrunner");
    expect(lines[1]).toBe("keep the board moving  v0.4.0");
    expect(frame).toContain("Filter: project=core");
    expect(frame).toContain("Mode: Continuous");
    expect(frame).toContain("Tasks completed: 0");
    expect(frame).toContain("No running tasks yet.");
    expect(frame).toContain("Select a task to view output.");
    expect(frame).not.toContain("Update available");
    expect(lines[lines.length - 1]).toBe(HELP_LINE);
  });

  it("renders the table row and the focused output", () => {
    const runner = new FakeRunHandle(4321);
    state.applyEvent({ type: "add-agent", taskId: "T7", taskTitle: "Wire the parser", agentName: "Fake", runner });
    for (let i = 1; i <= 20; i++) {
      state.applyEvent({ type: "agent-output", taskId: "T7", line: line(`step ${i}`) });
    }
    state.applyEvent({ type: "version-check", latestVersion: "0.5.0", updateAvailable: true });

    const frame = renderFrame(state, { now: 65_000, version: "0.4.0", style: plain });
    const row = frame.split("\n").find((l) => l.includes("Wire the parser") && l.includes(">"));

    expect(row).toContain("[--------------]  running  Wire the parser  T7  01:05");
    expect(frame).toContain("Status: running | PID: 4321 | Scroll: follow");
    expect(frame).toContain("step 13");
    expect(frame).not.toContain("step 12 ");
    expect(frame).toContain("Lines 13-20 of 20");
    expect(frame).toContain("Update available: v0.5.0 (npm install -g boardrunner)");
  });
});
