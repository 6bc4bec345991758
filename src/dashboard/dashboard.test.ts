import { describe, it, expect, vi } from "vitest";
import { Chalk } from "chalk";
import { Dashboard, EVENT_QUEUE_CAPACITY } from "./dashboard.js";
import type { DashboardOptions } from "./dashboard.js";
import type { RenderSurface } from "./terminal.js";
import type { Viewport } from "./types.js";
import { ChannelClosedError, QueueFullError } from "../errors.js";
import { ExecutionMode } from "../mode.js";
import { createSilentLogger } from "../logger.js";
import { FakeRunHandle } from "../testing/fake-run-handle.js";

class FakeSurface implements RenderSurface {
  readonly frames: string[] = [];
  opened = 0;
  closed = 0;
  viewport: Viewport = { width: 120, height: 30 };

  open(): void {
    this.opened++;
  }

  size(): Viewport {
    return this.viewport;
  }

  draw(frame: string): void {
    this.frames.push(frame);
  }

  close(): void {
    this.closed++;
  }

  get last(): string {
    return this.frames[this.frames.length - 1] ?? "";
  }
}

function makeDashboard(overrides: Partial<DashboardOptions> = {}): { dashboard: Dashboard; surface: FakeSurface } {
  const surface = new FakeSurface();
  const dashboard = new Dashboard({
    criteria: "all tasks",
    mode: ExecutionMode.single,
    logger: createSilentLogger(),
    surface,
    version: "0.4.0",
    style: new Chalk({ level: 0 }),
    tickMs: 10_000,
    ...overrides,
  });
  return { dashboard, surface };
}

function output(taskId: string, text: string) {
  return { type: "agent-output" as const, taskId, line: { text, isStderr: false, timestamp: new Date(0) } };
}

describe("Dashboard", () => {
  it("draws a frame per consumed item and stops on quit", async () => {
    const { dashboard, surface } = makeDashboard();
    const running = dashboard.run();
    expect(surface.frames).toHaveLength(1);

    dashboard.send({ type: "listener-connected" });
    dashboard.send({ type: "add-agent", taskId: "T1", taskTitle: "Index files", agentName: "Fake", runner: null });
    dashboard.send(output("T1", "scanning"));
    await vi.waitFor(() => expect(surface.last).toContain("scanning"));
    expect(surface.frames).toHaveLength(4);
    expect(surface.last).toContain("Connected - watching for tasks");

    dashboard.pushInput({ type: "quit" });
    await running;
    expect(surface.opened).toBe(1);
    expect(surface.closed).toBe(1);
  });

  it("serves input while events are still queued", async () => {
    const { dashboard, surface } = makeDashboard();
    for (let i = 0; i < 50; i++) {
      dashboard.send(output("T1", `line ${i}`));
    }
    dashboard.pushInput({ type: "quit" });

    await dashboard.run();

    // initial frame, one event, then the quit
    expect(surface.frames).toHaveLength(2);
  });

  it("reports a full event queue to the caller", () => {
    const { dashboard } = makeDashboard();
    for (let i = 0; i < EVENT_QUEUE_CAPACITY; i++) {
      dashboard.send({ type: "listener-connected" });
    }
    expect(() => dashboard.send({ type: "listener-connected" })).toThrow(QueueFullError);
  });

  it("holds publishers back until the loop makes room", async () => {
    const { dashboard } = makeDashboard();
    for (let i = 0; i < EVENT_QUEUE_CAPACITY; i++) {
      dashboard.send({ type: "listener-connected" });
    }
    let published = false;
    const pending = dashboard.publish({ type: "listener-connected" }).then(() => {
      published = true;
    });
    await Promise.resolve();
    expect(published).toBe(false);

    const controller = new AbortController();
    const running = dashboard.run(controller.signal);
    await pending;
    expect(published).toBe(true);
    controller.abort();
    await running;
  });

  it("ends promptly on abort and releases blocked publishers", async () => {
    const { dashboard, surface } = makeDashboard();
    const controller = new AbortController();
    const running = dashboard.run(controller.signal);

    controller.abort();
    await running;

    expect(surface.closed).toBe(1);
    await expect(dashboard.publish({ type: "listener-connected" })).rejects.toBeInstanceOf(ChannelClosedError);
    await expect(dashboard.run()).rejects.toThrow("dashboard has already run");
  });

  it("refreshes on ticks and picks up the terminal size", async () => {
    const { dashboard, surface } = makeDashboard({ tickMs: 5 });
    const controller = new AbortController();
    const running = dashboard.run(controller.signal);

    const statusTop = (frame: string) => frame.split("\n")[2].length;
    const initialWidth = statusTop(surface.frames[0]);
    surface.viewport = { width: 80, height: 60 };
    await vi.waitFor(() => expect(statusTop(surface.last)).toBeLessThan(initialWidth));

    controller.abort();
    await running;
  });

  it("shows the update banner once the version check answers", async () => {
    const checkVersion = vi.fn().mockResolvedValue({ latestVersion: "0.5.0", updateAvailable: true });
    const { dashboard, surface } = makeDashboard({ checkVersion });
    const controller = new AbortController();
    const running = dashboard.run(controller.signal);

    await vi.waitFor(() => expect(surface.last).toContain("Update available: v0.5.0 (npm install -g boardrunner)"));
    expect(checkVersion).toHaveBeenCalledTimes(1);

    controller.abort();
    await running;
  });

  it("keeps running when the version check fails", async () => {
    const checkVersion = vi.fn().mockRejectedValue(new Error("offline"));
    const { dashboard, surface } = makeDashboard({ checkVersion });
    dashboard.pushInput({ type: "toggle-mode" });
    const controller = new AbortController();
    const running = dashboard.run(controller.signal);

    await vi.waitFor(() => expect(surface.last).toContain("Mode: Continuous"));
    controller.abort();
    await running;
    expect(surface.last).not.toContain("Update available");
  });

  it("leaves running agents to the cancel sweep", async () => {
    const { dashboard } = makeDashboard();
    const runner = new FakeRunHandle();
    dashboard.addAgent("T1", "Index files", "Fake", runner);
    dashboard.pushInput({ type: "quit" });

    await dashboard.run();
    expect(runner.cancelCalls).toBe(0);
    expect(dashboard.hasRunningAgents()).toBe(true);

    await dashboard.cancelAllAgents();
    expect(runner.cancelCalls).toBe(1);
  });

  it("shows a stopped run once its cancel settles, even if the process never confirms", async () => {
    const { dashboard, surface } = makeDashboard();
    const runner = new FakeRunHandle();
    dashboard.addAgent("T1", "Index files", "Fake", runner);
    const controller = new AbortController();
    const running = dashboard.run(controller.signal);

    dashboard.pushInput({ type: "stop" });
    await vi.waitFor(() => expect(surface.last).toContain("stopped"));
    expect(runner.cancelCalls).toBe(1);
    expect(runner.isRunning()).toBe(true);

    controller.abort();
    await running;
  });

  it("surfaces errors set from outside the loop", async () => {
    const { dashboard, surface } = makeDashboard();
    dashboard.setConnected(true);
    dashboard.setError(new Error("tasks file missing"));
    dashboard.pushInput({ type: "quit" });

    await dashboard.run();

    expect(surface.last).toContain("Error: tasks file missing");
  });
});
