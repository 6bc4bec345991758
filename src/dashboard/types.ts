import type { OutputLine, RunHandle, RunResult } from "../agents/types.js";

export type DashboardEvent =
  | { readonly type: "listener-connected" }
  | { readonly type: "listener-error"; readonly error: Error }
  | {
      readonly type: "add-agent";
      readonly taskId: string;
      readonly taskTitle: string;
      readonly agentName: string;
      readonly runner: RunHandle | null;
    }
  | { readonly type: "agent-output"; readonly taskId: string; readonly line: OutputLine }
  | { readonly type: "agent-completed"; readonly taskId: string; readonly result: RunResult }
  | { readonly type: "version-check"; readonly latestVersion: string; readonly updateAvailable: boolean }
  /** A requested stop has run its course, whether or not the process confirmed its exit. */
  | { readonly type: "stop-settled"; readonly panelId: string };

export type InputAction =
  | { readonly type: "none" }
  | { readonly type: "quit" }
  | { readonly type: "toggle-mode" }
  | { readonly type: "select-next" }
  | { readonly type: "select-prev" }
  | { readonly type: "stop" }
  | { readonly type: "close" }
  | { readonly type: "scroll-lines"; readonly delta: number }
  | { readonly type: "scroll-page"; readonly pages: number }
  | { readonly type: "scroll-top" }
  | { readonly type: "scroll-bottom" }
  | { readonly type: "follow" };

export interface AgentPanel {
  readonly id: string;
  readonly taskId: string;
  readonly taskTitle: string;
  readonly agentName: string;
  /** Released once the run completes. */
  runner: RunHandle | null;
  readonly output: OutputLine[];
  readonly startTime: number;
  endTime: number | null;
  result: RunResult | null;
  scrollPos: number;
  follow: boolean;
  focused: boolean;
  closed: boolean;
  /** Set while a requested stop is still in progress. */
  stopping: boolean;
  /** Sticky record that the user asked for this run to stop. */
  stopRequested: boolean;
  /** The stop's grace window and kill are over; shown as stopped even if the process never reported its exit. */
  stopSettled: boolean;
  readonly pid: number;
}

export interface Viewport {
  readonly width: number;
  readonly height: number;
}
