import type { AgentPanel } from "./types.js";

export type PanelTone = "pending" | "running" | "stopping" | "complete" | "stopped" | "failed";

export interface PanelStatus {
  readonly label: string;
  readonly tone: PanelTone;
}

const ELLIPSIS = "...";

/** Cut `text` to `maxLen` characters, marking the cut with "..." when there is room for it. */
export function truncate(text: string, maxLen: number): string {
  if (maxLen <= 0) {
    return "";
  }
  if (text.length <= maxLen) {
    return text;
  }
  if (maxLen <= ELLIPSIS.length) {
    return text.slice(0, maxLen);
  }
  return text.slice(0, maxLen - ELLIPSIS.length) + ELLIPSIS;
}

/** Whole seconds as MM:SS, or HH:MM:SS once an hour has passed. */
export function formatElapsed(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor(total / 60) % 60;
  const seconds = total % 60;
  const pad = (n: number) => String(n).padStart(2, "0");
  return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(seconds)}` : `${pad(minutes)}:${pad(seconds)}`;
}

export function isPanelRunning(panel: AgentPanel): boolean {
  return panel.runner !== null && panel.runner.isRunning();
}

export function isPanelFinished(panel: AgentPanel): boolean {
  return panel.result !== null;
}

export function panelElapsed(panel: AgentPanel, now: number): number {
  const end = panel.endTime ?? now;
  return end - panel.startTime;
}

export function panelStatus(panel: AgentPanel): PanelStatus {
  const running = isPanelRunning(panel);
  if (panel.stopping && running) {
    return panel.stopSettled ? { label: "stopped", tone: "stopped" } : { label: "stopping", tone: "stopping" };
  }
  if (running) {
    return { label: "running", tone: "running" };
  }
  if (panel.result === null && panel.stopSettled) {
    return { label: "stopped", tone: "stopped" };
  }
  if (panel.result) {
    if (panel.result.exitCode === 0) {
      return { label: "complete", tone: "complete" };
    }
    if (panel.stopRequested) {
      return { label: "stopped", tone: "stopped" };
    }
    return { label: `failed ${panel.result.exitCode}`, tone: "failed" };
  }
  return { label: "pending", tone: "pending" };
}

/**
 * A bracketed bar `width` columns wide. Finished runs fill it with "=",
 * stopping runs show the bare "-" track, running runs show a pulse that
 * moves one cell per frame.
 */
export function progressBar(width: number, panel: AgentPanel, frame: number): string {
  const inner = Math.max(3, width - 2);

  if (isPanelFinished(panel) || panel.stopSettled) {
    return `[${"=".repeat(inner)}]`;
  }
  if (panel.stopping && isPanelRunning(panel)) {
    return `[${"-".repeat(inner)}]`;
  }

  const segment = Math.min(Math.max(3, Math.floor(inner / 4)), inner);
  const start = (frame % (inner + segment)) - segment;
  let cells = "";
  for (let i = 0; i < inner; i++) {
    cells += i >= start && i < start + segment ? "=" : "-";
  }
  return `[${cells}]`;
}

/** Column budget for task titles in the agent table. */
export function titleWidth(terminalWidth: number): number {
  if (terminalWidth > 140) return 48;
  if (terminalWidth < 90) return 24;
  return 32;
}
