import boxen from "boxen";
import type { ChalkInstance } from "chalk";
import stringWidth from "string-width";
import { formatElapsed, panelElapsed, panelStatus, progressBar, titleWidth, truncate } from "./format.js";
import type { PanelTone } from "./format.js";
import type { DashboardState } from "./state.js";
import type { AgentPanel } from "./types.js";

export const HELP_LINE =
  "Keys: j/k or up/down select | tab/shift+tab cycle | m mode | s stop | x close | pgup/pgdn scroll | f follow | q quit";

const SPINNER = ["-", "\\", "|", "/"] as const;
const PROGRESS_WIDTH = 16;
const RULE_WIDTH = 60;

export interface RenderContext {
  readonly now: number;
  readonly version: string;
  readonly style: ChalkInstance;
}

/** One full frame. Reads the state and never mutates it. */
export function renderFrame(state: DashboardState, ctx: RenderContext): string {
  return [
    renderHeader(ctx),
    renderStatus(state, ctx),
    renderAgentTable(state, ctx),
    renderOutput(state, ctx),
    ctx.style.gray(HELP_LINE),
  ].join("\n");
}

function box(state: DashboardState, title: string, body: string): string {
  return boxen(body, {
    title,
    borderStyle: "round",
    padding: { left: 1, right: 1, top: 0, bottom: 0 },
    ...(state.viewport.width > 0 ? { width: state.viewport.width } : {}),
  });
}

function renderHeader({ style, version }: RenderContext): string {
  return [
    style.bold.greenBright("[=] boardrunner"),
    `${style.gray("keep the board moving")}  ${style.dim(`v${version}`)}`,
  ].join("\n");
}

export function statusLine(state: DashboardState, style: ChalkInstance): string {
  if (state.lastError) {
    return style.bold.red(`Error: ${state.lastError.message}`);
  }
  const spinner = SPINNER[state.tick % SPINNER.length];
  if (state.connected) {
    return style.bold.green(`Connected ${spinner} watching for tasks`);
  }
  return style.yellow(`Connecting ${spinner}`);
}

function renderStatus(state: DashboardState, { style }: RenderContext): string {
  const rows = [
    statusLine(state, style),
    `Filter: ${state.criteria}`,
    `Mode: ${state.mode.label}`,
    `Tasks completed: ${state.taskCount}`,
  ];
  if (state.updateAvailable) {
    rows.push(style.cyan(`Update available: v${state.latestVersion} (npm install -g boardrunner)`));
  }
  return box(state, "Status", rows.join("\n"));
}

function toneStyle(style: ChalkInstance, tone: PanelTone): ChalkInstance {
  switch (tone) {
    case "stopping":
      return style.bold.yellow;
    case "running":
      return style.bold.green;
    case "complete":
      return style.bold.greenBright;
    case "stopped":
      return style.gray;
    case "failed":
      return style.bold.red;
    case "pending":
      return style.yellow;
  }
}

function padEndToWidth(text: string, width: number): string {
  const current = stringWidth(text);
  return current >= width ? text : text + " ".repeat(width - current);
}

/** Rows of cells joined into space-separated columns sized by display width. */
export function layoutTable(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, stringWidth(cell));
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : padEndToWidth(cell, widths[i])))
      .join("  "),
  );
}

function renderAgentTable(state: DashboardState, { style, now }: RenderContext): string {
  if (state.panels.length === 0) {
    return box(state, "Agents", "No running tasks yet.");
  }

  const maxTitle = titleWidth(state.viewport.width);
  const rows: string[][] = [["Sel", "Progress", "Status", "Task", "ID", "Time"].map((h) => style.bold(h))];
  state.panels.forEach((panel, i) => {
    const focused = i === state.focusedIndex;
    const rowStyle = focused ? style.bold.whiteBright : style.white;
    const status = panelStatus(panel);
    rows.push([
      rowStyle(focused ? ">" : " "),
      progressBar(PROGRESS_WIDTH, panel, state.tick),
      toneStyle(style, status.tone)(status.label),
      rowStyle(truncate(panel.taskTitle, maxTitle)),
      style.cyanBright(panel.taskId),
      style.gray(formatElapsed(panelElapsed(panel, now))),
    ]);
  });
  return box(state, "Agents", layoutTable(rows).join("\n"));
}

/** The slice of output the focused panel currently shows, plus its "Lines X-Y of Z" footer. */
export function visibleOutput(panel: AgentPanel, viewHeight: number): { lines: AgentPanel["output"]; footer: string } {
  const total = panel.output.length;
  const start = Math.min(panel.scrollPos, total);
  const end = Math.min(start + viewHeight, total);
  const footer = total > 0 ? `Lines ${start + 1}-${end} of ${total}` : `Lines 0-0 of 0`;
  return { lines: panel.output.slice(start, end), footer };
}

function renderOutput(state: DashboardState, { style }: RenderContext): string {
  const panel = state.focusedPanel;
  if (!panel) {
    return box(state, "Output", "Select a task to view output.");
  }

  const status = panelStatus(panel);
  const viewHeight = state.viewHeight;
  const { lines: visible, footer } = visibleOutput(panel, viewHeight);

  const lines = [
    `Task: ${panel.taskTitle}`,
    `Status: ${toneStyle(style, status.tone)(status.label)} | PID: ${panel.pid} | Scroll: ${panel.follow ? "follow" : "paused"}`,
    "-".repeat(RULE_WIDTH),
    ...visible.map((line) => (line.isStderr ? style.yellow(line.text) : style.whiteBright(line.text))),
  ];
  while (lines.length < viewHeight + 3) {
    lines.push("");
  }
  lines.push(style.gray(footer));
  return box(state, "Output", lines.join("\n"));
}
