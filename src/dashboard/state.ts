import type { RunHandle, RunResult, OutputLine } from "../agents/types.js";
import type { Channel } from "../channel/channel.js";
import type { Logger } from "../logger.js";
import type { ExecutionMode } from "../mode.js";
import { isPanelRunning } from "./format.js";
import { clampScroll, outputViewHeight } from "./scroll.js";
import type { AgentPanel, DashboardEvent, InputAction, Viewport } from "./types.js";

export interface DashboardStateOptions {
  readonly criteria: string;
  readonly mode: ExecutionMode;
  readonly logger: Logger;
  /** Best-effort outbound notifications; a full channel drops the update. */
  readonly modeUpdates?: Channel<ExecutionMode> | null;
  readonly stopUpdates?: Channel<string> | null;
  /** Turns raw agent output into display text; an empty result hides the line. */
  readonly parseLine?: (line: string) => string;
  /** Told when a panel's cancel settles; expected to queue a `stop-settled` event. */
  readonly onStopSettled?: (panelId: string) => void;
  readonly now?: () => number;
}

/**
 * Render-ready dashboard state. Only the dashboard loop mutates it, one event
 * or action per turn, so it carries no locking.
 */
export class DashboardState {
  readonly criteria: string;
  mode: ExecutionMode;
  listening = false;
  connected = false;
  lastError: Error | null = null;
  taskCount = 0;
  updateAvailable = false;
  latestVersion = "";
  tick = 0;
  viewport: Viewport = { width: 0, height: 0 };

  private _panels: AgentPanel[] = [];
  private _focusedIndex = -1;
  private nextPanelId = 0;
  private readonly logger: Logger;
  private readonly modeUpdates: Channel<ExecutionMode> | null;
  private readonly stopUpdates: Channel<string> | null;
  private readonly parseLine: (line: string) => string;
  private readonly onStopSettled: (panelId: string) => void;
  private readonly now: () => number;

  constructor(options: DashboardStateOptions) {
    this.criteria = options.criteria;
    this.mode = options.mode;
    this.logger = options.logger.child({ component: "dashboard" });
    this.modeUpdates = options.modeUpdates ?? null;
    this.stopUpdates = options.stopUpdates ?? null;
    this.parseLine = options.parseLine ?? ((line) => line);
    this.onStopSettled = options.onStopSettled ?? (() => undefined);
    this.now = options.now ?? Date.now;
  }

  get panels(): readonly AgentPanel[] {
    return this._panels;
  }

  /** Index into `panels`, or -1 exactly when there are no panels. */
  get focusedIndex(): number {
    return this._focusedIndex;
  }

  get focusedPanel(): AgentPanel | null {
    return this._panels[this._focusedIndex] ?? null;
  }

  get viewHeight(): number {
    return outputViewHeight(this.viewport.height);
  }

  applyEvent(event: DashboardEvent): void {
    switch (event.type) {
      case "listener-connected":
        this.connected = true;
        this.listening = true;
        this.lastError = null;
        break;
      case "listener-error":
        this.lastError = event.error;
        break;
      case "add-agent":
        this.addPanel(event.taskId, event.taskTitle, event.agentName, event.runner);
        break;
      case "agent-output":
        this.appendOutput(event.taskId, event.line);
        break;
      case "agent-completed":
        this.completePanel(event.taskId, event.result);
        break;
      case "version-check":
        this.updateAvailable = event.updateAvailable;
        this.latestVersion = event.latestVersion;
        break;
      case "stop-settled":
        this.settleStop(event.panelId);
        break;
    }
  }

  /** Returns true when the action ends the loop. */
  applyInput(action: InputAction): boolean {
    switch (action.type) {
      case "quit":
        return true;
      case "toggle-mode":
        this.toggleMode();
        break;
      case "select-next":
        this.moveFocus(1);
        break;
      case "select-prev":
        this.moveFocus(-1);
        break;
      case "stop":
        this.stopFocused();
        break;
      case "close":
        this.closeFocused();
        break;
      case "scroll-lines":
        this.scrollBy(action.delta);
        break;
      case "scroll-page":
        this.scrollBy(action.pages * this.viewHeight);
        break;
      case "scroll-top":
        this.withFocused((panel) => this.scrollTo(panel, 0, false));
        break;
      case "scroll-bottom":
      case "follow":
        this.withFocused((panel) => this.scrollTo(panel, panel.scrollPos, true));
        break;
      case "none":
        break;
    }
    return false;
  }

  /** Periodic refresh: advance the animation frame and pick up a resized terminal. */
  advanceTick(viewport?: Viewport): void {
    this.tick++;
    if (viewport) {
      this.resize(viewport);
    }
  }

  /** Non-positive dimensions mean "unknown" and keep the previous value. */
  resize(viewport: Viewport): void {
    const width = viewport.width > 0 ? viewport.width : this.viewport.width;
    const height = viewport.height > 0 ? viewport.height : this.viewport.height;
    if (width === this.viewport.width && height === this.viewport.height) {
      return;
    }
    this.viewport = { width, height };
    for (const panel of this._panels) {
      this.scrollTo(panel, panel.scrollPos, panel.follow);
    }
  }

  addPanel(taskId: string, taskTitle: string, agentName: string, runner: RunHandle | null): string {
    this.nextPanelId++;
    const panel: AgentPanel = {
      id: `agent-${this.nextPanelId}`,
      taskId,
      taskTitle,
      agentName,
      runner,
      output: [],
      startTime: this.now(),
      endTime: null,
      result: null,
      scrollPos: 0,
      follow: true,
      focused: false,
      closed: false,
      stopping: false,
      stopRequested: false,
      stopSettled: false,
      pid: runner?.pid ?? 0,
    };
    this._panels.push(panel);
    if (this._panels.length === 1) {
      this.setFocus(0);
    }
    this.logger.debug({ panelId: panel.id, taskId }, "Agent panel added");
    return panel.id;
  }

  hasRunningAgents(): boolean {
    return this._panels.some(isPanelRunning);
  }

  /** Stop every still-running panel. Resolves once each cancel has settled. */
  async cancelAll(): Promise<void> {
    const cancels: Promise<void>[] = [];
    for (const panel of this._panels) {
      const cancel = this.requestStop(panel);
      if (cancel) {
        cancels.push(cancel);
      }
    }
    await Promise.allSettled(cancels);
  }

  private toggleMode(): void {
    this.mode = this.mode.toggle();
    if (this.modeUpdates && !this.modeUpdates.trySend(this.mode)) {
      this.logger.debug({ mode: this.mode.name }, "Mode update dropped");
    }
  }

  /** Newest panel for the task that has not completed yet. */
  private ownerOf(taskId: string): AgentPanel | undefined {
    for (let i = this._panels.length - 1; i >= 0; i--) {
      const panel = this._panels[i];
      if (panel.taskId === taskId && panel.result === null) {
        return panel;
      }
    }
    return undefined;
  }

  private appendOutput(taskId: string, line: OutputLine): void {
    const panel = this.ownerOf(taskId);
    if (!panel) {
      return;
    }
    const text = this.parseLine(line.text);
    if (text === "") {
      return;
    }
    panel.output.push(text === line.text ? line : { ...line, text });
    this.scrollTo(panel, panel.scrollPos, panel.follow);
  }

  private completePanel(taskId: string, result: RunResult): void {
    const panel = this.ownerOf(taskId);
    if (!panel) {
      return;
    }
    panel.result = result;
    panel.endTime = this.now();
    panel.runner = null;
    panel.stopping = false;
    this.taskCount++;
  }

  private moveFocus(step: 1 | -1): void {
    const count = this._panels.length;
    if (count === 0) {
      return;
    }
    this.setFocus((this._focusedIndex + step + count) % count);
    this.withFocused((panel) => this.scrollTo(panel, panel.scrollPos, true));
  }

  private stopFocused(): void {
    const panel = this.focusedPanel;
    if (!panel) {
      return;
    }
    if (this.requestStop(panel) && this.stopUpdates && !this.stopUpdates.trySend(panel.taskId)) {
      this.logger.debug({ taskId: panel.taskId }, "Stop notification dropped");
    }
  }

  /** Cancels the panel's run at most once; returns the cancel, or null when nothing was done. */
  private requestStop(panel: AgentPanel): Promise<void> | null {
    const runner = panel.runner;
    if (!runner || !runner.isRunning() || panel.stopping) {
      return null;
    }
    panel.stopping = true;
    panel.stopRequested = true;
    this.logger.info({ taskId: panel.taskId, pid: panel.pid }, "Stopping agent");
    return runner
      .cancel()
      .catch((err: unknown) => {
        this.logger.error({ err, taskId: panel.taskId }, "Failed to stop agent");
      })
      .finally(() => this.onStopSettled(panel.id));
  }

  private settleStop(panelId: string): void {
    const panel = this._panels.find((p) => p.id === panelId);
    if (!panel || panel.result !== null || !panel.stopping) {
      return;
    }
    panel.stopSettled = true;
    panel.endTime = this.now();
    if (isPanelRunning(panel)) {
      this.logger.warn({ taskId: panel.taskId, pid: panel.pid }, "Agent still reports running after its stop settled");
    }
  }

  private closeFocused(): void {
    const index = this._focusedIndex;
    const panel = this.focusedPanel;
    if (!panel) {
      return;
    }
    panel.closed = true;
    panel.focused = false;
    this._panels.splice(index, 1);
    if (this._panels.length === 0) {
      this._focusedIndex = -1;
      return;
    }
    this.setFocus(Math.min(index, this._panels.length - 1));
  }

  private scrollBy(delta: number): void {
    this.withFocused((panel) => this.scrollTo(panel, panel.scrollPos + delta, false));
  }

  private scrollTo(panel: AgentPanel, position: number, follow: boolean): void {
    panel.follow = follow;
    panel.scrollPos = clampScroll(panel.output.length, this.viewHeight, position, follow);
  }

  private withFocused(fn: (panel: AgentPanel) => void): void {
    const panel = this.focusedPanel;
    if (panel) {
      fn(panel);
    }
  }

  private setFocus(index: number): void {
    this._focusedIndex = index;
    this._panels.forEach((panel, i) => {
      panel.focused = i === index;
    });
  }
}
