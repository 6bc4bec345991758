import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { RunHandle } from "../agents/types.js";
import { Channel } from "../channel/channel.js";
import type { Logger } from "../logger.js";
import type { ExecutionMode } from "../mode.js";
import type { UpdateInfo } from "../version/check.js";
import type { KeyInput } from "./keyboard.js";
import { KeyboardListener } from "./keyboard.js";
import { renderFrame } from "./render.js";
import { DashboardState } from "./state.js";
import type { RenderSurface } from "./terminal.js";
import type { DashboardEvent, InputAction } from "./types.js";

export const EVENT_QUEUE_CAPACITY = 200;
export const INPUT_QUEUE_CAPACITY = 50;
export const DEFAULT_TICK_MS = 200;

export interface DashboardOptions {
  criteria: string;
  mode: ExecutionMode;
  logger: Logger;
  surface: RenderSurface;
  version: string;
  /** Raw key source. Omit to run without keyboard input. */
  keyboard?: KeyInput | null;
  checkVersion?: (() => Promise<UpdateInfo>) | null;
  modeUpdates?: Channel<ExecutionMode> | null;
  stopUpdates?: Channel<string> | null;
  parseLine?: (line: string) => string;
  style?: ChalkInstance;
  tickMs?: number;
  now?: () => number;
}

/**
 * The dashboard event loop. Producers push into bounded channels; `run`
 * services one domain event, input action or tick per turn, applies it to the
 * state and draws a frame.
 */
export class Dashboard {
  private readonly state: DashboardState;
  private readonly events = new Channel<DashboardEvent>("dashboard event", EVENT_QUEUE_CAPACITY);
  private readonly inputs = new Channel<InputAction>("dashboard input", INPUT_QUEUE_CAPACITY);
  private readonly ticks = new Channel<number>("dashboard tick", 1);
  private readonly logger: Logger;
  private readonly surface: RenderSurface;
  private readonly keyboard: KeyboardListener | null;
  private readonly checkVersion: (() => Promise<UpdateInfo>) | null;
  private readonly style: ChalkInstance;
  private readonly version: string;
  private readonly tickMs: number;
  private readonly now: () => number;
  private turn = 0;
  private running = false;

  constructor(options: DashboardOptions) {
    this.logger = options.logger.child({ component: "dashboard" });
    this.surface = options.surface;
    this.version = options.version;
    this.checkVersion = options.checkVersion ?? null;
    this.style = options.style ?? chalk;
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.now = options.now ?? Date.now;
    this.keyboard = options.keyboard ? new KeyboardListener(options.keyboard, this.inputs, this.logger) : null;
    this.state = new DashboardState({
      criteria: options.criteria,
      mode: options.mode,
      logger: options.logger,
      modeUpdates: options.modeUpdates,
      stopUpdates: options.stopUpdates,
      parseLine: options.parseLine,
      onStopSettled: (panelId) => this.queueStopSettled(panelId),
      now: this.now,
    });
  }

  /** Queue an event without waiting. Throws QueueFullError when the queue is full. */
  send(event: DashboardEvent): void {
    this.events.sendOrThrow(event);
  }

  /** Queue an event, waiting for room. Rejects with ChannelClosedError once the loop has ended. */
  publish(event: DashboardEvent): Promise<void> {
    return this.events.send(event);
  }

  /** Queue a user action as if it had been typed. Returns false when the input queue is full. */
  pushInput(action: InputAction): boolean {
    return this.inputs.trySend(action);
  }

  setListening(listening: boolean): void {
    this.state.listening = listening;
  }

  setConnected(connected: boolean): void {
    this.state.connected = connected;
  }

  setError(error: Error | null): void {
    this.state.lastError = error;
  }

  addAgent(taskId: string, taskTitle: string, agentName: string, runner: RunHandle | null): string {
    return this.state.addPanel(taskId, taskTitle, agentName, runner);
  }

  openPanelCount(): number {
    return this.state.panels.length;
  }

  hasRunningAgents(): boolean {
    return this.state.hasRunningAgents();
  }

  /** Shutdown sweep; the loop never cancels agents on its own. */
  cancelAllAgents(): Promise<void> {
    return this.state.cancelAll();
  }

  /**
   * Run until a quit action or until `signal` aborts. The event and input
   * channels are closed on return, so blocked publishers are released.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error("dashboard is already running");
    }
    if (this.events.closed) {
      throw new Error("dashboard has already run");
    }
    this.running = true;

    let onAbort: () => void = () => undefined;
    const aborted = new Promise<void>((resolve) => {
      onAbort = resolve;
    });
    signal?.addEventListener("abort", onAbort, { once: true });
    const ticker = setInterval(() => {
      this.ticks.trySend(this.now());
    }, this.tickMs);

    this.surface.open();
    try {
      this.keyboard?.start();
      if (this.checkVersion) {
        void this.reportVersion(this.checkVersion);
      }
      this.state.resize(this.surface.size());
      this.draw();
      await this.loop(signal, aborted);
    } finally {
      clearInterval(ticker);
      signal?.removeEventListener("abort", onAbort);
      this.keyboard?.stop();
      this.surface.close();
      this.events.close();
      this.inputs.close();
      this.running = false;
      this.logger.debug("Dashboard loop stopped");
    }
  }

  private async loop(signal: AbortSignal | undefined, aborted: Promise<void>): Promise<void> {
    const sources: Array<() => "quit" | "served" | "idle"> = [
      () => this.serveEvent(),
      () => this.serveInput(),
      () => this.serveTick(),
    ];

    for (;;) {
      if (signal?.aborted) {
        return;
      }

      // Rotate the starting source so a flood on one channel cannot starve the others.
      let outcome: "quit" | "served" | "idle" = "idle";
      for (let i = 0; i < sources.length && outcome === "idle"; i++) {
        outcome = sources[(this.turn + i) % sources.length]();
      }
      this.turn++;

      if (outcome === "quit") {
        return;
      }
      if (outcome === "served") {
        this.draw();
        continue;
      }
      await Promise.race([this.events.ready(), this.inputs.ready(), this.ticks.ready(), aborted]);
    }
  }

  private serveEvent(): "served" | "idle" {
    const event = this.events.tryReceive();
    if (!event) return "idle";
    this.state.applyEvent(event);
    return "served";
  }

  private serveInput(): "quit" | "served" | "idle" {
    const action = this.inputs.tryReceive();
    if (!action) return "idle";
    return this.state.applyInput(action) ? "quit" : "served";
  }

  private serveTick(): "served" | "idle" {
    if (this.ticks.tryReceive() === undefined) return "idle";
    this.state.advanceTick(this.surface.size());
    return "served";
  }

  private draw(): void {
    this.surface.draw(renderFrame(this.state, { now: this.now(), version: this.version, style: this.style }));
  }

  private queueStopSettled(panelId: string): void {
    this.events.send({ type: "stop-settled", panelId }).catch((err: unknown) => {
      this.logger.debug({ err, panelId }, "Stop settlement dropped");
    });
  }

  private async reportVersion(check: () => Promise<UpdateInfo>): Promise<void> {
    try {
      const info = await check();
      if (!this.events.trySend({ type: "version-check", ...info })) {
        this.logger.debug("Version check result dropped");
      }
    } catch (err) {
      this.logger.debug({ err }, "Version check failed");
    }
  }
}
