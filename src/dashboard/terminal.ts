import type { Viewport } from "./types.js";

const ALT_SCREEN_ON = "\x1b[?1049h";
const ALT_SCREEN_OFF = "\x1b[?1049l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const HOME_AND_CLEAR = "\x1b[H\x1b[2J";

/** Where the dashboard loop writes its frames. Only the loop touches it. */
export interface RenderSurface {
  open(): void;
  size(): Viewport;
  draw(frame: string): void;
  close(): void;
}

export interface TerminalOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(chunk: string): boolean;
}

/** Full-screen surface on the alternate screen buffer, restored on close. */
export class TtySurface implements RenderSurface {
  private opened = false;

  constructor(private readonly out: TerminalOutput = process.stdout) {}

  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.out.write(ALT_SCREEN_ON + HIDE_CURSOR);
  }

  /** Zero means the size is unknown, e.g. when output is not a terminal. */
  size(): Viewport {
    return { width: this.out.columns ?? 0, height: this.out.rows ?? 0 };
  }

  draw(frame: string): void {
    this.out.write(HOME_AND_CLEAR + frame);
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.out.write(SHOW_CURSOR + ALT_SCREEN_OFF);
  }
}
