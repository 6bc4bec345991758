import { emitKeypressEvents } from "node:readline";
import type { Key } from "node:readline";
import type { Channel } from "../channel/channel.js";
import type { Logger } from "../logger.js";
import { mapKey } from "./input.js";
import type { InputAction } from "./types.js";

export interface KeyInput extends NodeJS.ReadableStream {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Puts the input stream in raw mode and feeds mapped key actions into the
 * dashboard's input channel. Keys that map to nothing are not queued, and a
 * full channel drops the key.
 */
export class KeyboardListener {
  private handler: ((input: string | undefined, key: Key | undefined) => void) | null = null;

  constructor(
    private readonly input: KeyInput,
    private readonly inputs: Channel<InputAction>,
    private readonly logger: Logger,
  ) {}

  start(): void {
    if (this.handler) return;
    emitKeypressEvents(this.input);
    this.setRaw(true);
    this.handler = (input, key) => {
      const action = mapKey(input, key);
      if (action.type === "none") return;
      if (!this.inputs.trySend(action)) {
        this.logger.debug({ action: action.type }, "Input dropped, queue full");
      }
    };
    this.input.on("keypress", this.handler);
    this.input.resume();
  }

  stop(): void {
    if (!this.handler) return;
    this.input.off("keypress", this.handler);
    this.handler = null;
    this.setRaw(false);
    this.input.pause();
  }

  private setRaw(mode: boolean): void {
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(mode);
    }
  }
}
