import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { KeyboardListener } from "./keyboard.js";
import { Channel } from "../channel/channel.js";
import type { InputAction } from "./types.js";
import { createSilentLogger } from "../logger.js";

describe("KeyboardListener", () => {
  it("queues mapped actions and skips unmapped keys", () => {
    const input = new PassThrough();
    const inputs = new Channel<InputAction>("inputs", 4);
    const listener = new KeyboardListener(input, inputs, createSilentLogger());
    listener.start();

    input.emit("keypress", "j", { name: "j", sequence: "j" });
    input.emit("keypress", "z", { name: "z", sequence: "z" });
    input.emit("keypress", undefined, { name: "pagedown", sequence: "\x1b[6~" });

    expect(inputs.tryReceive()).toEqual({ type: "select-next" });
    expect(inputs.tryReceive()).toEqual({ type: "scroll-page", pages: 1 });
    expect(inputs.tryReceive()).toBeUndefined();
    listener.stop();
  });

  it("drops keys once the queue is full", () => {
    const input = new PassThrough();
    const inputs = new Channel<InputAction>("inputs", 1);
    const listener = new KeyboardListener(input, inputs, createSilentLogger());
    listener.start();

    input.emit("keypress", "q", { name: "q", sequence: "q" });
    input.emit("keypress", "m", { name: "m", sequence: "m" });

    expect(inputs.size).toBe(1);
    expect(inputs.tryReceive()).toEqual({ type: "quit" });
    listener.stop();
  });

  it("stops listening after stop", () => {
    const input = new PassThrough();
    const inputs = new Channel<InputAction>("inputs", 4);
    const listener = new KeyboardListener(input, inputs, createSilentLogger());
    listener.start();
    listener.stop();

    input.emit("keypress", "q", { name: "q", sequence: "q" });
    expect(inputs.size).toBe(0);
  });
});
