import { describe, it, expect } from "vitest";
import { mapKey } from "./input.js";

describe("mapKey", () => {
  it.each([
    ["q", { type: "quit" }],
    ["m", { type: "toggle-mode" }],
    ["j", { type: "select-next" }],
    ["k", { type: "select-prev" }],
    ["s", { type: "stop" }],
    ["x", { type: "close" }],
    ["c", { type: "close" }],
    ["f", { type: "follow" }],
    ["g", { type: "scroll-top" }],
    ["G", { type: "scroll-bottom" }],
    ["u", { type: "scroll-lines", delta: -3 }],
    ["d", { type: "scroll-lines", delta: 3 }],
  ])("maps %j", (char, expected) => {
    expect(mapKey(char, { sequence: char, name: char.toLowerCase(), shift: char !== char.toLowerCase() })).toEqual(
      expected,
    );
  });

  it.each([
    ["escape", { type: "quit" }],
    ["tab", { type: "select-next" }],
    ["down", { type: "select-next" }],
    ["up", { type: "select-prev" }],
    ["pageup", { type: "scroll-page", pages: -1 }],
    ["pagedown", { type: "scroll-page", pages: 1 }],
    ["home", { type: "scroll-top" }],
    ["end", { type: "scroll-bottom" }],
  ])("maps the %s key", (name, expected) => {
    expect(mapKey(undefined, { name })).toEqual(expected);
  });

  it("maps ctrl+c to quit rather than close", () => {
    expect(mapKey("\x03", { name: "c", ctrl: true, sequence: "\x03" })).toEqual({ type: "quit" });
  });

  it("maps shift+tab to select-prev", () => {
    expect(mapKey(undefined, { name: "tab", shift: true, sequence: "\x1b[Z" })).toEqual({ type: "select-prev" });
  });

  it("ignores other control and meta chords", () => {
    expect(mapKey("\x04", { name: "d", ctrl: true })).toEqual({ type: "none" });
    expect(mapKey("q", { name: "q", meta: true })).toEqual({ type: "none" });
  });

  it("ignores unknown keys", () => {
    expect(mapKey("z", { name: "z", sequence: "z" })).toEqual({ type: "none" });
    expect(mapKey(undefined, { name: "f5" })).toEqual({ type: "none" });
    expect(mapKey(undefined, undefined)).toEqual({ type: "none" });
  });
});
