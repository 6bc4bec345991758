import type { Key } from "node:readline";
import type { InputAction } from "./types.js";

const NONE: InputAction = { type: "none" };

const NAMED_KEYS: Record<string, InputAction> = {
  escape: { type: "quit" },
  tab: { type: "select-next" },
  down: { type: "select-next" },
  up: { type: "select-prev" },
  pageup: { type: "scroll-page", pages: -1 },
  pagedown: { type: "scroll-page", pages: 1 },
  home: { type: "scroll-top" },
  end: { type: "scroll-bottom" },
};

const CHARACTER_KEYS: Record<string, InputAction> = {
  q: { type: "quit" },
  m: { type: "toggle-mode" },
  j: { type: "select-next" },
  k: { type: "select-prev" },
  s: { type: "stop" },
  x: { type: "close" },
  c: { type: "close" },
  f: { type: "follow" },
  g: { type: "scroll-top" },
  G: { type: "scroll-bottom" },
  u: { type: "scroll-lines", delta: -3 },
  d: { type: "scroll-lines", delta: 3 },
};

/**
 * Translate one keypress (as emitted by `readline.emitKeypressEvents`) into a
 * dashboard action. Unknown keys map to `none`.
 */
export function mapKey(input: string | undefined, key: Key | undefined): InputAction {
  if (key?.ctrl) {
    return key.name === "c" ? { type: "quit" } : NONE;
  }
  if (key?.name === "tab" && key.shift) {
    return { type: "select-prev" };
  }
  if (key?.name && NAMED_KEYS[key.name]) {
    return NAMED_KEYS[key.name];
  }

  const char = input ?? key?.sequence;
  if (!char || key?.meta) {
    return NONE;
  }
  return CHARACTER_KEYS[char] ?? NONE;
}
