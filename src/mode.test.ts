import { describe, it, expect } from "vitest";
import { ExecutionMode } from "./mode.js";

describe("ExecutionMode", () => {
  it("toggles between single and continuous", () => {
    expect(ExecutionMode.single.toggle()).toBe(ExecutionMode.continuous);
    expect(ExecutionMode.continuous.toggle()).toBe(ExecutionMode.single);
  });

  it("has human-readable labels", () => {
    expect(ExecutionMode.single.label).toBe("Single task");
    expect(`${ExecutionMode.continuous}`).toBe("Continuous");
  });

  it("parses names", () => {
    expect(ExecutionMode.from("continuous")).toBe(ExecutionMode.continuous);
    expect(() => ExecutionMode.from("turbo")).toThrow('Unknown execution mode "turbo"');
  });
});
