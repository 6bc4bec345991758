import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "boardrunner-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", () => {
    const config = loadConfig("/nonexistent/path.json", {});
    expect(config.agent).toBe("claude");
    expect(config.logLevel).toBe("info");
    expect(config.graceMs).toBe(5000);
    expect(config.tickMs).toBe(200);
    expect(config.runTimeoutMs).toBe(0);
  });

  it("merges file values over defaults", () => {
    const path = join(dir, "boardrunner.config.json");
    writeFileSync(path, JSON.stringify({ agent: "codex", runTimeoutMs: 60000, logFile: null }));
    const config = loadConfig(path, {});
    expect(config.agent).toBe("codex");
    expect(config.runTimeoutMs).toBe(60000);
    expect(config.logFile).toBeNull();
    expect(config.graceMs).toBe(5000);
  });

  it("lets environment variables override the file", () => {
    const path = join(dir, "boardrunner.config.json");
    writeFileSync(path, JSON.stringify({ logLevel: "warn", agent: "codex" }));
    const config = loadConfig(path, { BOARDRUNNER_LOG_LEVEL: "debug", BOARDRUNNER_AGENT: "claude" });
    expect(config.logLevel).toBe("debug");
    expect(config.agent).toBe("claude");
  });

  it("ignores an unknown log level in the environment", () => {
    const config = loadConfig("/nonexistent/path.json", { BOARDRUNNER_LOG_LEVEL: "verbose" });
    expect(config.logLevel).toBe("info");
  });

  it("throws with the file path on malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path, {})).toThrow(`Failed to load config from ${path}`);
  });

  it("rejects a top-level array", () => {
    const path = join(dir, "array.json");
    writeFileSync(path, "[]");
    expect(() => loadConfig(path, {})).toThrow("expected a JSON object");
  });
});
