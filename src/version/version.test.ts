import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { currentVersion } from "./version.js";

describe("currentVersion", () => {
  it("reads the project's own package.json", () => {
    expect(currentVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it("falls back to dev for an unreadable manifest", () => {
    const dir = mkdtempSync(join(tmpdir(), "boardrunner-version-"));
    try {
      const manifest = join(dir, "package.json");
      writeFileSync(manifest, "{ not json");
      expect(currentVersion(manifest)).toBe("dev");
      expect(currentVersion(join(dir, "missing.json"))).toBe("dev");
      writeFileSync(manifest, JSON.stringify({ version: "3.1.4" }));
      expect(currentVersion(manifest)).toBe("3.1.4");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
