import { describe, it, expect, vi } from "vitest";
import { checkForUpdate, compareVersions } from "./check.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("compareVersions", () => {
  it("orders numerically rather than lexically", () => {
    expect(compareVersions("0.10.0", "0.9.9")).toBe(1);
    expect(compareVersions("1.2", "1.2.0")).toBe(0);
    expect(compareVersions("v1.2.3", "1.2.4")).toBe(-1);
    expect(compareVersions("2.0.0-beta.1", "2.0.0")).toBe(0);
  });
});

describe("checkForUpdate", () => {
  it("requests the latest tag from the registry", async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse({ version: "0.5.0" }));

    const info = await checkForUpdate("0.4.0", { registryUrl: "https://registry.test/", fetchImpl });

    expect(info).toEqual({ latestVersion: "0.5.0", updateAvailable: true });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe("https://registry.test/boardrunner/latest");
  });

  it("reports no update when already current", async () => {
    const fetchImpl = vi.fn().mockResolvedValue(jsonResponse({ version: "0.4.0" }));
    const info = await checkForUpdate("0.4.0", { registryUrl: "https://registry.test", fetchImpl });
    expect(info).toEqual({ latestVersion: "0.4.0", updateAvailable: false });
  });

  it("treats HTTP errors, bad bodies and network failures as no update", async () => {
    const none = { latestVersion: "", updateAvailable: false };
    const notFound = vi.fn().mockResolvedValue(jsonResponse({ error: "not found" }, 404));
    const badBody = vi.fn().mockResolvedValue(jsonResponse({ name: "boardrunner" }));
    const offline = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

    await expect(checkForUpdate("0.4.0", { registryUrl: "https://registry.test", fetchImpl: notFound })).resolves.toEqual(none);
    await expect(checkForUpdate("0.4.0", { registryUrl: "https://registry.test", fetchImpl: badBody })).resolves.toEqual(none);
    await expect(checkForUpdate("0.4.0", { registryUrl: "https://registry.test", fetchImpl: offline })).resolves.toEqual(none);
  });
});
