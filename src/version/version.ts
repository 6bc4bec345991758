import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

const PACKAGE_JSON = fileURLToPath(new URL("../../package.json", import.meta.url));

let cached: string | null = null;

/** Version from the package's own package.json, or "dev" when it cannot be read. */
export function currentVersion(path: string = PACKAGE_JSON): string {
  if (path === PACKAGE_JSON && cached !== null) {
    return cached;
  }
  let version = "dev";
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      version = parsed.version;
    }
  } catch {
    version = "dev";
  }
  if (path === PACKAGE_JSON) {
    cached = version;
  }
  return version;
}
