export interface UpdateInfo {
  readonly latestVersion: string;
  readonly updateAvailable: boolean;
}

export interface UpdateCheckOptions {
  registryUrl: string;
  packageName?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export const PACKAGE_NAME = "boardrunner";
export const UPDATE_CHECK_TIMEOUT_MS = 3000;

const NO_UPDATE: UpdateInfo = { latestVersion: "", updateAvailable: false };

/**
 * Compare dotted numeric versions. A leading "v" and any pre-release suffix
 * are ignored; missing parts count as zero.
 */
export function compareVersions(a: string, b: string): number {
  const parse = (v: string) =>
    v
      .trim()
      .replace(/^v/, "")
      .split(/[-+]/)[0]
      .split(".")
      .map((part) => {
        const n = Number.parseInt(part, 10);
        return Number.isNaN(n) ? 0 : n;
      });
  const left = parse(a);
  const right = parse(b);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }
  return 0;
}

/** Ask the registry for the latest published version. Never rejects. */
export async function checkForUpdate(current: string, options: UpdateCheckOptions): Promise<UpdateInfo> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const base = options.registryUrl.replace(/\/+$/, "");
  const url = `${base}/${options.packageName ?? PACKAGE_NAME}/latest`;

  try {
    const response = await fetchImpl(url, {
      headers: { accept: "application/json" },
      signal: AbortSignal.timeout(options.timeoutMs ?? UPDATE_CHECK_TIMEOUT_MS),
    });
    if (!response.ok) {
      return NO_UPDATE;
    }
    const body: unknown = await response.json();
    if (typeof body !== "object" || body === null || !("version" in body) || typeof body.version !== "string") {
      return NO_UPDATE;
    }
    const latestVersion = body.version;
    return { latestVersion, updateAvailable: compareVersions(latestVersion, current) > 0 };
  } catch {
    return NO_UPDATE;
  }
}
