import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BoardrunnerConfig {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly dataDir: string;
  readonly agent: string;
  readonly workDir: string;
  readonly agentEnv: Readonly<Record<string, string>>;
  readonly runTimeoutMs: number;
  readonly graceMs: number;
  readonly tickMs: number;
  readonly updateCheck: boolean;
  readonly registryUrl: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const DEFAULTS: BoardrunnerConfig = {
  logLevel: "info",
  logFile: "./data/boardrunner.log",
  dataDir: "./data",
  agent: "claude",
  workDir: process.cwd(),
  agentEnv: {},
  runTimeoutMs: 0,
  graceMs: 5000,
  tickMs: 200,
  updateCheck: true,
  registryUrl: "https://registry.npmjs.org",
};

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): BoardrunnerConfig {
  const filePath = configPath ?? resolve(process.cwd(), "boardrunner.config.json");

  let fileConfig: Partial<BoardrunnerConfig> = {};
  if (existsSync(filePath)) {
    try {
      const raw = readFileSync(filePath, "utf-8");
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error("expected a JSON object");
      }
      fileConfig = parsed as Partial<BoardrunnerConfig>;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to load config from ${filePath}: ${message}`);
    }
  }

  return { ...DEFAULTS, ...fileConfig, ...envOverrides(env) };
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<BoardrunnerConfig> {
  const overrides: { logLevel?: LogLevel; agent?: string } = {};
  const level = env.BOARDRUNNER_LOG_LEVEL;
  const match = LOG_LEVELS.find((candidate) => candidate === level);
  if (match) {
    overrides.logLevel = match;
  }
  if (env.BOARDRUNNER_AGENT) {
    overrides.agent = env.BOARDRUNNER_AGENT;
  }
  return overrides;
}
