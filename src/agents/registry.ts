import type { Logger } from "../logger.js";
import { parseClaudeLine, parsePlainLine } from "./output-parser.js";
import { ProcessAgent } from "./process-agent.js";
import { createTerminator, type ProcessTreeTerminator } from "./process-tree.js";
import type { Agent, AgentDefinition, AgentOptions } from "./types.js";

export const claudeCode: AgentDefinition = {
  name: "claude",
  displayName: "Claude Code",
  command: "claude",
  buildArgs: (prompt) => ["--print", "--dangerously-skip-permissions", prompt],
  parseLine: parseClaudeLine,
};

export const codex: AgentDefinition = {
  name: "codex",
  displayName: "Codex",
  command: "codex",
  buildArgs: (prompt) => ["exec", "--full-auto", prompt],
  parseLine: parsePlainLine,
};

const AGENTS: Record<string, AgentDefinition> = {
  [claudeCode.name]: claudeCode,
  [codex.name]: codex,
};

export function listAgentNames(): string[] {
  return Object.keys(AGENTS).sort();
}

export function getAgentDefinition(name: string): AgentDefinition {
  const normalized = name.trim().toLowerCase();
  const definition = AGENTS[normalized];
  if (!definition) {
    const supported = listAgentNames().join(", ");
    throw new Error(`Unsupported agent "${name}". Supported agents: ${supported}`);
  }
  return definition;
}

export type AgentFactory = () => Agent;

export function createAgentFactory(
  name: string,
  options: AgentOptions,
  logger: Logger,
  terminator: ProcessTreeTerminator = createTerminator(logger),
): { definition: AgentDefinition; create: AgentFactory } {
  const definition = getAgentDefinition(name);
  return {
    definition,
    create: () => new ProcessAgent(definition, options, terminator, logger),
  };
}
