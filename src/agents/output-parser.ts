const ANSI_PATTERN = /\x1b\[[0-9;?]*[ -/]*[@-~]|\x1b\][^\x07]*\x07/g;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/** Plain-text agents: drop terminal control sequences and trailing whitespace. */
export function parsePlainLine(line: string): string {
  return stripAnsi(line).replace(/\s+$/, "");
}

function textFromContent(content: unknown): string[] {
  if (typeof content === "string") {
    return [content];
  }
  if (!Array.isArray(content)) {
    return [];
  }
  const parts: string[] = [];
  for (const block of content) {
    if (!isRecord(block)) continue;
    if (block.type === "text" && typeof block.text === "string") {
      parts.push(block.text);
    } else if (block.type === "tool_use" && typeof block.name === "string") {
      parts.push(`→ ${block.name}`);
    }
  }
  return parts;
}

/**
 * Claude Code prints plain text under `--print`, or one JSON event per line
 * under `--output-format stream-json`. JSON events are reduced to their text;
 * events with nothing to show come back empty.
 */
export function parseClaudeLine(line: string): string {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) {
    return parsePlainLine(line);
  }

  const event = safeJsonParse(trimmed);
  if (!isRecord(event)) {
    return parsePlainLine(line);
  }

  switch (event.type) {
    case "assistant": {
      const message = isRecord(event.message) ? event.message : {};
      return textFromContent(message.content).join(" ").trim();
    }
    case "result":
      return typeof event.result === "string" ? event.result.trim() : "";
    default:
      return "";
  }
}
