import fs from "node:fs";
import path from "node:path";

export interface ToolLogEntry {
  timestamp: string;
  tool: string;
  args: string[];
  durationMs: number;
  exitCode: number | null;
  /** Failure reason when the invocation did not succeed */
  failure?: string;
  stderrTail?: string;
}

export interface ToolLog {
  append(entry: ToolLogEntry): void;
}

export const nullToolLog: ToolLog = {
  append: () => {},
};

const STDERR_TAIL_CHARS = 2000;

export const TOOL_LOG_SUFFIX = ".tool-log.jsonl";

/** A job's tool log sits beside its output, or under `logDir` when one is set. */
export function toolLogPath(output: string, logDir?: string): string {
  const resolved = path.resolve(output);
  const name = path.basename(resolved, path.extname(resolved)) + TOOL_LOG_SUFFIX;
  return path.join(logDir ? path.resolve(logDir) : path.dirname(resolved), name);
}

export function stderrTail(stderr: string): string | undefined {
  const trimmed = stderr.trim();
  if (!trimmed) return undefined;
  return trimmed.length > STDERR_TAIL_CHARS
    ? trimmed.slice(trimmed.length - STDERR_TAIL_CHARS)
    : trimmed;
}

/**
 * Append-only JSONL log of tool invocations, keeping at most `maxEntries`
 * lines (oldest are dropped).
 */
export function createFileToolLog(filePath: string, maxEntries: number): ToolLog {
  return {
    append(entry) {
      appendLogEntry(filePath, entry, maxEntries);
    },
  };
}

export function appendLogEntry(
  filePath: string,
  entry: ToolLogEntry,
  maxEntries: number
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  // Trim if over limit
  const lines = fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
  if (lines.length > maxEntries) {
    fs.writeFileSync(filePath, lines.slice(lines.length - maxEntries).join("\n") + "\n");
  }
}

export function readLogEntries(filePath: string): ToolLogEntry[] {
  if (!fs.existsSync(filePath)) return [];
  return fs
    .readFileSync(filePath, "utf-8")
    .split("\n")
    .filter(Boolean)
    .map((line): ToolLogEntry => JSON.parse(line));
}
