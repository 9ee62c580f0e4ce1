import { execFile, type ExecFileException } from "node:child_process";
import { ToolError, type ToolFailureReason } from "../errors";
import { stderrTail, type ToolLog } from "../tool-log";

export interface RunToolOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  log: ToolLog;
}

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Run an external command to completion. The child is killed with SIGKILL
 * on timeout or when the signal aborts. Every invocation is logged.
 */
export function runTool(
  tool: string,
  command: string,
  args: string[],
  options: RunToolOptions
): Promise<ToolOutput> {
  const { timeoutMs, signal, env, cwd, log } = options;
  if (signal?.aborted) {
    return Promise.reject(new ToolError(tool, "cancelled", "cancelled before start"));
  }

  const started = Date.now();
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      {
        timeout: timeoutMs,
        killSignal: "SIGKILL",
        signal,
        env,
        cwd,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      },
      (error, stdout, stderr) => {
        const durationMs = Date.now() - started;
        if (!error) {
          log.append({
            timestamp: new Date().toISOString(),
            tool,
            args,
            durationMs,
            exitCode: 0,
            stderrTail: stderrTail(stderr),
          });
          resolve({ stdout, stderr });
          return;
        }

        const reason = failureReason(error, signal);
        const exitCode = typeof error.code === "number" ? error.code : null;
        log.append({
          timestamp: new Date().toISOString(),
          tool,
          args,
          durationMs,
          exitCode,
          failure: reason,
          stderrTail: stderrTail(stderr),
        });
        reject(new ToolError(tool, reason, describeFailure(reason, error, timeoutMs), stderr, exitCode));
      }
    );
  });
}

function failureReason(error: ExecFileException, signal?: AbortSignal): ToolFailureReason {
  if (signal?.aborted) return "cancelled";
  if (error.killed) return "timeout";
  if (typeof error.code === "string") return "spawn";
  return "exit";
}

function describeFailure(
  reason: ToolFailureReason,
  error: ExecFileException,
  timeoutMs: number
): string {
  switch (reason) {
    case "cancelled":
      return "cancelled";
    case "timeout":
      return `timed out after ${timeoutMs}ms`;
    case "spawn":
      return `could not start (${error.code})`;
    default:
      return error.signal
        ? `killed by ${error.signal}`
        : `exited with code ${error.code}`;
  }
}
