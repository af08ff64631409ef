// IMPLEMENTATION_VALIDATION
import { execFileSync } from "node:child_process";

export interface SubprocessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Thin wrapper for subprocess invocation, easily mockable in tests.
 * Default implementation shells out using execFileSync.
 */
export type RunSubprocess = (
  command: string,
  args: string[],
  options?: { cwd?: string },
) => SubprocessResult;

interface ExecFailure {
  status?: number | null;
  stdout?: unknown;
  stderr?: unknown;
  message?: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return typeof err === "object" && err !== null;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf-8");
  return "";
}

export const runSubprocess: RunSubprocess = (command, args, options) => {
  try {
    const stdout = execFileSync(command, args, {
      cwd: options?.cwd,
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
      maxBuffer: 10 * 1024 * 1024,
    });
    return { exitCode: 0, stdout, stderr: "" };
  } catch (err: unknown) {
    if (!isExecFailure(err)) {
      return { exitCode: 1, stdout: "", stderr: String(err) };
    }
    return {
      exitCode: err.status ?? 1,
      stdout: asText(err.stdout),
      stderr: asText(err.stderr) || (err.message ?? ""),
    };
  }
};
