// IMPLEMENTATION_VALIDATION
import type { RunSubprocess, SubprocessResult } from "./subprocess";

/** Characters that are safe to leave unquoted in a POSIX shell word. */
const SAFE_SHELL_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single argument for display as part of a shell command line.
 * Plain words pass through; anything else is single-quoted with embedded
 * single quotes escaped as '\''.
 */
export function shellQuote(arg: string): string {
  if (arg !== "" && SAFE_SHELL_WORD.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Render an argv as one shell command line, quoting each argument on its own. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(shellQuote).join(" ");
}

/**
 * Filesystem UUID as reported by blkid. Whitespace (including the trailing
 * newline) is stripped; a failed query yields an empty string.
 */
export function queryFilesystemUuid(
  device: string,
  subprocess: RunSubprocess,
): string {
  const result = subprocess("blkid", ["-s", "UUID", "-o", "value", device]);
  if (result.exitCode !== 0) {
    return "";
  }
  return result.stdout.replace(/\s+/g, "");
}

/** `test -L` succeeds only when the path is a symbolic link. */
export function isSymlink(path: string, subprocess: RunSubprocess): boolean {
  return subprocess("test", ["-L", path]).exitCode === 0;
}

export function makeDirectory(
  path: string,
  subprocess: RunSubprocess,
): SubprocessResult {
  return subprocess("mkdir", ["-p", path]);
}

/** argv for mounting `subvolume` of `device` at `target`. */
export function mountArgs(
  subvolume: string,
  options: string,
  device: string,
  target: string,
): string[] {
  return ["-o", `subvol=${subvolume},${options}`, device, target];
}
