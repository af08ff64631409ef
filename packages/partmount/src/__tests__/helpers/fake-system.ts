// IMPLEMENTATION_VALIDATION
import { vi } from "vitest";
import type { RunSubprocess, SubprocessResult } from "@/lib/subprocess";

export interface FakeSystemOptions {
  /** blkid answers, keyed by device */
  uuids?: Record<string, string>;
  /** Paths for which `test -L` succeeds */
  symlinks?: string[];
  /** Make `mkdir -p` fail */
  failMkdir?: boolean;
  /** Make `mount` fail */
  failMount?: boolean;
}

const ok = (stdout = ""): SubprocessResult => ({ exitCode: 0, stdout, stderr: "" });
const fail = (stderr = ""): SubprocessResult => ({ exitCode: 1, stdout: "", stderr });

/**
 * In-process stand-in for blkid, test, mkdir and mount.
 * Unknown commands fail with exit code 127.
 */
export function createFakeSystem(options: FakeSystemOptions = {}) {
  const { uuids = {}, symlinks = [], failMkdir = false, failMount = false } = options;

  return vi.fn<RunSubprocess>((command, args) => {
    switch (command) {
      case "blkid": {
        const device = args[args.length - 1];
        const uuid = uuids[device];
        return uuid === undefined ? fail() : ok(`${uuid}\n`);
      }
      case "test":
        return symlinks.includes(args[1]) ? ok() : fail();
      case "mkdir":
        return failMkdir ? fail("mkdir: permission denied") : ok();
      case "mount":
        return failMount ? fail("mount: unknown filesystem type") : ok();
      default:
        return { exitCode: 127, stdout: "", stderr: `${command}: not found` };
    }
  });
}

/** Commands (with their argv) a fake system was asked to run. */
export function commandsRun(fake: ReturnType<typeof createFakeSystem>): string[][] {
  return fake.mock.calls.map(([command, args]) => [command, ...args]);
}
