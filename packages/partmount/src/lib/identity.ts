// IMPLEMENTATION_VALIDATION
import type { RunSubprocess } from "./subprocess";
import { runSubprocess as defaultRunSubprocess } from "./subprocess";
import { queryFilesystemUuid } from "./system";

export interface VerifyUuidOptions {
  /** Subprocess runner for testing */
  subprocess?: RunSubprocess;
}

/**
 * Compare the filesystem UUID blkid reports for `device` with the expected
 * one. A mismatch, including an empty or failed query, is reported as a
 * warning and returned as false; it never throws.
 */
export function verifyUuid(
  device: string,
  expectedUuid: string,
  options: VerifyUuidOptions = {},
): boolean {
  const { subprocess = defaultRunSubprocess } = options;
  const actualUuid = queryFilesystemUuid(device, subprocess);

  if (actualUuid !== expectedUuid) {
    console.log(
      `[WARNING]: UUID Mismatch! Dev: ${device} | Expected: ${expectedUuid} | Actual: ${actualUuid}`,
    );
    return false;
  }

  console.log("  |- Identity: UUID verified.");
  return true;
}
