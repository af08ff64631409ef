// IMPLEMENTATION_VALIDATION
import { isMapperDevice, parentBlockDevice, resolveDevicePath } from "./device";
import { verifyUuid } from "./identity";
import type { PartitionEntry } from "./partitions";
import { DEFAULT_MOUNT_CONFIG, type MountConfig } from "./settings";
import type { RunSubprocess } from "./subprocess";

export interface PreflightOptions {
  config?: MountConfig;
  /** Subprocess runner for testing */
  subprocess?: RunSubprocess;
}

/** What preflight found out about one partition. Advisory only. */
export interface PreflightReport {
  mountPoint: string;
  device: string;
  parentDevice: string;
  /** null when the entry declares no UUID */
  uuidVerified: boolean | null;
  /** Device is a mapper node (an unlocked LUKS volume) */
  encrypted: boolean;
  /** Subvolume named by the entry; null means the default is used */
  subvolume: string | null;
}

/**
 * Examine a partition before it is mounted: identity check against the
 * declared UUID, mapper-device detection and subvolume selection.
 *
 * Nothing found here stops the mount. A UUID mismatch or a missing
 * subvolume is logged and reported, and the caller mounts regardless.
 */
export function preflightCheck(
  entry: PartitionEntry,
  options: PreflightOptions = {},
): PreflightReport {
  const { config = DEFAULT_MOUNT_CONFIG, subprocess } = options;
  const device = resolveDevicePath(entry);
  const parentDevice = parentBlockDevice(device);

  console.log(`\n[LOG]: Examining ${entry.mountPoint}`);
  console.log(`  |- Physical Device: ${device} -> Parent: ${parentDevice}`);

  let uuidVerified: boolean | null = null;
  if (entry.uuid) {
    uuidVerified = verifyUuid(device, entry.uuid, { subprocess });
  }

  const encrypted = isMapperDevice(device);
  if (encrypted) {
    console.log("  |- Security: LUKS active. Trusting mapper node.");
  }

  const subvolume = entry.subvolume || null;
  if (subvolume) {
    console.log(`  |- Btrfs Logic: Targeted Subvolume: ${subvolume}`);
  } else {
    console.log(
      `  |- Btrfs Logic: No subvolume set, using default ${config.defaultSubvolume}`,
    );
  }

  return {
    mountPoint: entry.mountPoint,
    device,
    parentDevice,
    uuidVerified,
    encrypted,
    subvolume,
  };
}
