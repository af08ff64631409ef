// IMPLEMENTATION_VALIDATION

/**
 * Derive the whole-disk device from a partition device path by stripping the
 * trailing partition number, along with the `p` separator NVMe and MMC
 * devices use.
 *
 * "/dev/nvme0n1p3" → "/dev/nvme0n1"
 * "/dev/sda1"      → "/dev/sda"
 * "/dev/mapper/root" is returned unchanged.
 *
 * Pure string transform, no filesystem access.
 */
export function parentBlockDevice(devicePath: string): string {
  return devicePath.replace(/p?\d+$/, "");
}

/** Device-mapper nodes, typically an unlocked LUKS volume. */
export function isMapperDevice(devicePath: string): boolean {
  return devicePath.includes("mapper");
}

/**
 * The device to mount: the mapper node when the entry names an opened LUKS
 * mapping, otherwise the raw device path.
 */
export function resolveDevicePath(entry: {
  device: string;
  luksMapperName?: string;
}): string {
  if (entry.luksMapperName) {
    return `/dev/mapper/${entry.luksMapperName}`;
  }
  return entry.device;
}
