// IMPLEMENTATION_VALIDATION
import { resolveDevicePath } from "./device";
import type { PartitionEntry } from "./partitions";
import { DEFAULT_MOUNT_CONFIG, type MountConfig } from "./settings";
import type { RunSubprocess } from "./subprocess";
import { runSubprocess as defaultRunSubprocess } from "./subprocess";
import {
  formatCommand,
  isSymlink,
  makeDirectory,
  mountArgs,
} from "./system";
import {
  deepMerge,
  logOverride,
  mapping,
  type OverrideListener,
} from "./tree";

/** Fully resolved parameters for mounting one partition. */
export interface MountPlan {
  mountPoint: string;
  device: string;
  /** Staging root the target sits under */
  root: string;
  /** rootMountPoint + mountPoint */
  target: string;
  subvolume: string;
  options: string;
  /** argv passed to mount */
  args: string[];
  /** Shell rendering of the mount invocation, as logged */
  command: string;
}

/** Discriminated result of planAndMount. */
export type MountResult =
  | { ok: true; applied: boolean; plan: MountPlan }
  | {
      ok: false;
      reason: "symlink" | "mkdir-failed" | "mount-failed";
      message: string;
      plan: MountPlan;
    };

export interface PlanAndMountOptions {
  /** Subprocess runner for testing */
  subprocess?: RunSubprocess;
  /** Create the target and run mount; otherwise only log the plan */
  apply?: boolean;
}

/**
 * Mount options for a partition: the entry's own options replace the
 * defaults wholesale, and the replacement is audited. No flag-level union.
 */
export function resolveOptions(
  entry: PartitionEntry,
  config: MountConfig = DEFAULT_MOUNT_CONFIG,
  onOverride: OverrideListener = logOverride,
): string {
  const merged = deepMerge(
    mapping({ flags: config.defaultOptions }),
    mapping({ flags: entry.options }),
    onOverride,
  );

  const flags =
    merged.kind === "mapping" ? merged.entries.get("flags") : undefined;
  if (flags?.kind === "scalar" && typeof flags.value === "string") {
    return flags.value;
  }
  return config.defaultOptions;
}

/**
 * Build the mount plan for one partition. Pure; no filesystem access.
 */
export function buildMountPlan(
  entry: PartitionEntry,
  config: MountConfig,
  options: string,
): MountPlan {
  const device = resolveDevicePath(entry);
  const target = config.rootMountPoint + entry.mountPoint;
  const subvolume = entry.subvolume || config.defaultSubvolume;
  const args = mountArgs(subvolume, options, device, target);

  return {
    mountPoint: entry.mountPoint,
    device,
    root: config.rootMountPoint,
    target,
    subvolume,
    options,
    args,
    command: formatCommand("mount", args),
  };
}

/**
 * Every path from the staging root down to the target, without trailing
 * slashes: "/tmp/root" and "/home/user" give "/tmp/root", "/tmp/root/home"
 * and "/tmp/root/home/user".
 */
export function guardedPaths(plan: MountPlan): string[] {
  const root = plan.root.replace(/\/+$/, "");
  const paths = root === "" ? [] : [root];
  let current = root;
  for (const segment of plan.mountPoint.split("/")) {
    if (segment === "") continue;
    current = `${current}/${segment}`;
    paths.push(current);
  }
  return paths;
}

/**
 * Check the mount target and carry out a plan.
 *
 * If the staging root or any directory between it and the target is a
 * symbolic link, the plan is refused before anything else runs.
 * Otherwise the command is logged as the plan of record; the target
 * directory is created and mount is run only when `apply` is set.
 */
export function planAndMount(
  plan: MountPlan,
  options: PlanAndMountOptions = {},
): MountResult {
  const { subprocess = defaultRunSubprocess, apply = false } = options;

  const link = guardedPaths(plan).find((path) => isSymlink(path, subprocess));
  if (link !== undefined) {
    const message = `SECURITY ALERT: ${link} is a symlink!`;
    console.log(message);
    return { ok: false, reason: "symlink", message, plan };
  }

  console.log(`[PLAN]: ${plan.command}`);

  if (!apply) {
    return { ok: true, applied: false, plan };
  }

  const mkdir = makeDirectory(plan.target, subprocess);
  if (mkdir.exitCode !== 0) {
    return {
      ok: false,
      reason: "mkdir-failed",
      message: `Cannot create ${plan.target}: ${mkdir.stderr.trim()}`,
      plan,
    };
  }

  const mount = subprocess("mount", plan.args);
  if (mount.exitCode !== 0) {
    return {
      ok: false,
      reason: "mount-failed",
      message: `Cannot mount ${plan.device} at ${plan.target}: ${mount.stderr.trim()}`,
      plan,
    };
  }

  return { ok: true, applied: true, plan };
}
