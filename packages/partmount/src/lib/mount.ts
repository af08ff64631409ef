// IMPLEMENTATION_VALIDATION
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  buildMountPlan,
  planAndMount,
  resolveOptions,
  type MountPlan,
} from "./mount-plan";
import {
  decodePartitionEntry,
  mountPointOf,
  readPartitionDocument,
  PartitionFileError,
  type PartitionDocument,
} from "./partitions";
import { preflightCheck, type PreflightReport } from "./preflight";
import { DEFAULT_MOUNT_CONFIG, type MountConfig } from "./settings";
import type { RunSubprocess } from "./subprocess";
import { runSubprocess as defaultRunSubprocess } from "./subprocess";
import { formatTree, type TreeNode } from "./tree";

export interface MountOptions {
  /** Path to the JSON partition list */
  inputPath: string;
  config?: MountConfig;
  /** Subprocess runner for testing */
  subprocess?: RunSubprocess;
  /** Write a JSON summary of the resolved mounts here */
  reportPath?: string;
}

/** Per-partition result of a run. */
export type PartitionOutcome =
  | {
      status: "planned" | "mounted";
      mountPoint: string;
      preflight: PreflightReport;
      plan: MountPlan;
    }
  | { status: "skipped"; mountPoint: string | null; reason: string }
  | {
      status: "failed";
      mountPoint: string | null;
      reason: string;
      plan?: MountPlan;
    };

export interface MountRunResult {
  exitCode: number;
  message: string;
  outcomes: PartitionOutcome[];
}

/** Shape of the file written by writeMountReport. */
export interface MountReport {
  version: 1;
  generatedAt: string;
  rootMountPoint: string;
  applied: boolean;
  mounts: Array<{
    mountPoint: string;
    device: string;
    target: string;
    subvolume: string;
    options: string;
    status: "planned" | "mounted" | "failed";
  }>;
}

export class MountReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MountReportError";
  }
}

const AUDIT_HEADER = "\n--- POST-EXECUTION STRUCTURE AUDIT ---";

/**
 * Validate, plan and (when enabled) mount a single partition element.
 */
export function processPartition(
  node: TreeNode,
  config: MountConfig,
  subprocess: RunSubprocess,
): PartitionOutcome {
  const decoded = decodePartitionEntry(node);
  if (decoded.kind === "skip") {
    return { status: "skipped", mountPoint: decoded.mountPoint, reason: decoded.reason };
  }
  if (decoded.kind === "invalid") {
    return { status: "failed", mountPoint: decoded.mountPoint, reason: decoded.reason };
  }

  const { entry } = decoded;
  const preflight = preflightCheck(entry, { config, subprocess });
  const plan = buildMountPlan(entry, config, resolveOptions(entry, config));
  const result = planAndMount(plan, { subprocess, apply: config.apply });

  if (!result.ok) {
    return {
      status: "failed",
      mountPoint: entry.mountPoint,
      reason: result.message,
      plan,
    };
  }

  return {
    status: result.applied ? "mounted" : "planned",
    mountPoint: entry.mountPoint,
    preflight,
    plan,
  };
}

export function buildMountReport(
  outcomes: PartitionOutcome[],
  config: MountConfig,
): MountReport {
  const mounts: MountReport["mounts"] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "skipped" || !outcome.plan) continue;
    const plan = outcome.plan;
    mounts.push({
      mountPoint: plan.mountPoint,
      device: plan.device,
      target: plan.target,
      subvolume: plan.subvolume,
      options: plan.options,
      status: outcome.status,
    });
  }

  return {
    version: 1,
    generatedAt: new Date().toISOString(),
    rootMountPoint: config.rootMountPoint,
    applied: config.apply,
    mounts,
  };
}

export function writeMountReport(reportPath: string, report: MountReport): void {
  try {
    mkdirSync(dirname(reportPath), { recursive: true });
    writeFileSync(reportPath, JSON.stringify(report, null, 2) + "\n", "utf-8");
  } catch (err) {
    const detail = err instanceof Error ? `: ${err.message}` : "";
    throw new MountReportError(`Cannot write mount report: ${reportPath}${detail}`);
  }
}

function summarize(outcomes: PartitionOutcome[]): string {
  const count = (status: PartitionOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).length;
  return (
    `Processed ${outcomes.length} partition(s): ` +
    `${count("planned")} planned, ${count("mounted")} mounted, ` +
    `${count("skipped")} skipped, ${count("failed")} failed`
  );
}

/**
 * Run the mount workflow:
 * 1. Read and decode the partition list (fatal on failure)
 * 2. Sort it so parents are mounted before children
 * 3. Preflight, plan and mount each partition; one failure does not stop the rest
 * 4. Print the structure audit of the decoded document
 * 5. Write the mount report, if requested
 */
export function runMount(options: MountOptions): MountRunResult {
  const {
    inputPath,
    config = DEFAULT_MOUNT_CONFIG,
    subprocess = defaultRunSubprocess,
    reportPath,
  } = options;

  let document: PartitionDocument;
  try {
    document = readPartitionDocument(inputPath);
  } catch (err) {
    if (err instanceof PartitionFileError) {
      const message = `[FATAL]: ${err.message}`;
      console.log(message);
      return { exitCode: 1, message, outcomes: [] };
    }
    throw err;
  }

  const outcomes: PartitionOutcome[] = [];
  for (const node of document.sorted) {
    let outcome: PartitionOutcome;
    try {
      outcome = processPartition(node, config, subprocess);
    } catch (err) {
      const mountPoint = mountPointOf(node);
      const detail = err instanceof Error ? err.message : String(err);
      outcome = {
        status: "failed",
        mountPoint,
        reason: mountPoint === null ? detail : `${mountPoint}: ${detail}`,
      };
    }
    if (outcome.status === "failed") {
      console.log(`[CRITICAL ERROR]: ${outcome.reason}`);
    }
    outcomes.push(outcome);
  }

  console.log(AUDIT_HEADER);
  for (const line of formatTree(document.tree)) {
    console.log(line);
  }

  if (reportPath) {
    try {
      writeMountReport(reportPath, buildMountReport(outcomes, config));
    } catch (err) {
      if (err instanceof MountReportError) {
        const message = `[FATAL]: ${err.message}`;
        console.log(message);
        return { exitCode: 1, message, outcomes };
      }
      throw err;
    }
  }

  return { exitCode: 0, message: summarize(outcomes), outcomes };
}
