// IMPLEMENTATION_VALIDATION
import { readFileSync } from "node:fs";
import {
  parseTree,
  TreeParseError,
  type SequenceNode,
  type TreeNode,
} from "./tree";

/** One partition to mount, as declared in the input document. */
export interface PartitionEntry {
  /** Block device or mapper path */
  device: string;
  /** Absolute path inside the installed root */
  mountPoint: string;
  /** Expected filesystem UUID */
  uuid?: string;
  /** Subvolume to mount instead of the filesystem root */
  subvolume?: string;
  /** Comma-separated mount options replacing the defaults */
  options?: string;
  /** Name of an already-opened LUKS mapping; mounts /dev/mapper/<name> */
  luksMapperName?: string;
}

/** Discriminated result for decoding one element of the partition list. */
export type DecodedEntry =
  | { kind: "entry"; entry: PartitionEntry }
  | { kind: "skip"; mountPoint: string | null; reason: string }
  | { kind: "invalid"; mountPoint: string | null; reason: string };

export interface PartitionDocument {
  /** The document as decoded, before sorting */
  tree: SequenceNode;
  /** Partition elements in mount order */
  sorted: TreeNode[];
}

export class PartitionFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PartitionFileError";
  }
}

const STRING_FIELDS = [
  "device",
  "mountPoint",
  "uuid",
  "subvolume",
  "options",
  "luksMapperName",
] as const;

type StringField = (typeof STRING_FIELDS)[number];

const REQUIRED_FIELDS = ["device", "mountPoint"] as const;

function stringField(node: TreeNode, field: string): string | null {
  if (node.kind !== "mapping") return null;
  const value = node.entries.get(field);
  if (!value || value.kind !== "scalar" || typeof value.value !== "string") {
    return null;
  }
  return value.value;
}

/** The element's mountPoint, when it has a string one. */
export function mountPointOf(node: TreeNode): string | null {
  return stringField(node, "mountPoint");
}

/**
 * Depth of the element's mountPoint: the number of non-empty path
 * segments, so "/" is 0, "/home" is 1 and "/var/log" is 2. Elements
 * without a string mountPoint count as depth 0.
 */
export function mountDepth(node: TreeNode): number {
  const mountPoint = mountPointOf(node) ?? "";
  return mountPoint.split("/").filter((segment) => segment !== "").length;
}

/**
 * Order partition elements so shallower mount points come first. The sort is
 * stable, so siblings keep their input order.
 */
export function sortByMountDepth(nodes: TreeNode[]): TreeNode[] {
  return nodes
    .map((node, index) => ({ node, index, depth: mountDepth(node) }))
    .sort((a, b) => a.depth - b.depth || a.index - b.index)
    .map(({ node }) => node);
}

/**
 * Decode one element of the partition list.
 *
 * Elements that are not objects, or whose fields are not strings, are
 * invalid. Elements without a device or mountPoint are skipped.
 */
export function decodePartitionEntry(node: TreeNode): DecodedEntry {
  const mountPoint = stringField(node, "mountPoint");

  if (node.kind !== "mapping") {
    return {
      kind: "invalid",
      mountPoint: null,
      reason: `Partition entry must be an object, got ${node.kind}`,
    };
  }

  const missing = REQUIRED_FIELDS.find((field) => {
    const value = node.entries.get(field);
    return (
      !value ||
      (value.kind === "scalar" && (value.value === null || value.value === ""))
    );
  });
  if (missing) {
    return { kind: "skip", mountPoint, reason: `missing ${missing}` };
  }

  const fields: Partial<Record<StringField, string>> = {};
  for (const field of STRING_FIELDS) {
    const value = node.entries.get(field);
    if (!value || (value.kind === "scalar" && value.value === null)) {
      continue;
    }
    if (value.kind !== "scalar" || typeof value.value !== "string") {
      return {
        kind: "invalid",
        mountPoint,
        reason: `Field '${field}' must be a string`,
      };
    }
    fields[field] = value.value;
  }

  const { device, uuid, subvolume, options, luksMapperName } = fields;
  if (device === undefined || fields.mountPoint === undefined) {
    return { kind: "skip", mountPoint, reason: "missing device or mountPoint" };
  }

  const entry: PartitionEntry = { device, mountPoint: fields.mountPoint };
  if (uuid !== undefined) entry.uuid = uuid;
  if (subvolume !== undefined) entry.subvolume = subvolume;
  if (options !== undefined) entry.options = options;
  if (luksMapperName !== undefined) entry.luksMapperName = luksMapperName;

  return { kind: "entry", entry };
}

/**
 * Decode the partition list from JSON text.
 * Throws PartitionFileError if the text is not JSON or not an array.
 */
export function parsePartitionDocument(text: string): PartitionDocument {
  let tree: TreeNode;
  try {
    tree = parseTree(text);
  } catch (err) {
    if (err instanceof TreeParseError) {
      throw new PartitionFileError(`JSON error: ${err.message}`);
    }
    throw err;
  }

  if (tree.kind !== "sequence") {
    throw new PartitionFileError(
      `JSON error: expected an array of partitions, got ${tree.kind}`,
    );
  }

  return { tree, sorted: sortByMountDepth(tree.items) };
}

/**
 * Read and decode the partition list file.
 * Throws PartitionFileError if the file cannot be read or decoded.
 */
export function readPartitionDocument(filePath: string): PartitionDocument {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new PartitionFileError(`Cannot read partition file: ${filePath}`);
  }
  return parsePartitionDocument(content);
}
