// IMPLEMENTATION_VALIDATION
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  decodePartitionEntry,
  mountDepth,
  mountPointOf,
  parsePartitionDocument,
  readPartitionDocument,
  sortByMountDepth,
  PartitionFileError,
} from "@/lib/partitions";
import { mapping, parseTree, scalar, toPlain, type TreeNode } from "@/lib/tree";

let testDir: string;

beforeEach(() => {
  testDir = join(
    tmpdir(),
    `partmount-test-partitions-${Date.now()}-${Math.random().toString(36).slice(2)}`,
  );
  mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function mountPoints(nodes: TreeNode[]): unknown[] {
  return nodes.map((node) => {
    const plain = toPlain(node);
    return typeof plain === "object" && plain !== null && "mountPoint" in plain
      ? plain.mountPoint
      : undefined;
  });
}

// ── Ordering ──

describe("mountPointOf", () => {
  it("reads a string mountPoint", () => {
    expect(mountPointOf(mapping({ device: "/dev/sda3", mountPoint: "/home" }))).toBe("/home");
  });

  it("is null for non-string values and non-objects", () => {
    expect(mountPointOf(mapping({ mountPoint: 3 }))).toBeNull();
    expect(mountPointOf(scalar("/home"))).toBeNull();
  });
});

describe("mountDepth", () => {
  it("counts path segments in the mount point", () => {
    expect(mountDepth(mapping({ mountPoint: "/" }))).toBe(0);
    expect(mountDepth(mapping({ mountPoint: "/home" }))).toBe(1);
    expect(mountDepth(mapping({ mountPoint: "/var/log" }))).toBe(2);
    expect(mountDepth(mapping({ mountPoint: "/var/log/" }))).toBe(2);
  });

  it("treats a missing mount point as depth 0", () => {
    expect(mountDepth(mapping({ device: "/dev/sda1" }))).toBe(0);
    expect(mountDepth(scalar("junk"))).toBe(0);
  });
});

describe("sortByMountDepth", () => {
  it("puts shallower mount points first and keeps ties in input order", () => {
    const nodes = [
      mapping({ mountPoint: "/home/user" }),
      mapping({ mountPoint: "/" }),
      mapping({ mountPoint: "/var/log" }),
    ];
    expect(mountPoints(sortByMountDepth(nodes))).toEqual(["/", "/home/user", "/var/log"]);
  });

  it("mounts parents before children", () => {
    const nodes = [
      mapping({ mountPoint: "/boot/efi" }),
      mapping({ mountPoint: "/home" }),
      mapping({ mountPoint: "/boot" }),
      mapping({ mountPoint: "/" }),
    ];
    expect(mountPoints(sortByMountDepth(nodes))).toEqual(["/", "/home", "/boot", "/boot/efi"]);
  });

  it("does not reorder its input", () => {
    const nodes = [mapping({ mountPoint: "/home" }), mapping({ mountPoint: "/" })];
    sortByMountDepth(nodes);
    expect(mountPoints(nodes)).toEqual(["/home", "/"]);
  });
});

// ── Entry decoding ──

describe("decodePartitionEntry", () => {
  it("decodes all declared fields", () => {
    const node = parseTree(
      '{"device": "/dev/sda3", "mountPoint": "/home", "uuid": "ABCD-1234", "subvolume": "@home", "options": "compress=zstd"}',
    );
    expect(decodePartitionEntry(node)).toEqual({
      kind: "entry",
      entry: {
        device: "/dev/sda3",
        mountPoint: "/home",
        uuid: "ABCD-1234",
        subvolume: "@home",
        options: "compress=zstd",
      },
    });
  });

  it("leaves unset optional fields out", () => {
    const decoded = decodePartitionEntry(parseTree('{"device": "/dev/sda2", "mountPoint": "/", "uuid": null}'));
    expect(decoded).toEqual({
      kind: "entry",
      entry: { device: "/dev/sda2", mountPoint: "/" },
    });
  });

  it("skips entries without a device", () => {
    expect(decodePartitionEntry(mapping({ mountPoint: "/data" }))).toEqual({
      kind: "skip",
      mountPoint: "/data",
      reason: "missing device",
    });
  });

  it("skips entries without a mount point", () => {
    expect(decodePartitionEntry(mapping({ device: "/dev/sda4" }))).toEqual({
      kind: "skip",
      mountPoint: null,
      reason: "missing mountPoint",
    });
  });

  it("skips entries with an empty mount point", () => {
    const decoded = decodePartitionEntry(mapping({ device: "/dev/sda4", mountPoint: "" }));
    expect(decoded.kind).toBe("skip");
  });

  it("rejects entries that are not objects", () => {
    expect(decodePartitionEntry(scalar("/dev/sda1"))).toEqual({
      kind: "invalid",
      mountPoint: null,
      reason: "Partition entry must be an object, got scalar",
    });
  });

  it("rejects fields of the wrong type", () => {
    expect(decodePartitionEntry(parseTree('{"device": "/dev/sda2", "mountPoint": "/", "uuid": 42}'))).toEqual({
      kind: "invalid",
      mountPoint: "/",
      reason: "Field 'uuid' must be a string",
    });
  });
});

// ── Document reading ──

describe("parsePartitionDocument", () => {
  it("keeps the decoded tree and a sorted view", () => {
    const doc = parsePartitionDocument(
      '[{"device": "/dev/sda3", "mountPoint": "/home"}, {"device": "/dev/sda2", "mountPoint": "/"}]',
    );
    expect(mountPoints(doc.tree.items)).toEqual(["/home", "/"]);
    expect(mountPoints(doc.sorted)).toEqual(["/", "/home"]);
  });

  it("rejects malformed JSON", () => {
    expect(() => parsePartitionDocument("[{")).toThrow(PartitionFileError);
    expect(() => parsePartitionDocument("[{")).toThrow(/^JSON error: /);
  });

  it("rejects a document that is not an array", () => {
    expect(() => parsePartitionDocument('{"device": "/dev/sda2"}')).toThrow(
      "JSON error: expected an array of partitions, got mapping",
    );
  });
});

describe("readPartitionDocument", () => {
  it("reads a partition file", () => {
    const path = join(testDir, "partitions.json");
    writeFileSync(path, '[{"device": "/dev/sda2", "mountPoint": "/"}]', "utf-8");
    expect(readPartitionDocument(path).sorted).toHaveLength(1);
  });

  it("throws PartitionFileError for a missing file", () => {
    const path = join(testDir, "missing.json");
    expect(() => readPartitionDocument(path)).toThrow(PartitionFileError);
    expect(() => readPartitionDocument(path)).toThrow(`Cannot read partition file: ${path}`);
  });
});
