// IMPLEMENTATION_VALIDATION
import * as jsonc from "jsonc-parser";

// ── Types ──

export type ScalarValue = string | number | boolean | null;

export interface ScalarNode {
  kind: "scalar";
  value: ScalarValue;
}

/** Ordered container, decoded from a JSON array. */
export interface SequenceNode {
  kind: "sequence";
  items: TreeNode[];
}

/** Keyed container, decoded from a JSON object. Key order is not significant. */
export interface MappingNode {
  kind: "mapping";
  entries: Map<string, TreeNode>;
}

export type ContainerNode = SequenceNode | MappingNode;

export type TreeNode = ScalarNode | ContainerNode;

/** Reported by deepMerge whenever an overlay value replaces an existing base value. */
export interface OverrideEvent {
  key: string;
  previous: TreeNode;
  next: TreeNode;
}

export type OverrideListener = (event: OverrideEvent) => void;

/**
 * Called once per node by walk(). Containers arrive with `value` undefined,
 * before their children.
 */
export type TreeVisitor = (
  key: string | number | null,
  value: ScalarValue | undefined,
  depth: number,
  isContainer: boolean,
  inSequence: boolean,
) => void;

export class TreeParseError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "TreeParseError";
  }
}

// ── Constructors ──

export function scalar(value: ScalarValue): ScalarNode {
  return { kind: "scalar", value };
}

export function sequence(items: TreeNode[]): SequenceNode {
  return { kind: "sequence", items };
}

/**
 * Build a mapping from a plain record. Undefined values are left out, so an
 * optional field that is not set does not become a key.
 */
export function mapping(
  record: Record<string, TreeNode | ScalarValue | undefined>,
): MappingNode {
  const entries = new Map<string, TreeNode>();
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue;
    entries.set(key, isTreeNode(value) ? value : scalar(value));
  }
  return { kind: "mapping", entries };
}

function isTreeNode(value: TreeNode | ScalarValue): value is TreeNode {
  return typeof value === "object" && value !== null;
}

export function isContainer(node: TreeNode): node is ContainerNode {
  return node.kind !== "scalar";
}

// ── Decoding ──

function fromJsoncNode(node: jsonc.Node): TreeNode {
  switch (node.type) {
    case "array":
      return sequence((node.children ?? []).map(fromJsoncNode));
    case "object": {
      const entries = new Map<string, TreeNode>();
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (!keyNode || !valueNode || typeof keyNode.value !== "string") {
          continue;
        }
        entries.set(keyNode.value, fromJsoncNode(valueNode));
      }
      return { kind: "mapping", entries };
    }
    case "string":
    case "number":
    case "boolean": {
      const value: unknown = node.value;
      if (
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean"
      ) {
        return scalar(value);
      }
      return scalar(null);
    }
    default:
      return scalar(null);
  }
}

/**
 * Decode JSON text into a tree. Arrays become sequences and objects become
 * mappings, straight from the parser's token types.
 */
export function parseTree(text: string): TreeNode {
  const errors: jsonc.ParseError[] = [];
  const root = jsonc.parseTree(text, errors, { allowTrailingComma: false });

  if (errors.length > 0) {
    const first = errors[0];
    throw new TreeParseError(
      `${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`,
      first.offset,
    );
  }
  if (!root) {
    throw new TreeParseError("Empty document", 0);
  }
  return fromJsoncNode(root);
}

/** Convert a tree back into plain JSON-compatible values. */
export function toPlain(node: TreeNode): unknown {
  switch (node.kind) {
    case "scalar":
      return node.value;
    case "sequence":
      return node.items.map(toPlain);
    case "mapping": {
      const out: Record<string, unknown> = {};
      for (const [key, value] of node.entries) {
        out[key] = toPlain(value);
      }
      return out;
    }
  }
}

// ── Structural operations ──

export function deepCopy<T extends TreeNode>(node: T): T;
export function deepCopy(node: TreeNode): TreeNode {
  switch (node.kind) {
    case "scalar":
      return node;
    case "sequence":
      return sequence(node.items.map((item) => deepCopy(item)));
    case "mapping": {
      const entries = new Map<string, TreeNode>();
      for (const [key, value] of node.entries) {
        entries.set(key, deepCopy(value));
      }
      return { kind: "mapping", entries };
    }
  }
}

export function deepEqual(a: TreeNode, b: TreeNode): boolean {
  if (a.kind === "scalar" && b.kind === "scalar") {
    return a.value === b.value;
  }
  if (a.kind === "sequence" && b.kind === "sequence") {
    if (a.items.length !== b.items.length) return false;
    return a.items.every((item, i) => deepEqual(item, b.items[i]));
  }
  if (a.kind === "mapping" && b.kind === "mapping") {
    for (const [key, value] of a.entries) {
      const other = b.entries.get(key);
      if (!other || !deepEqual(value, other)) return false;
    }
    for (const key of b.entries.keys()) {
      if (!a.entries.has(key)) return false;
    }
    return true;
  }
  return false;
}

/** Short rendering of a node for audit lines. */
export function describeNode(node: TreeNode): string {
  switch (node.kind) {
    case "scalar":
      return String(node.value);
    case "sequence":
      return "[sequence]";
    case "mapping":
      return "[mapping]";
  }
}

export const logOverride: OverrideListener = ({ key, previous, next }) => {
  console.log(
    `[AUDIT]: Key '${key}' override: ${describeNode(previous)} -> ${describeNode(next)}`,
  );
};

function isEmptyContainer(node: ContainerNode): boolean {
  return node.kind === "sequence" ? node.items.length === 0 : node.entries.size === 0;
}

function mergeValue(
  key: string,
  existing: TreeNode | undefined,
  incoming: TreeNode,
  onOverride: OverrideListener,
): TreeNode {
  if (
    existing &&
    isContainer(existing) &&
    isContainer(incoming) &&
    existing.kind === incoming.kind
  ) {
    return deepMerge(existing, incoming, onOverride);
  }
  if (existing) {
    onOverride({ key, previous: existing, next: incoming });
  }
  return deepCopy(incoming);
}

/**
 * Merge `overlay` on top of `base` into a new tree. Containers of the same
 * kind merge recursively; anything else in the overlay replaces the base
 * value, and every replacement of an existing value is reported to
 * `onOverride`. Neither input is modified.
 */
export function deepMerge(
  base: ContainerNode,
  overlay?: ContainerNode,
  onOverride: OverrideListener = logOverride,
): ContainerNode {
  if (!overlay || isEmptyContainer(overlay)) {
    return deepCopy(base);
  }

  if (base.kind === "mapping" && overlay.kind === "mapping") {
    const result = deepCopy(base);
    for (const [key, value] of overlay.entries) {
      result.entries.set(
        key,
        mergeValue(key, result.entries.get(key), value, onOverride),
      );
    }
    return result;
  }

  if (base.kind === "sequence" && overlay.kind === "sequence") {
    const result = deepCopy(base);
    overlay.items.forEach((value, i) => {
      result.items[i] = mergeValue(String(i), result.items[i], value, onOverride);
    });
    return result;
  }

  return deepCopy(overlay);
}

/**
 * Depth-first traversal over every node below the root. Sequence children are
 * visited in index order; mapping children in insertion order.
 */
export function walk(tree: TreeNode, visitor: TreeVisitor, depth = 0): void {
  if (tree.kind === "scalar") {
    visitor(null, tree.value, depth, false, false);
    return;
  }

  const children: Array<[string | number, TreeNode]> =
    tree.kind === "sequence"
      ? tree.items.map((item, i): [number, TreeNode] => [i, item])
      : Array.from(tree.entries);
  const inSequence = tree.kind === "sequence";

  for (const [key, child] of children) {
    if (isContainer(child)) {
      visitor(key, undefined, depth, true, inSequence);
      walk(child, visitor, depth + 1);
    } else {
      visitor(key, child.value, depth, false, inSequence);
    }
  }
}

/** Indented, line-per-node rendering of a tree for terminal review. */
export function formatTree(tree: TreeNode): string[] {
  const lines: string[] = [];
  walk(tree, (key, value, depth, container, inSequence) => {
    const indent = "  ".repeat(depth);
    if (key === null) {
      lines.push(`${indent}${String(value)}`);
      return;
    }
    const label = inSequence ? `[${key}]:` : `${key}:`;
    lines.push(container ? `${indent}${label}` : `${indent}${label} ${String(value)}`);
  });
  return lines;
}
