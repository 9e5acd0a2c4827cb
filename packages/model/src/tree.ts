/**
 * Model Package - Tree Helpers
 *
 * Path lookup and traversal over template trees. A path lists child names from
 * the root; lookups take the first child with a matching name at each step.
 */

import type { BindingMarker, Capability, ObjectNode } from "./types.js";

export interface VisitContext {
  /** Names from the root to the visited node */
  path: string[];

  /** Ancestors from the root down to the parent; empty for the root */
  ancestors: readonly ObjectNode[];
}

/**
 * Visit every node in pre-order. Returning `false` from the callback skips
 * the node's descendants.
 */
export function walk(root: ObjectNode, visit: (node: ObjectNode, context: VisitContext) => boolean | void): void {
  const step = (node: ObjectNode, path: string[], ancestors: ObjectNode[]): void => {
    if (visit(node, { path, ancestors }) === false) return;
    const nextAncestors = [...ancestors, node];
    for (const child of node.children) {
      step(child, [...path, child.name], nextAncestors);
    }
  };
  step(root, [], []);
}

/**
 * Resolve a node by path; the empty path is the root.
 */
export function findByPath(root: ObjectNode, path: readonly string[]): ObjectNode | undefined {
  let current: ObjectNode | undefined = root;
  for (const segment of path) {
    current = current.children.find(child => child.name === segment);
    if (!current) return undefined;
  }
  return current;
}

/**
 * Capabilities of one type on a node, in declaration order.
 */
export function capabilitiesOf(node: ObjectNode, typeName: string): Capability[] {
  return node.capabilities.filter(c => c.typeName === typeName);
}

export function hasCapability(node: ObjectNode, typeName: string): boolean {
  return node.capabilities.some(c => c.typeName === typeName);
}

/**
 * Deep copy of a template, detached from the original.
 */
export function cloneTree(root: ObjectNode): ObjectNode {
  return structuredClone(root);
}

/**
 * Display form of a path for diagnostics.
 */
export function formatPath(path: readonly string[]): string {
  return path.length === 0 ? "<root>" : path.join("/");
}

/**
 * Build a node from capability type names. Intended for hosts that assemble
 * templates in code.
 */
export function createNode(
  name: string,
  capabilityTypes: readonly string[] = [],
  children: ObjectNode[] = [],
  marker?: BindingMarker
): ObjectNode {
  const node: ObjectNode = {
    name,
    children,
    capabilities: capabilityTypes.map(typeName => ({ typeName })),
  };
  if (marker) node.marker = marker;
  return node;
}
