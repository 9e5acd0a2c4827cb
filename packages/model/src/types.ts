/**
 * Model Package - Template and Binding Types
 *
 * Shapes shared by discovery, merging and attach. Templates are owned by the
 * host; everything here is plain data so templates can be cloned and persisted.
 */

/* =============================================================================
 * TEMPLATE TREE
 * ============================================================================= */

/**
 * A node in a rooted template tree.
 */
export interface ObjectNode {
  name: string;
  children: ObjectNode[];

  /** Typed attachments, in declaration order */
  capabilities: Capability[];

  /** Optional generation annotation */
  marker?: BindingMarker;
}

/**
 * A typed attachment on a node (a button, a label, a layout rect, an attached
 * view behaviour, ...).
 */
export interface Capability {
  typeName: string;

  /**
   * Persisted reference slots. Only behaviour instances carry these; the keys
   * are field names of the compiled behaviour type.
   */
  fields?: Record<string, ObjectReference | null>;
}

/**
 * A persisted reference written into a behaviour slot.
 */
export type ObjectReference =
  | { kind: "node"; path: readonly string[] }
  | { kind: "capability"; path: readonly string[]; typeName: string; index: number };

/* =============================================================================
 * BINDING MARKER
 * ============================================================================= */

/**
 * What a marked node binds to.
 * - auto: interactive control, then display type, then container, then node
 * - capability: a named capability type at an index
 * - container: the node's container capability
 * - node: the node reference itself
 */
export type TargetKind = "auto" | "capability" | "container" | "node";

export interface BindingMarker {
  /** Field name override; blank means "use the node name" */
  fieldName?: string;

  /** Exclude every descendant of this node from discovery */
  ignoreSubtree?: boolean;

  targetKind?: TargetKind;

  /** Used when targetKind is "capability" */
  capabilityTypeName?: string;

  /** Disambiguates several capabilities of the same type on one node */
  capabilityIndex?: number;
}

/* =============================================================================
 * BINDING DESCRIPTOR
 * ============================================================================= */

/**
 * One generated field: what it holds and where to find it.
 */
export interface BindingDescriptor {
  typeName: string;
  fieldName: string;

  /** Node names from the root; empty for the root itself */
  path: string[];

  /** False for container and node references */
  isCapabilityReference: boolean;

  capabilityIndex: number;
}

/**
 * Key used to deduplicate descriptors.
 */
export function descriptorKey(descriptor: BindingDescriptor): string {
  return `${descriptor.path.join("\u0000")}|${descriptor.typeName}|${descriptor.capabilityIndex}`;
}
