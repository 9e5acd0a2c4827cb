/**
 * Codegen Package - Binding Discovery
 *
 * Walks a template and produces the ordered, deduplicated descriptor list the
 * naming pipeline and emitters work from.
 */

import {
  autoIncludeTypes,
  capabilitiesOf,
  descriptorKey,
  hasCapability,
  isKnownCapabilityType,
  shortTypeName,
  walk,
  type BindingDescriptor,
  type BindingMarker,
  type GenerationSettings,
  type ObjectNode,
  type TargetKind,
} from "@viewbind/model";
import { sanitizeIdentifier } from "./identifiers.js";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Discover the bindings of a template.
 *
 * The auto-include pass runs first, then the marker pass. Duplicates by
 * (path, type, index) keep their first occurrence; the result is sorted by
 * type name, then field name.
 */
export function discover(root: ObjectNode, settings: GenerationSettings): BindingDescriptor[] {
  const found: BindingDescriptor[] = [];
  collectAutoIncluded(root, settings, found);
  collectMarked(root, settings, found);
  return sortDescriptors(dedupeDescriptors(found));
}

/**
 * Marker a fresh annotation on this node starts with: the sanitized node name
 * and the target the auto rule would pick.
 */
export function recommendMarker(node: ObjectNode, settings: GenerationSettings): BindingMarker {
  const fieldName = sanitizeIdentifier(node.name);
  const typeName = firstPresentType(node, settings);
  if (typeName !== undefined) {
    return { fieldName, targetKind: "capability", capabilityTypeName: typeName, capabilityIndex: 0 };
  }
  const targetKind: TargetKind = hasCapability(node, settings.catalog.containerType) ? "container" : "node";
  return { fieldName, targetKind };
}

/**
 * Keep the first descriptor for each (path, type, index).
 */
export function dedupeDescriptors(descriptors: readonly BindingDescriptor[]): BindingDescriptor[] {
  const seen = new Set<string>();
  const result: BindingDescriptor[] = [];
  for (const descriptor of descriptors) {
    const key = descriptorKey(descriptor);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(descriptor);
  }
  return result;
}

/**
 * Stable ordinal sort by type name, then field name. Path and index break the
 * remaining ties so the order never depends on traversal order.
 */
export function sortDescriptors(descriptors: BindingDescriptor[]): BindingDescriptor[] {
  return descriptors.sort(
    (a, b) =>
      compareOrdinal(a.typeName, b.typeName) ||
      compareOrdinal(a.fieldName, b.fieldName) ||
      compareOrdinal(a.path.join("/"), b.path.join("/")) ||
      a.capabilityIndex - b.capabilityIndex
  );
}

/* =============================================================================
 * PASSES
 * ============================================================================= */

function collectAutoIncluded(root: ObjectNode, settings: GenerationSettings, out: BindingDescriptor[]): void {
  for (const typeName of autoIncludeTypes(settings)) {
    walkIncluded(root, (node, path) => {
      capabilitiesOf(node, typeName).forEach((_capability, index) => {
        out.push({
          typeName,
          fieldName: provisionalFieldName(node.name, typeName),
          path: [...path],
          isCapabilityReference: true,
          capabilityIndex: index,
        });
      });
    });
  }
}

function collectMarked(root: ObjectNode, settings: GenerationSettings, out: BindingDescriptor[]): void {
  walkIncluded(root, (node, path) => {
    const marker = node.marker;
    if (!marker) return;
    const override = marker.fieldName?.trim() ?? "";
    const fieldName = sanitizeIdentifier(override.length > 0 ? override : node.name);
    out.push({ ...resolveMarkerTarget(node, marker, settings), fieldName, path: [...path] });
  });
}

/**
 * Pre-order walk that does not descend below a node whose marker sets
 * `ignoreSubtree`. The ignoring node itself is still visited.
 */
function walkIncluded(root: ObjectNode, visit: (node: ObjectNode, path: string[]) => void): void {
  walk(root, (node, { path }) => {
    visit(node, path);
    return node.marker?.ignoreSubtree !== true;
  });
}

/* =============================================================================
 * TARGET RESOLUTION
 * ============================================================================= */

type Target = Pick<BindingDescriptor, "typeName" | "isCapabilityReference" | "capabilityIndex">;

function resolveMarkerTarget(node: ObjectNode, marker: BindingMarker, settings: GenerationSettings): Target {
  switch (marker.targetKind ?? "auto") {
    case "capability": {
      const typeName = marker.capabilityTypeName?.trim() ?? "";
      const known = typeName.length > 0 && (isKnownCapabilityType(typeName, settings) || hasCapability(node, typeName));
      if (!known) return autoTarget(node, settings);

      const count = capabilitiesOf(node, typeName).length;
      if (count === 0) return containerOrNodeTarget(node, settings);
      return { typeName, isCapabilityReference: true, capabilityIndex: clampIndex(marker.capabilityIndex, count) };
    }
    case "container":
      return containerTarget(settings);
    case "node":
      return nodeTarget(settings);
    case "auto":
      return autoTarget(node, settings);
  }
}

function autoTarget(node: ObjectNode, settings: GenerationSettings): Target {
  const typeName = firstPresentType(node, settings);
  if (typeName !== undefined) {
    return { typeName, isCapabilityReference: true, capabilityIndex: 0 };
  }
  return containerOrNodeTarget(node, settings);
}

function containerOrNodeTarget(node: ObjectNode, settings: GenerationSettings): Target {
  return hasCapability(node, settings.catalog.containerType) ? containerTarget(settings) : nodeTarget(settings);
}

function containerTarget(settings: GenerationSettings): Target {
  return { typeName: settings.catalog.containerType, isCapabilityReference: false, capabilityIndex: 0 };
}

function nodeTarget(settings: GenerationSettings): Target {
  return { typeName: settings.catalog.nodeType, isCapabilityReference: false, capabilityIndex: 0 };
}

/**
 * First interactive type on the node, else the first display type.
 */
function firstPresentType(node: ObjectNode, settings: GenerationSettings): string | undefined {
  const { interactive, display } = settings.catalog;
  return interactive.find(t => hasCapability(node, t)) ?? display.find(t => hasCapability(node, t));
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

/**
 * Field name from the node name; a name equal to the type's short name gets a
 * trailing underscore.
 */
function provisionalFieldName(nodeName: string, typeName: string): string {
  const name = sanitizeIdentifier(nodeName);
  return name === shortTypeName(typeName) ? `${name}_` : name;
}

function clampIndex(index: number | undefined, count: number): number {
  const value = Number.isFinite(index) ? Math.trunc(index ?? 0) : 0;
  return Math.min(Math.max(value, 0), count - 1);
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
