/**
 * Codegen Package - Region Emitters
 *
 * Renders the managed regions and the first-generation skeleton of a view
 * artifact. Every renderer is a pure function of its inputs, so rendering the
 * same descriptors twice yields the same bytes.
 */

import {
  formatPath,
  qualifyTypeName,
  type BindingDescriptor,
  type GenerationSettings,
} from "@viewbind/model";
import { REGION_MARKERS, REGION_ORDER, USER_CODE_MARKERS, type RegionName } from "./markers.js";
import { propertyName } from "./naming.js";

/**
 * Where rendered text goes: the indentation of class members and the line
 * break of the surrounding file.
 */
export interface RegionLayout {
  indent: string;
  eol: string;
}

/* =============================================================================
 * REGIONS
 * ============================================================================= */

/**
 * Render a managed region, markers included, each line terminated by
 * `layout.eol`. An empty string means the region should not exist.
 */
export function renderRegion(
  region: RegionName,
  className: string,
  descriptors: readonly BindingDescriptor[],
  settings: GenerationSettings,
  layout: RegionLayout
): string {
  switch (region) {
    case "fields":
      return wrapRegion(region, renderFields(descriptors, settings, layout.indent), layout);
    case "props":
      if (!settings.naming.generateProperties) return "";
      return wrapRegion(region, renderProperties(descriptors, settings, layout.indent), layout);
    case "assign":
      if (settings.bindingMode === "declarative-reference") return wrapRegion(region, [], layout);
      return wrapRegion(region, renderInitMethod(className, descriptors, settings, layout.indent), layout);
  }
}

function wrapRegion(region: RegionName, body: readonly string[], layout: RegionLayout): string {
  const { start, end } = REGION_MARKERS[region];
  const lines = [`${layout.indent}${start}`, ...body, `${layout.indent}${end}`];
  return lines.map(line => line + layout.eol).join("");
}

function renderFields(descriptors: readonly BindingDescriptor[], settings: GenerationSettings, indent: string): string[] {
  const decorator =
    settings.bindingMode === "declarative-reference"
      ? `@${qualifyTypeName("serialized", settings.output.typeNamespace)} `
      : "";
  return descriptors.map(d => `${indent}${decorator}private ${d.fieldName}!: ${fieldType(d, settings)};`);
}

function renderProperties(
  descriptors: readonly BindingDescriptor[],
  settings: GenerationSettings,
  indent: string
): string[] {
  return descriptors.map(
    d => `${indent}get ${propertyName(d.fieldName, settings)}(): ${fieldType(d, settings)} { return this.${d.fieldName}; }`
  );
}

/**
 * The initializer looks each node up by path, then the capability by type and
 * index, and warns at run time about anything it cannot find.
 */
function renderInitMethod(
  className: string,
  descriptors: readonly BindingDescriptor[],
  settings: GenerationSettings,
  indent: string
): string[] {
  const inner = indent + settings.output.indent;
  const block = inner + settings.output.indent;
  const lines = [`${indent}${settings.output.initMethod}(): void {`];

  for (const d of descriptors) {
    const where = escapeString(formatPath(d.path));
    const pathLiteral = `[${d.path.map(segment => `"${escapeString(segment)}"`).join(", ")}]`;
    const missingPath = `console.warn("[viewbind] ${className}: path not found: ${where}")`;

    lines.push(`${inner}{`);
    lines.push(`${block}const node = this.findNode(${pathLiteral});`);

    if (!d.isCapabilityReference && d.typeName === settings.catalog.nodeType) {
      lines.push(`${block}if (node === undefined) ${missingPath};`);
      lines.push(`${block}else this.${d.fieldName} = node;`);
    } else {
      const type = fieldType(d, settings);
      const missingCapability = `console.warn("[viewbind] ${className}: no ${escapeString(type)} at index ${d.capabilityIndex} on ${where}")`;
      lines.push(`${block}const found = node?.getCapabilities(${type})[${d.capabilityIndex}];`);
      lines.push(`${block}if (node === undefined) ${missingPath};`);
      lines.push(`${block}else if (found === undefined) ${missingCapability};`);
      lines.push(`${block}else this.${d.fieldName} = found;`);
    }

    lines.push(`${inner}}`);
  }

  lines.push(`${indent}}`);
  return lines;
}

/* =============================================================================
 * SKELETON
 * ============================================================================= */

/**
 * Complete text of a newly created artifact.
 */
export function renderSkeleton(
  className: string,
  descriptors: readonly BindingDescriptor[],
  settings: GenerationSettings
): string {
  const { output } = settings;
  const eol = "\n";
  const namespaced = settings.namespace.length > 0;
  const classIndent = namespaced ? output.indent : "";
  const layout: RegionLayout = { indent: classIndent + output.indent, eol };
  const heritage = settings.baseType.length > 0 ? ` extends ${settings.baseType}` : "";

  let text = `// Generated by viewbind from template "${className}". Edit outside the auto-* regions only.${eol}`;
  if (output.typeNamespace.length > 0) {
    text += `import * as ${output.typeNamespace} from "${escapeString(output.importSource)}";${eol}`;
  }
  text += eol;

  if (namespaced) text += `export namespace ${settings.namespace} {${eol}`;
  text += `${classIndent}export class ${className}${heritage} {${eol}`;
  for (const region of REGION_ORDER) {
    text += renderRegion(region, className, descriptors, settings, layout);
  }
  text += eol;
  text += `${layout.indent}${USER_CODE_MARKERS.start}${eol}`;
  text += `${layout.indent}${USER_CODE_MARKERS.end}${eol}`;
  text += `${classIndent}}${eol}`;
  if (namespaced) text += `}${eol}`;

  return text;
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function fieldType(descriptor: BindingDescriptor, settings: GenerationSettings): string {
  return qualifyTypeName(descriptor.typeName, settings.output.typeNamespace);
}

/**
 * Escape a string for use in a double-quoted string literal.
 */
export function escapeString(str: string): string {
  return str
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\0/g, "\\0");
}
