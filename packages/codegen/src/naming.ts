/**
 * Codegen Package - Naming Pipeline
 *
 * Prefixing, casing and uniqueness, applied in that order. Names are changed
 * in place; descriptor order is preserved.
 */

import { DEFAULT_PREFIXES, type BindingDescriptor, type GenerationSettings, type TypePrefix } from "@viewbind/model";
import { toCamelCase, toPascalCase } from "./identifiers.js";

/**
 * Run the enabled naming stages over a descriptor list.
 */
export function rename(descriptors: BindingDescriptor[], settings: GenerationSettings): BindingDescriptor[] {
  const { naming } = settings;

  if (naming.useTypePrefix) {
    for (const descriptor of descriptors) {
      descriptor.fieldName = applyTypePrefix(descriptor.fieldName, prefixFor(descriptor.typeName, naming.prefixes));
    }
  }

  if (naming.underscoreCamelCase) {
    for (const descriptor of descriptors) {
      descriptor.fieldName = toPrivateCamelCase(descriptor.fieldName);
    }
  }

  ensureUniqueFieldNames(descriptors);
  return descriptors;
}

/**
 * Prefix configured for a type; empty when the table has no entry.
 */
export function prefixFor(typeName: string, prefixes: readonly TypePrefix[]): string {
  return prefixes.find(p => p.typeName === typeName)?.prefix ?? "";
}

/**
 * Prepend `prefix_` unless the name already starts with the prefix
 * (case-insensitive, with or without the underscore).
 */
export function applyTypePrefix(name: string, prefix: string): string {
  if (prefix.length === 0) return name;
  const lower = name.toLowerCase();
  const lowerPrefix = prefix.toLowerCase();
  if (lower.startsWith(`${lowerPrefix}_`) || lower.startsWith(lowerPrefix)) return name;
  return `${prefix}_${name}`;
}

/**
 * `btn_OkButton` → `_btnOkButton`.
 */
export function toPrivateCamelCase(name: string): string {
  const camel = toCamelCase(name);
  return camel.startsWith("_") ? camel : `_${camel}`;
}

/**
 * Append `_1`, `_2`, ... to names already taken earlier in the list.
 */
export function ensureUniqueFieldNames(descriptors: BindingDescriptor[]): void {
  const used = new Set<string>();
  for (const descriptor of descriptors) {
    const base = descriptor.fieldName;
    let name = base;
    let suffix = 1;
    while (used.has(name)) {
      name = `${base}_${suffix++}`;
    }
    used.add(name);
    descriptor.fieldName = name;
  }
}

/**
 * Read-only property name for a field: leading underscores removed, the type
 * prefix optionally stripped, PascalCased. A strip that would leave nothing or
 * a leading digit is not applied. A name that still starts with a digit gets a
 * leading underscore, and a trailing one when that equals the field name.
 * Other collisions are not resolved.
 */
export function propertyName(fieldName: string, settings: GenerationSettings): string {
  let base = fieldName.replace(/^_+/, "");
  if (settings.naming.stripPrefixInPropertyNames) {
    const stripped = stripKnownPrefix(base, settings.naming.prefixes);
    if (stripped.length > 0 && !LEADING_DIGIT.test(stripped)) base = stripped;
  }

  const name = toPascalCase(base);
  if (!LEADING_DIGIT.test(name)) return name;
  const guarded = `_${name}`;
  return guarded === fieldName ? `${guarded}_` : guarded;
}

const LEADING_DIGIT = /^\p{N}/u;

/**
 * Remove the longest configured prefix the name starts with. Falls back to the
 * default prefixes when none are configured.
 */
export function stripKnownPrefix(name: string, prefixes: readonly TypePrefix[]): string {
  const configured = collectPrefixes(prefixes);
  const candidates = configured.length > 0 ? configured : collectPrefixes(DEFAULT_PREFIXES);
  const lower = name.toLowerCase();

  for (const prefix of candidates) {
    if (lower.startsWith(`${prefix}_`)) return name.slice(prefix.length + 1);
    if (lower.startsWith(prefix)) return name.slice(prefix.length);
  }
  return name;
}

/**
 * Distinct lower-cased prefixes, longest first.
 */
function collectPrefixes(prefixes: readonly TypePrefix[]): string[] {
  const distinct = new Set<string>();
  for (const item of prefixes) {
    const prefix = item.prefix.trim().toLowerCase();
    if (prefix.length > 0) distinct.add(prefix);
  }
  return [...distinct].sort((a, b) => b.length - a.length);
}
