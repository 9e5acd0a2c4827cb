/**
 * Codegen Package - Identifiers
 *
 * Turning node names into field and class identifiers.
 */

import ts from "typescript";
import type { ClassRules } from "@viewbind/model";

const CLASS_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Replace every character that is not a letter or digit with `_`, and guard a
 * leading digit. Blank input becomes `field`.
 */
export function sanitizeIdentifier(raw: string): string {
  if (raw.trim().length === 0) return "field";
  const name = Array.from(raw, ch => (/[\p{L}\p{N}]/u.test(ch) ? ch : "_")).join("");
  return /^\p{N}/u.test(name) ? `_${name}` : name;
}

/**
 * `ok_button`, `ok button` → `OkButton`. Input without any part is returned
 * as it is.
 */
export function toPascalCase(name: string): string {
  const parts = name.split(/[_ ]+/).filter(p => p.length > 0);
  const pascal = parts.map(p => p.charAt(0).toUpperCase() + p.slice(1)).join("");
  return pascal.length > 0 ? pascal : name;
}

export function toCamelCase(name: string): string {
  if (name.length === 0) return name;
  const pascal = toPascalCase(name);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

/**
 * Whether the name scans as a single reserved word (`class`, `enum`,
 * `implements`, ...).
 */
export function isReservedWord(name: string): boolean {
  const scanner = ts.createScanner(ts.ScriptTarget.Latest, /* skipTrivia */ true, ts.LanguageVariant.Standard, name);
  const token = scanner.scan();
  if (scanner.scan() !== ts.SyntaxKind.EndOfFileToken) return false;
  return (
    (token >= ts.SyntaxKind.FirstReservedWord && token <= ts.SyntaxKind.LastReservedWord) ||
    (token >= ts.SyntaxKind.FirstFutureReservedWord && token <= ts.SyntaxKind.LastFutureReservedWord)
  );
}

/**
 * Check a root name against the class rules.
 * Returns a description of the first problem, or undefined when valid.
 */
export function validateClassName(name: string, rules: ClassRules): string | undefined {
  if (name.trim().length === 0) return "class name is empty";
  if (!CLASS_NAME_PATTERN.test(name)) {
    return `"${name}" must start with a letter or underscore and contain only letters, digits and underscores`;
  }
  if (rules.requireUppercase && !/^[A-Z]/.test(name)) {
    return `"${name}" must start with an uppercase letter`;
  }
  if (isReservedWord(name)) {
    return `"${name}" is a reserved word`;
  }
  return undefined;
}
