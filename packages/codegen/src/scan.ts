/**
 * Codegen Package - Class Location
 *
 * Finds the view class in an existing artifact without a parser: the first
 * class declaration is located by pattern, its body by brace counting. Braces
 * inside the header's `<...>` type arguments are not taken for the body.
 *
 * Limitations: braces inside string, template and comment text are skipped,
 * but regular-expression literals and templates nesting other templates are
 * not understood. Only the first top-level class is managed; nested types that
 * repeat marker lines are not supported.
 */

import type { Span } from "./edit.js";
import { lineEndOf, lineStartOf } from "./edit.js";
import { markerLinePattern, REGION_MARKERS, type RegionName } from "./markers.js";

/**
 * The first class declaration of an artifact.
 */
export interface ClassDeclaration {
  name: string;

  /** Span of the class name token */
  nameSpan: Span;

  /** Leading whitespace of the declaration line */
  indent: string;

  /** Where an `extends` clause goes when there is none */
  heritageInsertAt: number;

  /** Span of the first base-type token of an existing `extends` clause */
  baseTypeSpan?: Span;

  /** Offset of the body's opening brace, or the end of the source when none follows the header */
  headerEnd: number;
}

/**
 * Offsets of the braces enclosing a class body.
 */
export interface ClassBody {
  open: number;
  close: number;
}

const CLASS_DECLARATION =
  /^([ \t]*)(?:export[ \t]+)?(?:default[ \t]+)?(?:abstract[ \t]+)?class[ \t]+([A-Za-z_$][\w$]*)/m;

const EXTENDS_CLAUSE = /^\s+extends\s+([A-Za-z_$][\w$.]*)/;

/**
 * Locate the first class declaration.
 */
export function findClassDeclaration(source: string): ClassDeclaration | undefined {
  const match = CLASS_DECLARATION.exec(source);
  if (!match) return undefined;

  const indent = match[1] ?? "";
  const name = match[2] ?? "";
  const nameEnd = match.index + match[0].length;
  const nameSpan = { start: nameEnd - name.length, end: nameEnd };

  const heritageInsertAt = skipTypeArguments(source, nameEnd);

  const heritage = EXTENDS_CLAUSE.exec(source.slice(heritageInsertAt));
  const baseType = heritage?.[1];
  const baseTypeSpan =
    heritage && baseType !== undefined
      ? { start: heritageInsertAt + heritage[0].length - baseType.length, end: heritageInsertAt + heritage[0].length }
      : undefined;

  return { name, nameSpan, indent, heritageInsertAt, baseTypeSpan, headerEnd: findHeaderEnd(source, heritageInsertAt) };
}

/**
 * Find the body braces of the class declared at or after `from`.
 * Returns undefined when no opening brace follows or the braces never balance.
 */
export function findClassBody(source: string, from: number): ClassBody | undefined {
  let open = -1;
  let depth = 0;
  let found: ClassBody | undefined;

  scanStructural(source, from, (ch, index) => {
    if (ch === "<" || ch === ">") return true;
    if (ch === "{") {
      if (open < 0) open = index;
      depth++;
      return true;
    }
    if (open < 0) return true;
    depth--;
    if (depth === 0) {
      found = { open, close: index };
      return false;
    }
    return true;
  });

  return found;
}

/**
 * Whole-line span of a managed region inside `within`, from the start of the
 * start-marker line to just past the end-marker line.
 *
 * The region is anchored on the first end marker; the nearest start marker
 * before it opens the region, so a stray start marker cannot pair with it.
 */
export function findRegion(source: string, within: Span, region: RegionName): Span | undefined {
  const { start, end } = REGION_MARKERS[region];
  const startLines = findMarkerLines(source, within, start);
  const endLine = findMarkerLines(source, within, end)[0];
  if (!endLine) return undefined;

  const opening = startLines.filter(line => line.start < endLine.start).pop();
  if (!opening) return undefined;

  return { start: opening.start, end: lineEndOf(source, endLine.start) };
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function findMarkerLines(source: string, within: Span, marker: string): Span[] {
  const pattern = markerLinePattern(marker);
  const lines: Span[] = [];
  pattern.lastIndex = lineStartOf(source, within.start);
  for (let match = pattern.exec(source); match; match = pattern.exec(source)) {
    if (match.index >= within.end) break;
    if (match.index >= within.start) {
      lines.push({ start: match.index, end: match.index + match[0].length });
    }
  }
  return lines;
}

/**
 * Index just past a balanced `<...>` list starting at `at` (after optional
 * whitespace); `at` itself when there is none.
 */
function skipTypeArguments(source: string, at: number): number {
  let start = at;
  while (start < source.length && /\s/.test(source.charAt(start))) start++;
  if (source[start] !== "<") return at;

  let depth = 0;
  let end = at;
  scanStructural(source, start, (ch, index) => {
    if (ch === "<") depth++;
    if (ch !== ">") return true;
    depth--;
    if (depth > 0) return true;
    end = index + 1;
    return false;
  });
  return end;
}

/**
 * First `{` from `from` onwards that is not nested in angle brackets.
 */
function findHeaderEnd(source: string, from: number): number {
  let depth = 0;
  let found = source.length;
  scanStructural(source, from, (ch, index) => {
    if (ch === "<") depth++;
    else if (ch === ">") depth = Math.max(depth - 1, 0);
    else if (ch === "{" && depth === 0) {
      found = index;
      return false;
    }
    return true;
  });
  return found;
}

type StructuralChar = "{" | "}" | "<" | ">";

/**
 * Report every brace and angle bracket from `from` onwards that is outside
 * string, template and comment text. The `>` of an arrow is not reported.
 * The callback returns false to stop.
 */
function scanStructural(source: string, from: number, onToken: (ch: StructuralChar, index: number) => boolean): void {
  let i = from;
  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];

    if (ch === "/" && next === "/") {
      const newline = source.indexOf("\n", i);
      i = newline < 0 ? source.length : newline + 1;
      continue;
    }
    if (ch === "/" && next === "*") {
      const close = source.indexOf("*/", i + 2);
      i = close < 0 ? source.length : close + 2;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === "`") {
      i = skipQuoted(source, i, ch);
      continue;
    }
    if ((ch === "{" || ch === "}" || ch === "<") && !onToken(ch, i)) {
      return;
    }
    if (ch === ">" && source[i - 1] !== "=" && !onToken(ch, i)) {
      return;
    }
    i++;
  }
}

/**
 * Index just past the closing quote of the literal opening at `start`.
 * Single and double quoted strings also end at a line break.
 */
function skipQuoted(source: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    if (ch === "\n" && quote !== "`") return i + 1;
    i++;
  }
  return source.length;
}
