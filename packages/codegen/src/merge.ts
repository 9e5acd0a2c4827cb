/**
 * Codegen Package - Artifact Merge
 *
 * Regenerates the managed regions of a view artifact in place. Text outside
 * the marker lines is never touched, apart from the class name and the first
 * base type of its heritage clause.
 */

import {
  nullLogger,
  ViewBindError,
  ViewBindErrorCode,
  ViewBindWarningCode,
  type BindingDescriptor,
  type GenerationSettings,
  type Logger,
  type ViewBindWarning,
} from "@viewbind/model";
import { applySingleEdit, detectEol, insert, lineStartOf, replace, type SourceEdit, type Span } from "./edit.js";
import { renderRegion, renderSkeleton, type RegionLayout } from "./emit.js";
import { REGION_ORDER, type RegionName } from "./markers.js";
import { findClassBody, findClassDeclaration, findRegion, type ClassBody, type ClassDeclaration } from "./scan.js";

export interface MergeOptions {
  logger?: Logger;

  /** Artifact path, used in warnings and errors */
  file?: string;
}

export interface MergeResult {
  text: string;

  /** Text differs from the existing artifact (always true on creation) */
  changed: boolean;

  /** No artifact existed; the skeleton was emitted */
  created: boolean;

  /** Regions whose markers were missing and have been re-inserted */
  recovered: RegionName[];

  warnings: ViewBindWarning[];
}

/**
 * Produce the new artifact text for `className`.
 *
 * Without existing text the full skeleton is emitted. Otherwise the first
 * class is renamed, its base type updated, and each managed region replaced,
 * or re-inserted at its fallback position when its markers are gone.
 *
 * @throws ViewBindError CLASS_NOT_FOUND when the existing text has no class
 *   declaration with a balanced body
 */
export function mergeArtifact(
  existing: string | undefined,
  className: string,
  descriptors: readonly BindingDescriptor[],
  settings: GenerationSettings,
  options: MergeOptions = {}
): MergeResult {
  if (existing === undefined) {
    return {
      text: renderSkeleton(className, descriptors, settings),
      changed: true,
      created: true,
      recovered: [],
      warnings: [],
    };
  }

  const logger = options.logger ?? nullLogger;
  const eol = detectEol(existing);
  const recovered: RegionName[] = [];
  const warnings: ViewBindWarning[] = [];

  let text = updateSignature(existing, requireClass(existing, options.file), className, settings.baseType);

  for (const region of REGION_ORDER) {
    const declaration = requireClass(text, options.file);
    const body = requireBody(text, declaration, options.file);
    const layout: RegionLayout = { indent: declaration.indent + settings.output.indent, eol };
    const payload = renderRegion(region, className, descriptors, settings, layout);
    const within: Span = { start: body.open + 1, end: body.close };

    const span = findRegion(text, within, region);
    if (span) {
      text = applySingleEdit(text, replace(span, payload));
      continue;
    }
    if (payload.length === 0) continue;

    text = applySingleEdit(text, fallbackInsert(text, body, within, region, payload, eol));
    recovered.push(region);

    const message = `Markers for the "${region}" region were missing in ${options.file ?? className}; region re-inserted`;
    warnings.push({ code: ViewBindWarningCode.MARKER_RECOVERY, message, file: options.file, region });
    if (settings.logMarkerRecovery) logger.warn(message);
  }

  return { text, changed: text !== existing, created: false, recovered, warnings };
}

/* =============================================================================
 * SIGNATURE
 * ============================================================================= */

/**
 * Rename the class and point its heritage at `baseType`. An empty base type
 * leaves the heritage clause alone.
 */
function updateSignature(source: string, declaration: ClassDeclaration, className: string, baseType: string): string {
  let text = source;

  // Later offsets first so earlier spans stay valid.
  if (baseType.length > 0) {
    text = applySingleEdit(
      text,
      declaration.baseTypeSpan
        ? replace(declaration.baseTypeSpan, baseType)
        : insert(declaration.heritageInsertAt, ` extends ${baseType}`)
    );
  }
  return applySingleEdit(text, replace(declaration.nameSpan, className));
}

/* =============================================================================
 * FALLBACK POSITIONS
 * ============================================================================= */

function fallbackInsert(
  source: string,
  body: ClassBody,
  within: Span,
  region: RegionName,
  payload: string,
  eol: string
): SourceEdit {
  switch (region) {
    case "fields":
      return insertOnOwnLine(source, afterOpeningBrace(source, body.open), payload, eol);

    case "props": {
      const fields = findRegion(source, within, "fields");
      if (fields) return insertOnOwnLine(source, fields.end, payload, eol);
      const assign = findRegion(source, within, "assign");
      if (assign) return insertOnOwnLine(source, assign.start, payload, eol);
      return beforeClosingBrace(source, body.close, payload, eol);
    }

    case "assign":
      return beforeClosingBrace(source, body.close, payload, eol);
  }
}

/**
 * Just past the line break that follows `{`, or right after the brace when
 * more code shares its line.
 */
function afterOpeningBrace(source: string, open: number): number {
  let position = open + 1;
  while (source[position] === " " || source[position] === "\t") position++;
  if (source.startsWith("\r\n", position)) return position + 2;
  if (source[position] === "\n") return position + 1;
  return open + 1;
}

/**
 * Insert at the start of the closing brace's line when nothing but indentation
 * precedes the brace, else break the line in front of it.
 */
function beforeClosingBrace(source: string, close: number, payload: string, eol: string): SourceEdit {
  const lineStart = lineStartOf(source, close);
  if (source.slice(lineStart, close).trim().length === 0) {
    return insert(lineStart, payload);
  }
  return insert(close, eol + payload);
}

function insertOnOwnLine(source: string, position: number, payload: string, eol: string): SourceEdit {
  const atLineStart = position === 0 || source[position - 1] === "\n";
  return insert(position, atLineStart ? payload : eol + payload);
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function requireClass(source: string, file: string | undefined): ClassDeclaration {
  const declaration = findClassDeclaration(source);
  if (!declaration) {
    throw new ViewBindError("No class declaration found in artifact", ViewBindErrorCode.CLASS_NOT_FOUND, undefined, file);
  }
  return declaration;
}

function requireBody(source: string, declaration: ClassDeclaration, file: string | undefined): ClassBody {
  const body = findClassBody(source, declaration.headerEnd);
  if (!body) {
    throw new ViewBindError(
      `Body of class "${declaration.name}" is not balanced`,
      ViewBindErrorCode.CLASS_NOT_FOUND,
      undefined,
      file
    );
  }
  return body;
}
