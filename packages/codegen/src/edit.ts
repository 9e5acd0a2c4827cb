/**
 * Codegen Package - Source Editing
 *
 * Span-based text edits used by the merge engine.
 */

/**
 * A span in source code.
 */
export interface Span {
  /** Start offset in characters */
  start: number;

  /** End offset in characters (exclusive) */
  end: number;
}

export type SourceEdit =
  | { type: "replace"; span: Span; newText: string }
  | { type: "insert"; position: number; text: string };

/**
 * Create a replace edit.
 */
export function replace(span: Span, newText: string): SourceEdit {
  return { type: "replace", span, newText };
}

/**
 * Create an insert edit.
 */
export function insert(position: number, text: string): SourceEdit {
  return { type: "insert", position, text };
}

/**
 * Apply a single edit to source code.
 */
export function applySingleEdit(source: string, edit: SourceEdit): string {
  switch (edit.type) {
    case "replace":
      return source.slice(0, edit.span.start) + edit.newText + source.slice(edit.span.end);

    case "insert":
      return source.slice(0, edit.position) + edit.text + source.slice(edit.position);
  }
}

/**
 * Start of the line containing `position`.
 */
export function lineStartOf(source: string, position: number): number {
  return source.lastIndexOf("\n", position - 1) + 1;
}

/**
 * Position just past the line break that ends the line containing
 * `position`, or the end of the source on the last line.
 */
export function lineEndOf(source: string, position: number): number {
  const newline = source.indexOf("\n", position);
  return newline < 0 ? source.length : newline + 1;
}

/**
 * Line break style of existing source; `\n` when it has none.
 */
export function detectEol(source: string): string {
  return source.includes("\r\n") ? "\r\n" : "\n";
}
